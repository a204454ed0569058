import { z } from "zod";
import { ProbeConfigError } from "../sdk/errors.js";
import { MAX_CONCURRENCY } from "../sdk/scheduler.js";

export const runOptionsSchema = z
  .object({
    concurrencyLimit: z.number().int().min(1).max(MAX_CONCURRENCY),
    perEndpointTimeoutMs: z.number().int().positive(),
    batchTimeoutMs: z.number().int().positive().optional(),
    warmupEnabled: z.boolean(),
    tls: z.enum(["fallback", "relaxed", "strict"]),
  })
  .strict();

export type RunOptions = z.infer<typeof runOptionsSchema>;

/** Unvalidated values for each run option, as read from flags or the environment. */
export type RunOptionInput = { [K in keyof RunOptions]?: unknown };

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  concurrencyLimit: 5,
  perEndpointTimeoutMs: 8_000,
  warmupEnabled: false,
  tls: "fallback",
};

export const DEFAULT_CONFIG_PATH = "model_config.json";

/**
 * Resolve run options: defaults, then ENDPOINT_SWITCH_* environment
 * variables, then explicit overrides.
 */
export function resolveRunOptions(
  overrides: RunOptionInput = {},
  env: NodeJS.ProcessEnv = process.env,
): RunOptions {
  const merged = {
    ...DEFAULT_RUN_OPTIONS,
    ...definedOnly(readEnvOptions(env)),
    ...definedOnly(overrides),
  };

  const parsed = runOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ProbeConfigError(`Invalid run options: ${problems}`);
  }
  return parsed.data;
}

export function resolveConfigPath(
  flag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return flag ?? env.ENDPOINT_SWITCH_CONFIG ?? DEFAULT_CONFIG_PATH;
}

export function readEnvOptions(env: NodeJS.ProcessEnv): RunOptionInput {
  return {
    concurrencyLimit: parseInteger(env.ENDPOINT_SWITCH_CONCURRENCY),
    perEndpointTimeoutMs: parseInteger(env.ENDPOINT_SWITCH_TIMEOUT_MS),
    batchTimeoutMs: parseInteger(env.ENDPOINT_SWITCH_BATCH_TIMEOUT_MS),
    warmupEnabled: parseFlag(env.ENDPOINT_SWITCH_WARMUP),
    tls: env.ENDPOINT_SWITCH_TLS || undefined,
  };
}

export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return parseInt(value, 10);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function definedOnly(input: RunOptionInput): RunOptionInput {
  return Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined),
  );
}
