import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { EndpointDescriptor } from "../sdk/types.js";

/**
 * One profile entry of the profiles file. Other keys (extra environment
 * variables for the profile) are allowed and ignored here.
 */
export const profileSchema = z
  .object({
    ANTHROPIC_BASE_URL: z.string().url(),
    ANTHROPIC_AUTH_TOKEN: z.string().default(""),
    timeoutMs: z.number().int().positive().optional(),
  })
  .passthrough();

/**
 * Profile names must contain a non-digit: JSON objects list all-digit keys
 * first, which would break file order.
 */
export const profileNameSchema = z
  .string()
  .regex(/\D/, "Profile names must contain a non-digit character");

export const profilesFileSchema = z.record(profileNameSchema, profileSchema);

export type ProfilesFile = z.infer<typeof profilesFileSchema>;

export class ProfileConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileConfigError";
  }
}

/**
 * Read the profiles file and return one descriptor per profile, in file order.
 */
export async function loadProfiles(path: string): Promise<EndpointDescriptor[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      throw new ProfileConfigError(`Config file ${path} does not exist.`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProfileConfigError(`Config file ${path} is not valid JSON - ${reason}`);
  }

  return parseProfiles(raw);
}

export function parseProfiles(raw: unknown): EndpointDescriptor[] {
  const parsed = profilesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ProfileConfigError(`Invalid profiles: ${problems}`);
  }

  return Object.entries(parsed.data).map(([name, profile]) => {
    const descriptor: EndpointDescriptor = {
      name,
      baseURL: profile.ANTHROPIC_BASE_URL,
      token: profile.ANTHROPIC_AUTH_TOKEN,
    };
    if (profile.timeoutMs !== undefined) {
      descriptor.timeoutOverride = profile.timeoutMs;
    }
    return descriptor;
  });
}

/**
 * Name of the profile whose base URL matches the one currently exported,
 * ignoring trailing slashes.
 */
export function findActiveProfile(
  descriptors: EndpointDescriptor[],
  baseURL: string | undefined,
): string | undefined {
  if (!baseURL) {
    return undefined;
  }
  const target = trimSlashes(baseURL);
  return descriptors.find((d) => trimSlashes(d.baseURL) === target)?.name;
}

function trimSlashes(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
