import * as path from "path";

export const PROFILES_DIR_ENV = "GCODE_ANNOTATOR_PROFILES_DIR";
export const PROFILES_LIST_FILE = "profiles.json";
export const ANNOTATIONS_FILE_SUFFIX = "-annotations.json";
export const SNIPPETS_FILE_SUFFIX = "-dictionary.json";

/**
 * Directory profiles are read from: the environment override, or
 * `profiles/` under the working directory.
 */
export function resolveProfilesDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[PROFILES_DIR_ENV];
  return override ? path.resolve(override) : path.resolve("profiles");
}

export const DEFAULT_PROFILES_DIR = resolveProfilesDir();
