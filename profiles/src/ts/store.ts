import * as fs from "fs";
import * as path from "path";
import { LookupEntries, ProfileDictionaryEntry } from "@gcode-annotator/types";
import {
  ANNOTATIONS_FILE_SUFFIX,
  DEFAULT_PROFILES_DIR,
  PROFILES_LIST_FILE,
  SNIPPETS_FILE_SUFFIX,
} from "./constants";
import { ProfileLoadError } from "./errors";
import { parseDictionary, parseSnippets } from "./parse";

export interface ProfileStoreOptions {
  /** Directory holding profiles.json and the per-profile files */
  profilesDir?: string;
}

/**
 * Read a JSON file.
 * @returns The parsed document, or undefined if the file does not exist
 * @throws ProfileLoadError if the file cannot be read or parsed
 */
function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return parsed;
  } catch (e) {
    throw new ProfileLoadError(filePath, e);
  }
}

/**
 * File-backed store of machine profiles.
 *
 * Each profile has a token dictionary (`<name>-annotations.json`) and a
 * snippet list (`<name>-dictionary.json`); `profiles.json` lists the
 * profile names. Missing files read as empty.
 *
 * @example
 * ```typescript
 * const store = new ProfileStore({ profilesDir: "./profiles" });
 * store.loadProfile("lathe");
 * engine.setActiveDictionary(store.lookupEntries("lathe"));
 * ```
 */
export class ProfileStore {
  private readonly profilesDir: string;
  private readonly dictionaries: Map<string, ProfileDictionaryEntry[]> = new Map();

  constructor(options?: ProfileStoreOptions) {
    this.profilesDir = options?.profilesDir ?? DEFAULT_PROFILES_DIR;
  }

  getProfilesDir(): string {
    return this.profilesDir;
  }

  /**
   * Names listed in profiles.json, in file order.
   */
  listProfiles(): string[] {
    const filePath = path.join(this.profilesDir, PROFILES_LIST_FILE);
    const json = readJsonFile(filePath);
    if (json === undefined) return [];
    if (!Array.isArray(json)) {
      throw new ProfileLoadError(filePath, new Error("profile list must be an array of names"));
    }

    const names: string[] = [];
    json.forEach((name: unknown, index) => {
      if (typeof name === "string") {
        names.push(name);
      } else {
        console.warn(`Skipping profile at index ${index} in ${filePath}: not a string`);
      }
    });
    return names;
  }

  /**
   * Read and parse a profile's dictionary, replacing any previously loaded
   * copy.
   * @returns Entries in declared order
   * @throws ProfileLoadError if the file is unreadable or not a valid dictionary
   */
  loadProfile(name: string): ProfileDictionaryEntry[] {
    const filePath = this.fileFor(name, ANNOTATIONS_FILE_SUFFIX);
    const json = readJsonFile(filePath);

    let entries: ProfileDictionaryEntry[] = [];
    if (json !== undefined) {
      try {
        entries = parseDictionary(json);
      } catch (e) {
        throw new ProfileLoadError(filePath, e);
      }
    }
    this.dictionaries.set(name, entries);
    return entries.slice();
  }

  /**
   * Entries of a loaded profile. Does no I/O; a profile that has not been
   * loaded has no entries.
   */
  lookupEntries(name: string): ProfileDictionaryEntry[] {
    return this.dictionaries.get(name)?.slice() ?? [];
  }

  /**
   * Lookup function bound to this store, for callers that only need the
   * lookup contract.
   */
  get lookup(): LookupEntries {
    return (name: string) => this.lookupEntries(name);
  }

  /**
   * Read a profile's snippets (name to snippet text).
   * @throws ProfileLoadError if the file is unreadable or malformed
   */
  loadSnippets(name: string): Record<string, string> {
    const filePath = this.fileFor(name, SNIPPETS_FILE_SUFFIX);
    const json = readJsonFile(filePath);
    if (json === undefined) return {};
    try {
      return parseSnippets(json);
    } catch (e) {
      throw new ProfileLoadError(filePath, e);
    }
  }

  private fileFor(name: string, suffix: string): string {
    return path.join(this.profilesDir, `${name}${suffix}`);
  }
}
