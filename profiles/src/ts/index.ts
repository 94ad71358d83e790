/**
 * @gcode-annotator/profiles
 *
 * File-backed profile store: reads machine profiles and their dictionaries
 * from a profiles directory and serves them through the lookup contract the
 * annotation engine consumes.
 */

export * from "./constants";
export { DictionaryFormatError, ProfileLoadError } from "./errors";
export {
  parseDictionary,
  parseDictionaryLetter,
  parseSnippets,
  parseValuePattern,
} from "./parse";
export { ProfileStore, ProfileStoreOptions } from "./store";
export { filterSnippets, prepareSnippetInsertion } from "./snippets";
