/**
 * Profile Dictionary Types
 *
 * A profile dictionary is an ordered, user-editable list of entries. Entries
 * may overlap; the resolver orders them by specificity and keeps declaration
 * order within one specificity level.
 */

import type { TokenLetter } from "./token-types";
import type { ModalGroup } from "./modal-types";

/** Letters a dictionary entry can be keyed on */
export type DictionaryLetter = Exclude<TokenLetter, "unknown">;

export interface ExactValuePattern {
  kind: "exact";
  value: number;
}

/** Inclusive numeric interval */
export interface RangeValuePattern {
  kind: "range";
  min: number;
  max: number;
}

export interface WildcardValuePattern {
  kind: "wildcard";
}

export type ValuePattern =
  | ExactValuePattern
  | RangeValuePattern
  | WildcardValuePattern;

export interface ProfileDictionaryEntry {
  letter: DictionaryLetter;
  pattern: ValuePattern;
  /**
   * Description template. Supports `{value}`, `{code}`, `{letter}` and
   * `{modal.<group>}` placeholders.
   */
  description: string;
  /** Modal group the description depends on */
  modalGroup?: ModalGroup;
  /**
   * Descriptions for codes that follow this one on the same line, keyed by
   * code (e.g. "R", "Z", ",C"). Used for canned cycles and similar words
   * whose parameters change meaning.
   */
  sub?: Readonly<Record<string, string>>;
}

/**
 * Lookup contract of the profile store.
 */
export type LookupEntries = (profileName: string) => ProfileDictionaryEntry[];
