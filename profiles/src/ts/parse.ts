/**
 * Dictionary JSON parsing
 *
 * Two shapes are accepted:
 *
 * - record form: `[{ "letter": "G", "value_or_range": 1, "description": "...",
 *   "modal_group": "motion" }]`
 * - map form: `{ "G01": "Linear move", "X": "X axis",
 *   "G81": { "desc": "Drilling cycle", "sub": { "R": "Retract plane" } } }`
 */

import {
  DictionaryLetter,
  ProfileDictionaryEntry,
  ValuePattern,
} from "@gcode-annotator/types";
import { isModalGroup, isWordLetter, parseNumber } from "@gcode-annotator/annotator";
import { DictionaryFormatError } from "./errors";

const SYMBOL_LETTERS = new Set(["#", "*", "/", "%"]);
const RANGE_PATTERN = /^(.+?)\.\.(.+)$/;
const MAP_KEY_PATTERN = /^(,?[A-Z])([+-]?(?:\d+\.?\d*|\.\d+))?$/;

const WILDCARD: ValuePattern = { kind: "wildcard" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a letter as written in a dictionary ("g", ",r", "%").
 */
export function parseDictionaryLetter(text: string): DictionaryLetter | undefined {
  const letter = text.trim().toUpperCase();
  if (letter === "#" || letter === "*" || letter === "/" || letter === "%") return letter;
  if (isWordLetter(letter)) return letter;
  if (letter.startsWith(",")) {
    const word = letter.slice(1);
    if (isWordLetter(word)) return `,${word}`;
  }
  return undefined;
}

function range(min: number, max: number, location: string): ValuePattern {
  if (min > max) {
    throw new DictionaryFormatError(location, `range ${min}..${max} is empty`);
  }
  return { kind: "range", min, max };
}

/**
 * Parse a `value_or_range` field.
 *
 * Absent, `null`, `""` and `"*"` mean any value; a number or numeric string
 * is an exact value; `"a..b"` and `[a, b]` are inclusive ranges.
 */
export function parseValuePattern(raw: unknown, location: string): ValuePattern {
  if (raw === undefined || raw === null) return WILDCARD;

  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new DictionaryFormatError(location, `value ${raw} is not finite`);
    }
    return { kind: "exact", value: raw };
  }

  if (typeof raw === "string") {
    const text = raw.trim();
    if (text === "" || text === "*") return WILDCARD;

    const bounds = RANGE_PATTERN.exec(text);
    if (bounds) {
      const min = parseNumber(bounds[1].trim());
      const max = parseNumber(bounds[2].trim());
      if (min === undefined || max === undefined) {
        throw new DictionaryFormatError(location, `malformed range "${raw}"`);
      }
      return range(min, max, location);
    }

    const value = parseNumber(text);
    if (value === undefined) {
      throw new DictionaryFormatError(location, `malformed value "${raw}"`);
    }
    return { kind: "exact", value };
  }

  if (Array.isArray(raw) && raw.length === 2) {
    const [min, max]: unknown[] = raw;
    if (typeof min === "number" && typeof max === "number") {
      return range(min, max, location);
    }
  }

  throw new DictionaryFormatError(location, `unsupported value_or_range ${JSON.stringify(raw)}`);
}

function parseSub(raw: unknown, location: string): Record<string, string> | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    throw new DictionaryFormatError(location, "sub must be an object of code to description");
  }

  const sub: Record<string, string> = {};
  for (const [key, description] of Object.entries(raw)) {
    const letter = parseDictionaryLetter(key);
    if (!letter || typeof description !== "string") {
      throw new DictionaryFormatError(location, `invalid sub-description for "${key}"`);
    }
    sub[letter] = description;
  }
  return sub;
}

function parseRecord(raw: unknown, index: number): ProfileDictionaryEntry {
  const location = `entry ${index}`;
  if (!isRecord(raw)) {
    throw new DictionaryFormatError(location, "must be an object");
  }

  const { description, modal_group: modalGroup } = raw;
  const letter = typeof raw.letter === "string" ? parseDictionaryLetter(raw.letter) : undefined;
  if (!letter) {
    throw new DictionaryFormatError(location, `unrecognized letter ${JSON.stringify(raw.letter)}`);
  }
  if (typeof description !== "string") {
    throw new DictionaryFormatError(location, "description must be a string");
  }

  const entry: ProfileDictionaryEntry = {
    letter,
    pattern: parseValuePattern(raw.value_or_range, location),
    description,
  };

  if (modalGroup !== undefined && modalGroup !== null) {
    if (typeof modalGroup !== "string" || !isModalGroup(modalGroup)) {
      throw new DictionaryFormatError(location, `unknown modal_group ${JSON.stringify(modalGroup)}`);
    }
    entry.modalGroup = modalGroup;
  }

  const sub = parseSub(raw.sub, location);
  if (sub) entry.sub = sub;

  return entry;
}

function parseMapEntry(key: string, raw: unknown): ProfileDictionaryEntry {
  const location = `key "${key}"`;
  const code = key.trim().toUpperCase();

  let letter: DictionaryLetter | undefined;
  let pattern: ValuePattern = WILDCARD;
  if (SYMBOL_LETTERS.has(code)) {
    letter = parseDictionaryLetter(code);
  } else {
    const match = MAP_KEY_PATTERN.exec(code);
    if (match) {
      letter = parseDictionaryLetter(match[1]);
      if (match[2] !== undefined) pattern = parseValuePattern(match[2], location);
    }
  }
  if (!letter) {
    throw new DictionaryFormatError(location, "unrecognized code");
  }

  if (typeof raw === "string") {
    return { letter, pattern, description: raw };
  }
  const description = isRecord(raw) ? raw.desc : undefined;
  if (isRecord(raw) && typeof description === "string") {
    const entry: ProfileDictionaryEntry = { letter, pattern, description };
    const sub = parseSub(raw.sub, location);
    if (sub) entry.sub = sub;
    return entry;
  }
  throw new DictionaryFormatError(location, "value must be a description or { desc, sub }");
}

/**
 * Convert parsed dictionary JSON into entries, keeping declared order.
 * @throws DictionaryFormatError naming the first invalid entry or key
 */
export function parseDictionary(json: unknown): ProfileDictionaryEntry[] {
  if (Array.isArray(json)) {
    return json.map((raw: unknown, index) => parseRecord(raw, index));
  }
  if (isRecord(json)) {
    return Object.entries(json).map(([key, raw]) => parseMapEntry(key, raw));
  }
  throw new DictionaryFormatError("document", "must be an array of entries or an object map");
}

/**
 * Convert parsed snippet JSON (name to snippet text) into a map.
 * @throws DictionaryFormatError if the document or any snippet is not text
 */
export function parseSnippets(json: unknown): Record<string, string> {
  if (!isRecord(json)) {
    throw new DictionaryFormatError("document", "snippets must be an object of name to text");
  }
  const snippets: Record<string, string> = {};
  for (const [name, text] of Object.entries(json)) {
    if (typeof text !== "string") {
      throw new DictionaryFormatError(`key "${name}"`, "snippet must be a string");
    }
    snippets[name] = text;
  }
  return snippets;
}
