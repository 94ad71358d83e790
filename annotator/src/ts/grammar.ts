/**
 * Token Grammar
 *
 * Lexical shape of G-code words and the table of codes that set modal
 * groups.
 */

import {
  ModalGroup,
  Token,
  TokenKind,
  TokenLetter,
  WordLetter,
} from "@gcode-annotator/types";
import modalCodeTable from "../data/modal-codes.json";
import {
  ARC_OFFSET_LETTERS,
  AXIS_LETTERS,
  VALUE_MODAL_LETTERS,
  WORD_LETTERS,
} from "./constants";

/** Optional sign, digits, at most one decimal point, at least one digit */
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

export interface ModalCodeDefinition {
  letter: WordLetter;
  value: number;
  group: ModalGroup;
  label: string;
}

export interface ModalSetting {
  group: ModalGroup;
  label: string;
}

const MODAL_GROUPS: ReadonlySet<string> = new Set<string>(Object.values(ModalGroup));

export function isWordLetter(letter: string): letter is WordLetter {
  return WORD_LETTERS.has(letter);
}

export function isModalGroup(group: string): group is ModalGroup {
  return MODAL_GROUPS.has(group);
}

/**
 * Parse a numeric literal.
 * @returns The number, or undefined if the text is not a valid literal
 */
export function parseNumber(text: string): number | undefined {
  if (!NUMBER_PATTERN.test(text)) return undefined;
  return Number(text);
}

const modalKey = (letter: string, value: number): string => `${letter}:${value}`;

function loadModalCodes(): Map<string, ModalCodeDefinition> {
  const codes = new Map<string, ModalCodeDefinition>();
  for (const row of modalCodeTable) {
    const letter = row.code.charAt(0);
    const value = parseNumber(row.code.slice(1));
    if (!isWordLetter(letter) || value === undefined || !isModalGroup(row.group)) {
      throw new Error(`Invalid modal code table row: ${JSON.stringify(row)}`);
    }
    codes.set(modalKey(letter, value), {
      letter,
      value,
      group: row.group,
      label: row.label,
    });
  }
  return codes;
}

const MODAL_CODES = loadModalCodes();

/**
 * All fixed modal codes, in table order.
 */
export function getModalCodes(): ModalCodeDefinition[] {
  return Array.from(MODAL_CODES.values());
}

/**
 * Code of a token as it should be shown to a user: upper-case letter plus
 * the literal as written ("G01", ",R2", "#100"), or the raw text for
 * fragments that are not words.
 */
export function formatCode(token: Token): string {
  switch (token.kind) {
    case TokenKind.WORD:
    case TokenKind.PARAMETER:
    case TokenKind.CHECKSUM:
      return `${token.letter}${token.valueText ?? ""}`;
    default:
      return token.rawText;
  }
}

/**
 * Modal group a token sets, if any.
 */
export function findModalSetting(token: Token): ModalSetting | undefined {
  if (token.kind !== TokenKind.WORD || token.value === undefined) return undefined;
  if (!isWordLetter(token.letter)) return undefined;

  const valueGroup = VALUE_MODAL_LETTERS[token.letter];
  if (valueGroup) {
    return { group: valueGroup, label: formatCode(token) };
  }

  const definition = MODAL_CODES.get(modalKey(token.letter, token.value));
  return definition ? { group: definition.group, label: definition.label } : undefined;
}

export function isCoordinateLetter(letter: TokenLetter): boolean {
  return isWordLetter(letter) && (AXIS_LETTERS.has(letter) || ARC_OFFSET_LETTERS.has(letter));
}

/**
 * Modal groups a word's meaning depends on when its dictionary entry does
 * not name one.
 */
export function defaultDependencies(letter: TokenLetter): ModalGroup[] {
  if (!isWordLetter(letter)) return [];
  if (AXIS_LETTERS.has(letter)) return [ModalGroup.MOTION, ModalGroup.POSITIONING];
  if (ARC_OFFSET_LETTERS.has(letter)) return [ModalGroup.MOTION];
  return [];
}
