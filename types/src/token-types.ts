/**
 * Token and Line Types
 *
 * Describes the lexical output of the line tokenizer. Every piece of a source
 * line ends up in exactly one segment, so the original text can always be
 * rebuilt for highlighting offsets.
 */

// ============================================================================
// Enums
// ============================================================================

/**
 * Kinds of tokens produced by the tokenizer.
 */
export enum TokenKind {
  /** Letter followed by a numeric literal (G1, X-12.5, ,R2) */
  WORD = 1,
  /** Macro parameter reference (#100) */
  PARAMETER = 2,
  /** Trailing checksum (*57) */
  CHECKSUM = 3,
  /** Block delete marker (leading /) */
  BLOCK_DELETE = 4,
  /** Program start/end marker (%) */
  PROGRAM_MARKER = 5,
  /** Malformed or unrecognized fragment, raw text preserved */
  UNKNOWN = 9,
}

/**
 * Kinds of pieces a line is split into.
 */
export enum SegmentKind {
  TOKEN = 1,
  COMMENT = 2,
  WHITESPACE = 3,
}

/**
 * Recoverable problems found while tokenizing a line.
 */
export enum LineWarningCode {
  UNTERMINATED_COMMENT = "UNTERMINATED_COMMENT",
  MALFORMED_NUMBER = "MALFORMED_NUMBER",
  UNRECOGNIZED_LETTER = "UNRECOGNIZED_LETTER",
  MISSING_VALUE = "MISSING_VALUE",
  UNEXPECTED_CHARACTER = "UNEXPECTED_CHARACTER",
}

// ============================================================================
// Letters
// ============================================================================

/** Word letters understood by the grammar */
export type WordLetter =
  | "G"
  | "M"
  | "T"
  | "F"
  | "S"
  | "X"
  | "Y"
  | "Z"
  | "I"
  | "J"
  | "K"
  | "R"
  | "Q"
  | "N"
  | "C"
  | "P"
  | "A"
  | "B"
  | "U"
  | "V"
  | "W"
  | "H"
  | "D"
  | "L"
  | "O";

/** Symbols that form tokens without a word letter */
export type SymbolLetter = "#" | "*" | "/" | "%";

/**
 * Letter class of a token. Comma-prefixed words (",R1") carry their comma in
 * the letter so they never collide with the plain word.
 */
export type TokenLetter = WordLetter | `,${WordLetter}` | SymbolLetter | "unknown";

// ============================================================================
// Tokens
// ============================================================================

/**
 * A single token of a G-code line.
 */
export interface Token {
  kind: TokenKind;
  /** Upper-cased letter class, or "unknown" for malformed fragments */
  letter: TokenLetter;
  /** Exact substring of the source line */
  rawText: string;
  /** Parsed numeric value, absent when the token has none */
  value?: number;
  /** Numeric literal exactly as written (e.g. "01", "-.5") */
  valueText?: string;
  /** 0-based column of the first character */
  position: number;
  /** 1-based source line number */
  lineNumber: number;
}

/**
 * A comment found on a line, either `; ...` or `( ... )`.
 */
export interface LineComment {
  style: "semicolon" | "paren";
  /** Comment body with delimiters removed and surrounding spaces trimmed */
  text: string;
  rawText: string;
  position: number;
  /** False for a `(` that never closes */
  terminated: boolean;
}

export interface LineSegment {
  kind: SegmentKind;
  text: string;
  position: number;
}

export interface LineWarning {
  code: LineWarningCode;
  message: string;
  /** Column the warning refers to */
  position: number;
}

/**
 * Tokenized form of one source line. Created fresh per tokenization and
 * never mutated afterwards.
 */
export interface Line {
  /** 1-based line number */
  lineNumber: number;
  /** Original line text, without the line terminator */
  text: string;
  tokens: readonly Token[];
  comments: readonly LineComment[];
  /** All comment bodies of the line joined by a space */
  comment?: string;
  /** Gap-free cover of `text` in source order */
  segments: readonly LineSegment[];
  warnings: readonly LineWarning[];
}

/**
 * Token span exposed for highlighting overlays.
 */
export interface TokenBoundary {
  lineNumber: number;
  /** Inclusive start column */
  start: number;
  /** Exclusive end column */
  end: number;
  kind: TokenKind;
  letter: TokenLetter;
}
