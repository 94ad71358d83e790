/**
 * Line Tokenizer
 *
 * Splits one line of G-code into tokens, comments and whitespace. Never
 * throws: fragments that do not form a valid word become UNKNOWN tokens
 * with their raw text preserved and a warning attached to the line.
 */

import {
  Line,
  LineComment,
  LineSegment,
  LineWarning,
  LineWarningCode,
  SegmentKind,
  Token,
  TokenBoundary,
  TokenKind,
  TokenLetter,
} from "@gcode-annotator/types";
import { isWordLetter, parseNumber } from "./grammar";

/** Characters that start something other than a word or a stray fragment */
const SPECIAL_STARTS = new Set([";", "(", "#", "*", "%", ",", "/"]);

const isWhitespace = (ch: string): boolean => /\s/.test(ch);
const isAsciiLetter = (ch: string): boolean => /^[A-Za-z]$/.test(ch);
const isDigit = (ch: string): boolean => ch >= "0" && ch <= "9";

const freezeAll = <T extends object>(items: T[]): readonly T[] =>
  Object.freeze(items.map((item) => Object.freeze(item)));

/**
 * Mutable accumulator for one line; frozen into a Line at the end.
 */
class LineBuilder {
  readonly tokens: Token[] = [];
  readonly comments: LineComment[] = [];
  readonly segments: LineSegment[] = [];
  readonly warnings: LineWarning[] = [];

  constructor(
    readonly text: string,
    readonly lineNumber: number
  ) {}

  addToken(
    kind: TokenKind,
    letter: TokenLetter,
    start: number,
    end: number,
    valueText?: string
  ): void {
    const rawText = this.text.slice(start, end);
    const token: Token = { kind, letter, rawText, position: start, lineNumber: this.lineNumber };
    if (valueText !== undefined) {
      token.valueText = valueText;
      token.value = parseNumber(valueText);
    }
    this.tokens.push(token);
    this.segments.push({ kind: SegmentKind.TOKEN, text: rawText, position: start });
  }

  addUnknown(start: number, end: number, code: LineWarningCode, message: string): void {
    this.addToken(TokenKind.UNKNOWN, "unknown", start, end);
    this.warnings.push({ code, message, position: start });
  }

  addComment(style: LineComment["style"], start: number, end: number, terminated: boolean): void {
    const rawText = this.text.slice(start, end);
    const bodyEnd = style === "paren" && terminated ? rawText.length - 1 : rawText.length;
    this.comments.push({
      style,
      text: rawText.slice(1, bodyEnd).trim(),
      rawText,
      position: start,
      terminated,
    });
    this.segments.push({ kind: SegmentKind.COMMENT, text: rawText, position: start });
    if (!terminated) {
      this.warnings.push({
        code: LineWarningCode.UNTERMINATED_COMMENT,
        message: `Comment opened at column ${start + 1} is never closed`,
        position: start,
      });
    }
  }

  addWhitespace(start: number, end: number): void {
    this.segments.push({
      kind: SegmentKind.WHITESPACE,
      text: this.text.slice(start, end),
      position: start,
    });
  }

  build(): Line {
    const comment = this.comments
      .map((c) => c.text)
      .filter((text) => text.length > 0)
      .join(" ");
    const line: Line = {
      lineNumber: this.lineNumber,
      text: this.text,
      tokens: freezeAll(this.tokens),
      comments: freezeAll(this.comments),
      segments: freezeAll(this.segments),
      warnings: freezeAll(this.warnings),
    };
    if (comment) line.comment = comment;
    return Object.freeze(line);
  }
}

/**
 * Scan a word starting at `letterAt`. `start` is where the token begins,
 * which is one column earlier for comma-prefixed words.
 * @returns Index just past the consumed fragment
 */
function scanWord(builder: LineBuilder, start: number, letterAt: number, commaPrefixed: boolean): number {
  const { text } = builder;
  const ch = text.charAt(letterAt).toUpperCase();

  let end = letterAt + 1;
  if (text[end] === "+" || text[end] === "-") end++;
  while (end < text.length && (isDigit(text.charAt(end)) || text[end] === ".")) end++;

  const raw = text.slice(start, end);
  const valueText = text.slice(letterAt + 1, end);

  if (!isWordLetter(ch)) {
    builder.addUnknown(start, end, LineWarningCode.UNRECOGNIZED_LETTER, `Unrecognized letter "${ch}" in "${raw}"`);
  } else if (valueText.length === 0) {
    builder.addUnknown(start, end, LineWarningCode.MISSING_VALUE, `Letter "${ch}" has no value`);
  } else if (parseNumber(valueText) === undefined) {
    builder.addUnknown(start, end, LineWarningCode.MALFORMED_NUMBER, `Malformed number in "${raw}"`);
  } else {
    const letter: TokenLetter = commaPrefixed ? `,${ch}` : ch;
    builder.addToken(TokenKind.WORD, letter, start, end, valueText);
  }
  return end;
}

/**
 * Scan `#123` or `*45`. A symbol without digits is a stray fragment.
 */
function scanNumbered(builder: LineBuilder, start: number, kind: TokenKind.PARAMETER | TokenKind.CHECKSUM): number {
  const { text } = builder;
  let end = start + 1;
  while (end < text.length && isDigit(text.charAt(end))) end++;

  const symbol = kind === TokenKind.PARAMETER ? "#" : "*";
  if (end === start + 1) {
    builder.addUnknown(start, end, LineWarningCode.MISSING_VALUE, `"${symbol}" has no number`);
  } else {
    builder.addToken(kind, symbol, start, end, text.slice(start + 1, end));
  }
  return end;
}

/**
 * Tokenize a single line of G-code.
 *
 * @param rawLine - Line text without its line terminator
 * @param lineNumber - 1-based source line number
 *
 * @example
 * ```typescript
 * const line = tokenize("G01 X-12.5 (cut)");
 * line.tokens.map((t) => t.rawText); // ["G01", "X-12.5"]
 * line.comment; // "cut"
 * ```
 */
export function tokenize(rawLine: string, lineNumber: number = 1): Line {
  const builder = new LineBuilder(rawLine, lineNumber);
  const text = rawLine;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (isWhitespace(ch)) {
      let end = i + 1;
      while (end < text.length && isWhitespace(text.charAt(end))) end++;
      builder.addWhitespace(i, end);
      i = end;
    } else if (ch === ";") {
      builder.addComment("semicolon", i, text.length, true);
      i = text.length;
    } else if (ch === "(") {
      const close = text.indexOf(")", i + 1);
      const end = close === -1 ? text.length : close + 1;
      builder.addComment("paren", i, end, close !== -1);
      i = end;
    } else if (isAsciiLetter(ch)) {
      i = scanWord(builder, i, i, false);
    } else if (ch === "," && i + 1 < text.length && isAsciiLetter(text.charAt(i + 1))) {
      i = scanWord(builder, i, i + 1, true);
    } else if (ch === "#") {
      i = scanNumbered(builder, i, TokenKind.PARAMETER);
    } else if (ch === "*") {
      i = scanNumbered(builder, i, TokenKind.CHECKSUM);
    } else if (ch === "%") {
      builder.addToken(TokenKind.PROGRAM_MARKER, "%", i, i + 1);
      i++;
    } else if (ch === "/" && builder.tokens.length === 0) {
      builder.addToken(TokenKind.BLOCK_DELETE, "/", i, i + 1);
      i++;
    } else {
      // Stray run: everything up to the next boundary
      let end = i + 1;
      while (end < text.length) {
        const next = text.charAt(end);
        if (isWhitespace(next) || isAsciiLetter(next) || SPECIAL_STARTS.has(next)) break;
        end++;
      }
      builder.addUnknown(i, end, LineWarningCode.UNEXPECTED_CHARACTER, `Unexpected "${text.slice(i, end)}"`);
      i = end;
    }
  }

  return builder.build();
}

/**
 * Rebuild the source text of a line from its segments.
 */
export function reconstructLine(line: Line): string {
  return line.segments.map((segment) => segment.text).join("");
}

/**
 * Split a document into lines and tokenize each one. Lines are independent
 * of each other, so the result does not depend on processing order.
 */
export function tokenizeDocument(rawText: string): Line[] {
  return rawText.split("\n").map((text, index) => {
    const withoutCarriageReturn = text.endsWith("\r") ? text.slice(0, -1) : text;
    return tokenize(withoutCarriageReturn, index + 1);
  });
}

/**
 * Token spans of a line for highlighting overlays.
 */
export function getLineTokenBoundaries(line: Line): TokenBoundary[] {
  return line.tokens.map((token) => ({
    lineNumber: line.lineNumber,
    start: token.position,
    end: token.position + token.rawText.length,
    kind: token.kind,
    letter: token.letter,
  }));
}
