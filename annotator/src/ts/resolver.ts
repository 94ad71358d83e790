/**
 * Annotation Resolver
 *
 * Maps a token to a description using a prioritized rule table built from a
 * profile dictionary. Pure: the result depends only on the token, the modal
 * context, the dictionary and the line scope passed in.
 */

import {
  AnnotationResult,
  AnnotationSource,
  ContextUse,
  DictionaryLetter,
  ModalContext,
  ModalGroup,
  ProfileDictionaryEntry,
  Token,
  TokenKind,
  ValuePattern,
} from "@gcode-annotator/types";
import delve from "dlv";
import { BUILTIN_DESCRIPTIONS, UNKNOWN_CODE_PREFIX } from "./constants";
import { defaultDependencies, findModalSetting, formatCode } from "./grammar";
import { describeModalState, isInherited } from "./modalState";

const PLACEHOLDER_PATTERN = /\{([A-Za-z][\w.]*)\}/g;

/**
 * Descriptions opened by an earlier token on the same line, keyed by letter.
 */
export type LineScope = Readonly<Record<string, string>>;

type RuleSpecificity = AnnotationSource.EXACT | AnnotationSource.RANGE | AnnotationSource.WILDCARD;

export interface DictionaryRule {
  entry: ProfileDictionaryEntry;
  /** Position of the entry in the dictionary as declared */
  index: number;
  specificity: RuleSpecificity;
}

function specificityOf(pattern: ValuePattern): RuleSpecificity {
  switch (pattern.kind) {
    case "exact":
      return AnnotationSource.EXACT;
    case "range":
      return AnnotationSource.RANGE;
    case "wildcard":
      return AnnotationSource.WILDCARD;
  }
}

function patternMatches(pattern: ValuePattern, value: number | undefined): boolean {
  switch (pattern.kind) {
    case "exact":
      return value !== undefined && value === pattern.value;
    case "range":
      return value !== undefined && value >= pattern.min && value <= pattern.max;
    case "wildcard":
      return true;
  }
}

/**
 * Copy of an entry that shares nothing with the caller's objects.
 */
function freezeEntry(entry: ProfileDictionaryEntry): ProfileDictionaryEntry {
  const copy: ProfileDictionaryEntry = {
    ...entry,
    pattern: Object.freeze({ ...entry.pattern }),
  };
  if (entry.sub) copy.sub = Object.freeze({ ...entry.sub });
  return Object.freeze(copy);
}

/**
 * Profile dictionary sorted into lookup order.
 *
 * Rules for a letter are ordered exact, then range, then wildcard; within
 * one specificity level the entry declared first wins. Duplicate exact
 * entries for the same code therefore resolve to the first one.
 */
export class CompiledDictionary {
  public readonly entries: readonly ProfileDictionaryEntry[];
  private readonly rules: Map<DictionaryLetter, DictionaryRule[]> = new Map();

  constructor(entries: readonly ProfileDictionaryEntry[]) {
    this.entries = Object.freeze(entries.map(freezeEntry));

    this.entries.forEach((entry, index) => {
      const rule: DictionaryRule = { entry, index, specificity: specificityOf(entry.pattern) };
      const bucket = this.rules.get(entry.letter);
      if (bucket) {
        bucket.push(rule);
      } else {
        this.rules.set(entry.letter, [rule]);
      }
    });

    this.rules.forEach((bucket) =>
      bucket.sort((a, b) => a.specificity - b.specificity || a.index - b.index)
    );
  }

  /**
   * First rule matching the letter and value.
   */
  match(letter: DictionaryLetter, value: number | undefined): DictionaryRule | undefined {
    return this.rules.get(letter)?.find((rule) => patternMatches(rule.entry.pattern, value));
  }

  /**
   * Rules for a letter in lookup order.
   */
  rulesFor(letter: DictionaryLetter): readonly DictionaryRule[] {
    return this.rules.get(letter) ?? [];
  }

  get size(): number {
    return this.entries.length;
  }
}

export function compileDictionary(entries: readonly ProfileDictionaryEntry[]): CompiledDictionary {
  return new CompiledDictionary(entries);
}

function fillTemplate(template: string, token: Token, context: ModalContext): string {
  const modal: Record<string, string> = {};
  for (const group of Object.values(ModalGroup)) {
    modal[group] = describeModalState(group, context[group]);
  }
  const scope = {
    value: token.valueText ?? "",
    code: formatCode(token),
    letter: token.letter,
    modal,
  };

  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, path: string) => {
    const resolved: unknown = delve(scope, path);
    return typeof resolved === "string" || typeof resolved === "number"
      ? String(resolved)
      : placeholder;
  });
}

function describe(
  token: Token,
  context: ModalContext,
  template: string,
  source: AnnotationSource,
  entry?: ProfileDictionaryEntry
): AnnotationResult {
  const ownGroup = findModalSetting(token)?.group;
  const groups = (entry?.modalGroup ? [entry.modalGroup] : defaultDependencies(token.letter)).filter(
    (group) => group !== ownGroup
  );
  const uses: ContextUse[] = groups.map((group) => ({
    group,
    state: context[group],
    inherited: isInherited(context[group], token.lineNumber),
  }));

  let description = fillTemplate(template, token, context);
  if (source !== AnnotationSource.EXACT && token.valueText !== undefined && !template.includes("{value}")) {
    description += ` = ${token.valueText}`;
  }
  const labels = groups
    .filter((group) => !template.includes(`{modal.${group}}`))
    .map((group) => describeModalState(group, context[group]));
  if (labels.length > 0) {
    description += ` (${labels.join(", ")})`;
  }

  const result: AnnotationResult = {
    token,
    description,
    isModalCarry: uses.some((use) => use.inherited),
    source,
    context: uses,
  };
  if (entry) result.entry = entry;
  return result;
}

function fixed(token: Token, description: string, source: AnnotationSource): AnnotationResult {
  return { token, description, isModalCarry: false, source, context: [] };
}

function builtinDescription(token: Token): string | undefined {
  switch (token.kind) {
    case TokenKind.PARAMETER:
      return `${BUILTIN_DESCRIPTIONS.parameter} ${formatCode(token)} = ${token.valueText ?? ""}`;
    case TokenKind.CHECKSUM:
      return `${BUILTIN_DESCRIPTIONS.checksum} = ${token.valueText ?? ""}`;
    case TokenKind.BLOCK_DELETE:
      return BUILTIN_DESCRIPTIONS.blockDelete;
    case TokenKind.PROGRAM_MARKER:
      return BUILTIN_DESCRIPTIONS.programMarker;
    default:
      return undefined;
  }
}

/**
 * Describe one token.
 *
 * Lookup order: a sub-description opened earlier on the line, then exact,
 * range and wildcard dictionary entries, then the built-in description of
 * special tokens. Anything left gets `"Unknown code: <code>"`.
 *
 * @param token - Token to describe
 * @param context - Modal context in effect on the token's line
 * @param dictionary - Entries in declared order, or a compiled dictionary
 * @param scope - Sub-descriptions opened by an earlier token on the line
 *
 * @example
 * ```typescript
 * const dictionary = compileDictionary([
 *   { letter: "X", pattern: { kind: "wildcard" }, description: "X axis" },
 * ]);
 * const line = tokenize("G90 X10");
 * const { context } = applyModalLine(line, createModalContext());
 * annotate(line.tokens[1], context, dictionary).description;
 * // "X axis = 10 (undefined motion mode, absolute)"
 * ```
 */
export function annotate(
  token: Token,
  context: ModalContext,
  dictionary: CompiledDictionary | readonly ProfileDictionaryEntry[],
  scope?: LineScope
): AnnotationResult {
  if (token.kind === TokenKind.UNKNOWN || token.letter === "unknown") {
    return fixed(token, `${UNKNOWN_CODE_PREFIX}${token.rawText}`, AnnotationSource.UNKNOWN);
  }

  if (token.kind === TokenKind.WORD && scope) {
    const sub = scope[token.letter];
    if (typeof sub === "string") {
      return describe(token, context, sub, AnnotationSource.LINE_SCOPE);
    }
  }

  const compiled = dictionary instanceof CompiledDictionary ? dictionary : compileDictionary(dictionary);
  const rule = compiled.match(token.letter, token.value);
  if (rule) {
    return describe(token, context, rule.entry.description, rule.specificity, rule.entry);
  }

  const builtin = builtinDescription(token);
  if (builtin !== undefined) {
    return fixed(token, builtin, AnnotationSource.BUILTIN);
  }

  return fixed(token, `${UNKNOWN_CODE_PREFIX}${formatCode(token)}`, AnnotationSource.UNKNOWN);
}
