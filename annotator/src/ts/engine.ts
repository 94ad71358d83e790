import { EventEmitter } from "events";
import isEqual from "fast-deep-equal";
import {
  AnnotationPass,
  AnnotationPassOptions,
  AnnotationProgress,
  AnnotationResult,
  AnnotationSource,
  AsyncAnnotationPassOptions,
  Line,
  LineAnnotation,
  ModalContext,
  ProfileDictionaryEntry,
  TokenBoundary,
} from "@gcode-annotator/types";
import { DEFAULT_BATCH_SIZE, DEFAULT_PROGRESS_UPDATES } from "./constants";
import { summarizeLine } from "./format";
import { applyModalLine, createModalContext } from "./modalState";
import { annotate, compileDictionary, CompiledDictionary, LineScope } from "./resolver";
import { getLineTokenBoundaries, tokenizeDocument } from "./tokenizer";

const DICTIONARY_SOURCES = new Set([
  AnnotationSource.EXACT,
  AnnotationSource.RANGE,
  AnnotationSource.WILDCARD,
]);

/**
 * Run one modal step for a line and describe each of its tokens.
 *
 * A token resolved through the dictionary opens the line scope of its
 * entry's sub-descriptions (or closes it, if the entry has none); tokens
 * resolved through the scope leave it open.
 */
export function annotateLine(
  line: Line,
  context: ModalContext,
  dictionary: CompiledDictionary
): { annotation: LineAnnotation; context: ModalContext } {
  const application = applyModalLine(line, context);
  let scope: LineScope | undefined;

  const results = line.tokens.map((token, index): AnnotationResult => {
    const result = annotate(token, application.context, dictionary, scope);
    if (DICTIONARY_SOURCES.has(result.source)) {
      scope = result.entry?.sub;
    }
    return application.effects[index].carry ? { ...result, isModalCarry: true } : result;
  });

  const annotation: LineAnnotation = {
    lineNumber: line.lineNumber,
    line,
    results,
    warnings: line.warnings,
  };
  if (line.comment !== undefined) annotation.comment = line.comment;

  return { annotation, context: application.context };
}

/**
 * Reports progress roughly `updates` times over `total` lines.
 */
class ProgressReporter {
  private readonly interval: number;

  constructor(
    private readonly total: number,
    updates: number,
    private readonly callback?: (progress: AnnotationProgress) => void
  ) {
    this.interval = updates > 0 ? Math.max(1, Math.ceil(total / updates)) : 0;
  }

  report(processed: number): void {
    if (!this.callback || this.interval === 0) return;
    if (processed % this.interval !== 0 && processed !== this.total) return;

    try {
      this.callback({
        linesProcessed: processed,
        totalLines: this.total,
        percent: this.total > 0 ? Math.round((processed / this.total) * 100) : 100,
      });
    } catch (e) {
      console.error("Error in AnnotationEngine progress callback:", e);
    }
  }
}

/**
 * State of one pass over a document. Bound to the dictionary it was started
 * with; the modal context only ever moves forward from the top.
 */
class AnnotationRun {
  private context: ModalContext = createModalContext();
  private readonly annotations: LineAnnotation[] = [];
  private readonly progress: ProgressReporter;
  private cursor = 0;

  constructor(
    private readonly lines: readonly Line[],
    private readonly dictionary: CompiledDictionary,
    private readonly isCancelled: () => boolean,
    options: AnnotationPassOptions
  ) {
    this.progress = new ProgressReporter(
      lines.length,
      options.progressUpdates ?? DEFAULT_PROGRESS_UPDATES,
      options.onProgress
    );
  }

  get done(): boolean {
    return this.cursor >= this.lines.length;
  }

  /**
   * Process up to `count` lines, checking for cancellation before each one.
   * @returns False if the run was cancelled
   */
  advance(count: number): boolean {
    const stop = Math.min(this.lines.length, this.cursor + count);
    while (this.cursor < stop) {
      if (this.isCancelled()) return false;
      const { annotation, context } = annotateLine(this.lines[this.cursor], this.context, this.dictionary);
      this.annotations.push(annotation);
      this.context = context;
      this.cursor++;
      this.progress.report(this.cursor);
    }
    return true;
  }

  completed(): AnnotationPass {
    return { status: "completed", lines: this.annotations, context: this.context };
  }

  static cancelled(): AnnotationPass {
    return { status: "cancelled", lines: [], context: createModalContext() };
  }
}

const yieldToEventLoop = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

/**
 * Annotation engine for whole documents.
 *
 * Holds the active profile dictionary. Every pass reads the dictionary that
 * was active when it started, so swapping dictionaries during a pass only
 * affects the next one.
 *
 * Emits `dictionaryChange` with the new and previous entries whenever
 * {@link setActiveDictionary} installs a different dictionary.
 *
 * @example
 * ```typescript
 * const engine = new AnnotationEngine(store.lookupEntries("mill"));
 * const annotations = engine.annotateDocument("G90\nG1 X10 F200");
 * annotations[1].map((result) => result.description);
 * ```
 */
export class AnnotationEngine extends EventEmitter {
  private dictionary: CompiledDictionary;

  constructor(entries: readonly ProfileDictionaryEntry[] = []) {
    super();
    this.dictionary = compileDictionary(entries);
  }

  /**
   * Replace the dictionary used by subsequent passes. The new dictionary is
   * compiled first and then swapped in with a single assignment.
   * @param entries Entries in declared order; an empty list is valid
   */
  setActiveDictionary(entries: readonly ProfileDictionaryEntry[]): void {
    if (isEqual(entries, this.dictionary.entries)) return;

    const previous = this.dictionary;
    this.dictionary = compileDictionary(entries);
    this.emit("dictionaryChange", this.dictionary.entries, previous.entries);
  }

  /**
   * Entries of the active dictionary, in declared order.
   */
  getActiveDictionary(): readonly ProfileDictionaryEntry[] {
    return this.dictionary.entries;
  }

  /**
   * Annotate a document, one inner array per source line.
   */
  annotateDocument(rawText: string): AnnotationResult[][] {
    return this.annotateDocumentLines(rawText).lines.map((line) => line.results);
  }

  /**
   * Annotate a document synchronously with cooperative cancellation.
   *
   * `shouldCancel` is polled between lines. A cancelled pass returns no
   * lines at all, so partial results never leak into the next pass.
   */
  annotateDocumentLines(rawText: string, options: AnnotationPassOptions = {}): AnnotationPass {
    const cancel = options.shouldCancel ?? (() => false);
    const run = new AnnotationRun(tokenizeDocument(rawText), this.dictionary, cancel, options);
    return run.advance(Number.POSITIVE_INFINITY) ? run.completed() : AnnotationRun.cancelled();
  }

  /**
   * Annotate a document, yielding to the event loop every `batchSize`
   * lines so edits or a profile switch can be handled mid-pass.
   */
  async annotateDocumentAsync(
    rawText: string,
    options: AsyncAnnotationPassOptions = {}
  ): Promise<AnnotationPass> {
    const { signal, shouldCancel } = options;
    const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    const cancel = (): boolean => (signal?.aborted ?? false) || (shouldCancel?.() ?? false);
    const run = new AnnotationRun(tokenizeDocument(rawText), this.dictionary, cancel, options);

    while (!run.done) {
      if (!run.advance(batchSize)) return AnnotationRun.cancelled();
      if (!run.done) await yieldToEventLoop();
    }
    return run.completed();
  }

  /**
   * One summary string per source line, as shown beside the editor.
   */
  summarizeDocument(rawText: string): string[] {
    return this.annotateDocumentLines(rawText).lines.map(summarizeLine);
  }

  /**
   * Token spans of every line, for highlighting overlays.
   */
  getTokenBoundaries(rawText: string): TokenBoundary[] {
    return tokenizeDocument(rawText).flatMap(getLineTokenBoundaries);
  }
}
