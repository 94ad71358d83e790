/**
 * Annotation Types
 *
 * Output of the resolver and of document passes, consumed by the
 * presentation layer. Nothing here is persisted.
 */

import type { Line, LineWarning, Token } from "./token-types";
import type { ModalContext, ModalGroup, ModalState } from "./modal-types";
import type { ProfileDictionaryEntry } from "./dictionary-types";

// ============================================================================
// Enums
// ============================================================================

/**
 * Where a description came from.
 */
export enum AnnotationSource {
  /** Exact letter+value entry */
  EXACT = 1,
  /** Letter+range entry */
  RANGE = 2,
  /** Letter wildcard entry */
  WILDCARD = 3,
  /** Sub-description opened by an earlier token on the same line */
  LINE_SCOPE = 4,
  /** Built-in description of a special token */
  BUILTIN = 5,
  /** No match; description is the unknown-code placeholder */
  UNKNOWN = 6,
}

// ============================================================================
// Results
// ============================================================================

/**
 * A modal group a description depended on.
 */
export interface ContextUse {
  group: ModalGroup;
  state: ModalState;
  /** True when the state was set on an earlier line */
  inherited: boolean;
}

export interface AnnotationResult {
  token: Token;
  description: string;
  /** True if the explanation reflects a value inherited from the context */
  isModalCarry: boolean;
  source: AnnotationSource;
  context: ContextUse[];
  /** Dictionary entry that produced the description, when one matched */
  entry?: ProfileDictionaryEntry;
}

/**
 * All annotations for one source line.
 */
export interface LineAnnotation {
  lineNumber: number;
  line: Line;
  results: AnnotationResult[];
  comment?: string;
  warnings: readonly LineWarning[];
}

// ============================================================================
// Document Passes
// ============================================================================

/**
 * Progress information reported during a document pass.
 */
export interface AnnotationProgress {
  linesProcessed: number;
  totalLines: number;
  /** Percentage complete (0-100) */
  percent: number;
}

/**
 * Options for a synchronous document pass.
 */
export interface AnnotationPassOptions {
  /** Polled between lines; returning true cancels the pass */
  shouldCancel?: () => boolean;
  /** Progress callback, called periodically during the pass */
  onProgress?: (progress: AnnotationProgress) => void;
  /**
   * Target number of progress updates during the pass.
   * Set to 0 to disable progress callbacks entirely.
   * @default 40
   */
  progressUpdates?: number;
}

/**
 * Options for a document pass that yields to the event loop between batches.
 */
export interface AsyncAnnotationPassOptions extends AnnotationPassOptions {
  signal?: AbortSignal;
  /**
   * Lines processed between yields.
   * @default 500
   */
  batchSize?: number;
}

export type AnnotationPassStatus = "completed" | "cancelled";

/**
 * Result of a document pass. A cancelled pass carries no lines.
 */
export interface AnnotationPass {
  status: AnnotationPassStatus;
  lines: LineAnnotation[];
  /** Context after the last line; a fresh context when cancelled */
  context: ModalContext;
}
