/**
 * Modal State Types
 */

/**
 * Groups of codes whose effect persists across lines until overridden.
 */
export enum ModalGroup {
  MOTION = "motion",
  PLANE = "plane",
  UNITS = "units",
  POSITIONING = "positioning",
  FEED_MODE = "feedMode",
  COORDINATE_SYSTEM = "coordinateSystem",
  SPINDLE = "spindle",
  TOOL = "tool",
  SPINDLE_SPEED = "spindleSpeed",
  FEED_RATE = "feedRate",
}

export interface UnsetModalState {
  status: "unset";
}

export interface ActiveModalState {
  status: "set";
  /** Code that set the group, e.g. "G90" or "T4" */
  code: string;
  value: number;
  /** Human-readable meaning, e.g. "absolute" */
  label: string;
  /** Line on which the group was last set */
  lineNumber: number;
}

export type ModalState = UnsetModalState | ActiveModalState;

/**
 * Last value set for every modal group, or unset. Treated as an immutable
 * value: applying a line yields a new context.
 */
export type ModalContext = Readonly<Record<ModalGroup, ModalState>>;

/**
 * What the tracker determined for a single token of a line.
 */
export interface TokenModalEffect {
  /** Group this token set, when it is a modal-setting code */
  group?: ModalGroup;
  /**
   * True when the token's explanation relies on a companion context that was
   * inherited from an earlier line rather than set on this one.
   */
  carry: boolean;
}

export interface ModalApplication {
  context: ModalContext;
  /** One entry per token of the line, in token order */
  effects: TokenModalEffect[];
}
