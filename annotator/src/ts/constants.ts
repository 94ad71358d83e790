import { ModalGroup, WordLetter } from "@gcode-annotator/types";

export const DEFAULT_PROGRESS_UPDATES = 40;
export const DEFAULT_BATCH_SIZE = 500; // lines

/** Prefix of the description given to codes no dictionary entry matches */
export const UNKNOWN_CODE_PREFIX = "Unknown code: ";

export const WORD_LETTERS: ReadonlySet<string> = new Set<WordLetter>([
  "G",
  "M",
  "T",
  "F",
  "S",
  "X",
  "Y",
  "Z",
  "I",
  "J",
  "K",
  "R",
  "Q",
  "N",
  "C",
  "P",
  "A",
  "B",
  "U",
  "V",
  "W",
  "H",
  "D",
  "L",
  "O",
]);

/** Linear and rotary axis words */
export const AXIS_LETTERS: ReadonlySet<WordLetter> = new Set<WordLetter>([
  "X",
  "Y",
  "Z",
  "A",
  "B",
  "C",
  "U",
  "V",
  "W",
]);

/** Arc center offsets */
export const ARC_OFFSET_LETTERS: ReadonlySet<WordLetter> = new Set<WordLetter>([
  "I",
  "J",
  "K",
]);

/** Words that set a modal group with whatever value they carry */
export const VALUE_MODAL_LETTERS: Readonly<Partial<Record<WordLetter, ModalGroup>>> = {
  T: ModalGroup.TOOL,
  S: ModalGroup.SPINDLE_SPEED,
  F: ModalGroup.FEED_RATE,
};

/** Titles used when a group is referenced before anything sets it */
export const MODAL_GROUP_TITLES: Readonly<Record<ModalGroup, string>> = {
  [ModalGroup.MOTION]: "motion mode",
  [ModalGroup.PLANE]: "plane selection",
  [ModalGroup.UNITS]: "units",
  [ModalGroup.POSITIONING]: "positioning mode",
  [ModalGroup.FEED_MODE]: "feed mode",
  [ModalGroup.COORDINATE_SYSTEM]: "coordinate system",
  [ModalGroup.SPINDLE]: "spindle state",
  [ModalGroup.TOOL]: "active tool",
  [ModalGroup.SPINDLE_SPEED]: "spindle speed",
  [ModalGroup.FEED_RATE]: "feed rate",
};

export const BUILTIN_DESCRIPTIONS = {
  parameter: "Macro variable",
  checksum: "Checksum",
  blockDelete: "Block skip",
  programMarker: "Program start/end marker",
} as const;
