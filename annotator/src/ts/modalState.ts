/**
 * Modal State Tracker
 *
 * Threads the modal context through a document one line at a time. All
 * functions are pure: a context is never mutated, applying a line returns a
 * new one.
 */

import {
  Line,
  ModalApplication,
  ModalContext,
  ModalGroup,
  ModalState,
  TokenModalEffect,
  UnsetModalState,
} from "@gcode-annotator/types";
import { MODAL_GROUP_TITLES } from "./constants";
import { findModalSetting, formatCode, isCoordinateLetter } from "./grammar";

const UNSET: UnsetModalState = Object.freeze({ status: "unset" });

/**
 * Context at the top of a document: every group unset.
 */
export function createModalContext(): ModalContext {
  return Object.freeze({
    [ModalGroup.MOTION]: UNSET,
    [ModalGroup.PLANE]: UNSET,
    [ModalGroup.UNITS]: UNSET,
    [ModalGroup.POSITIONING]: UNSET,
    [ModalGroup.FEED_MODE]: UNSET,
    [ModalGroup.COORDINATE_SYSTEM]: UNSET,
    [ModalGroup.SPINDLE]: UNSET,
    [ModalGroup.TOOL]: UNSET,
    [ModalGroup.SPINDLE_SPEED]: UNSET,
    [ModalGroup.FEED_RATE]: UNSET,
  });
}

/**
 * True when the state was set by a line before `lineNumber`.
 */
export function isInherited(state: ModalState, lineNumber: number): boolean {
  return state.status === "set" && state.lineNumber < lineNumber;
}

/**
 * Label of a modal state, or "undefined <group title>" when nothing has set
 * the group yet.
 */
export function describeModalState(group: ModalGroup, state: ModalState): string {
  return state.status === "set" ? state.label : `undefined ${MODAL_GROUP_TITLES[group]}`;
}

/**
 * Apply one line to the context.
 *
 * Every modal-setting token overwrites its group; when a line sets the same
 * group twice the later token wins. Tokens of the line are meant to be read
 * against the returned context, since a block's modal codes take effect
 * before its motion.
 *
 * A coordinate word on a line without a motion code is flagged as carry when
 * the motion mode it moves under was inherited from an earlier line.
 */
export function applyModalLine(line: Line, context: ModalContext): ModalApplication {
  const next: Record<ModalGroup, ModalState> = { ...context };

  const effects: TokenModalEffect[] = line.tokens.map((token) => {
    const setting = findModalSetting(token);
    if (!setting || token.value === undefined) return { carry: false };

    next[setting.group] = {
      status: "set",
      code: formatCode(token),
      value: token.value,
      label: setting.label,
      lineNumber: line.lineNumber,
    };
    return { group: setting.group, carry: false };
  });

  const motionOnLine = effects.some((effect) => effect.group === ModalGroup.MOTION);
  if (!motionOnLine && isInherited(next[ModalGroup.MOTION], line.lineNumber)) {
    line.tokens.forEach((token, index) => {
      if (isCoordinateLetter(token.letter)) effects[index].carry = true;
    });
  }

  return { context: Object.freeze(next), effects };
}

/**
 * Apply every line in order, returning the context in effect on each line.
 * Always starts from `initial` (a fresh context by default).
 */
export function traceModalContexts(
  lines: readonly Line[],
  initial: ModalContext = createModalContext()
): ModalContext[] {
  const contexts: ModalContext[] = [];
  let context = initial;
  for (const line of lines) {
    context = applyModalLine(line, context).context;
    contexts.push(context);
  }
  return contexts;
}
