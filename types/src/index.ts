/**
 * @gcode-annotator/types
 *
 * Shared TypeScript type definitions for the G-code annotation engine and
 * the profile store.
 */

export * from "./token-types";
export * from "./modal-types";
export * from "./dictionary-types";
export * from "./annotation-types";
