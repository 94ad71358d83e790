/**
 * @gcode-annotator/annotator
 *
 * Line-by-line G-code annotation engine. Tokenizes each line, tracks modal
 * state from the top of the document down and describes every token using
 * a profile dictionary.
 */

// Export all types (re-exported from @gcode-annotator/types)
export * from "@gcode-annotator/types";

// Export constants
export * from "./constants";

export {
  isWordLetter,
  isModalGroup,
  parseNumber,
  formatCode,
  findModalSetting,
  getModalCodes,
  defaultDependencies,
  isCoordinateLetter,
  ModalCodeDefinition,
  ModalSetting,
} from "./grammar";
export {
  tokenize,
  tokenizeDocument,
  reconstructLine,
  getLineTokenBoundaries,
} from "./tokenizer";
export {
  createModalContext,
  applyModalLine,
  traceModalContexts,
  describeModalState,
  isInherited,
} from "./modalState";
export {
  annotate,
  compileDictionary,
  CompiledDictionary,
  DictionaryRule,
  LineScope,
} from "./resolver";
export { annotateLine, AnnotationEngine } from "./engine";
export { summarizeLine } from "./format";
