import { LineAnnotation } from "@gcode-annotator/types";

const COMMENT_PREFIX = "Comment - ";

/**
 * Single-line summary of a line's annotations: descriptions joined by
 * ", ", followed by the line's comment. Blank lines summarize to "".
 */
export function summarizeLine(annotation: LineAnnotation): string {
  if (annotation.line.text.trim() === "") return "";

  const parts = annotation.results.map((result) => result.description);
  if (annotation.comment) {
    parts.push(`${COMMENT_PREFIX}${annotation.comment}`);
  }
  return parts.join(", ");
}
