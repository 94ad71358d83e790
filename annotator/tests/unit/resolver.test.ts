import { annotate, compileDictionary, CompiledDictionary } from "../../src/ts/resolver";
import { applyModalLine, createModalContext } from "../../src/ts/modalState";
import { tokenize } from "../../src/ts/tokenizer";
import {
  AnnotationResult,
  AnnotationSource,
  ModalContext,
  ModalGroup,
  ProfileDictionaryEntry,
  ValuePattern,
} from "@gcode-annotator/types";

// ============================================================================
// Test Helpers
// ============================================================================

const exact = (value: number): ValuePattern => ({ kind: "exact", value });
const range = (min: number, max: number): ValuePattern => ({ kind: "range", min, max });
const wildcard: ValuePattern = { kind: "wildcard" };

/**
 * Tokenize `lines` top to bottom and annotate every token of the last one.
 */
function annotateLast(
  dictionary: CompiledDictionary | readonly ProfileDictionaryEntry[],
  ...lines: string[]
): AnnotationResult[] {
  let context: ModalContext = createModalContext();
  let results: AnnotationResult[] = [];
  lines.forEach((text, index) => {
    const line = tokenize(text, index + 1);
    context = applyModalLine(line, context).context;
    results = line.tokens.map((token) => annotate(token, context, dictionary));
  });
  return results;
}

const descriptions = (results: AnnotationResult[]): string[] => results.map((r) => r.description);

const AXES: ProfileDictionaryEntry[] = [
  { letter: "G", pattern: exact(1), description: "Linear move" },
  { letter: "G", pattern: exact(90), description: "Absolute positioning" },
  { letter: "X", pattern: wildcard, description: "X axis" },
];

// ============================================================================
// Tests
// ============================================================================

describe("annotate", () => {
  // --------------------------------------------------------------------------
  // Unknown codes
  // --------------------------------------------------------------------------

  describe("unknown codes", () => {
    it("should describe a code missing from the dictionary as unknown and keep going", () => {
      const results = annotateLast(AXES, "G200 X1");

      expect(results[0]).toMatchObject({
        description: "Unknown code: G200",
        source: AnnotationSource.UNKNOWN,
        isModalCarry: false,
        context: [],
      });
      expect(results[1].description).toBe(
        "X axis = 1 (undefined motion mode, undefined positioning mode)"
      );
    });

    it("should upper-case the letter of an unknown word", () => {
      expect(descriptions(annotateLast(AXES, "g200"))).toEqual(["Unknown code: G200"]);
    });

    it("should describe malformed fragments by their raw text", () => {
      expect(descriptions(annotateLast(AXES, "X1.2.3"))).toEqual(["Unknown code: X1.2.3"]);
    });

    it("should describe everything as unknown with an empty dictionary", () => {
      expect(descriptions(annotateLast([], "G1 X1"))).toEqual([
        "Unknown code: G1",
        "Unknown code: X1",
      ]);
    });
  });

  // --------------------------------------------------------------------------
  // Specificity
  // --------------------------------------------------------------------------

  describe("specificity", () => {
    it("should prefer an exact entry over a wildcard declared before it", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "F", pattern: wildcard, description: "Feed rate" },
        { letter: "F", pattern: exact(100), description: "Standard feed" },
      ];

      const [f100] = annotateLast(dictionary, "F100");
      const [f250] = annotateLast(dictionary, "F250");

      expect(f100).toMatchObject({ description: "Standard feed", source: AnnotationSource.EXACT });
      expect(f250).toMatchObject({ description: "Feed rate = 250", source: AnnotationSource.WILDCARD });
    });

    it("should prefer a range over a wildcard and include both bounds", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "S", pattern: wildcard, description: "Spindle speed" },
        { letter: "S", pattern: range(0, 1000), description: "Low spindle speed" },
      ];

      expect(descriptions(annotateLast(dictionary, "S500 S1000 S1500"))).toEqual([
        "Low spindle speed = 500",
        "Low spindle speed = 1000",
        "Spindle speed = 1500",
      ]);
    });

    it("should let the first declared entry win among duplicate exact entries", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "G", pattern: exact(1), description: "First" },
        { letter: "G", pattern: exact(1), description: "Second" },
      ];

      const [result] = annotateLast(dictionary, "G1");

      expect(result.description).toBe("First");
      expect(result.entry).toEqual(dictionary[0]);
    });

    it("should let the first declared entry win among overlapping ranges", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "M", pattern: range(0, 10), description: "Low" },
        { letter: "M", pattern: range(5, 15), description: "High" },
      ];

      expect(descriptions(annotateLast(dictionary, "M7 M12"))).toEqual(["Low = 7", "High = 12"]);
    });

    it("should match exact values numerically", () => {
      expect(descriptions(annotateLast(AXES, "G01"))).toEqual(["Linear move"]);
    });
  });

  // --------------------------------------------------------------------------
  // Modal context
  // --------------------------------------------------------------------------

  describe("modal context", () => {
    it("should use a positioning mode inherited from an earlier line", () => {
      const [x] = annotateLast(AXES, "G90", "X10");

      expect(x.description).toBe("X axis = 10 (undefined motion mode, absolute)");
      expect(x.isModalCarry).toBe(true);
      expect(x.context).toEqual([
        { group: ModalGroup.MOTION, state: { status: "unset" }, inherited: false },
        {
          group: ModalGroup.POSITIONING,
          state: { status: "set", code: "G90", value: 90, label: "absolute", lineNumber: 1 },
          inherited: true,
        },
      ]);
    });

    it("should not mark context set on the same line as carried", () => {
      const [, , x] = annotateLast(AXES, "G90 G1 X10");

      expect(x.description).toBe("X axis = 10 (linear feed, absolute)");
      expect(x.isModalCarry).toBe(false);
    });

    it("should substitute placeholders and append only unreferenced context", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "X", pattern: wildcard, description: "Move X to {value} in {modal.positioning} coordinates" },
      ];

      const [, x] = annotateLast(dictionary, "G91 X5");

      expect(x.description).toBe("Move X to 5 in incremental coordinates (undefined motion mode)");
    });

    it("should substitute an unset group with an explicit undefined", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "Y", pattern: wildcard, description: "Y in {modal.positioning} at {modal.motion}" },
      ];

      expect(descriptions(annotateLast(dictionary, "Y1"))).toEqual([
        "Y in undefined positioning mode at undefined motion mode = 1",
      ]);
    });

    it("should leave unresolvable placeholders as written", () => {
      const dictionary: ProfileDictionaryEntry[] = [{ letter: "P", pattern: wildcard, description: "Dwell {nope}" }];

      expect(descriptions(annotateLast(dictionary, "P2"))).toEqual(["Dwell {nope} = 2"]);
    });

    it("should fill the code and letter placeholders", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "M", pattern: range(100, 199), description: "User command {code} ({letter} word)" },
      ];

      expect(descriptions(annotateLast(dictionary, "M101"))).toEqual(["User command M101 (M word) = 101"]);
    });

    it("should depend on the entry's modal group instead of the defaults", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "F", pattern: wildcard, description: "Feed", modalGroup: ModalGroup.FEED_MODE },
      ];

      const [unset] = annotateLast(dictionary, "F100");
      const [inherited] = annotateLast(dictionary, "G94", "F100");

      expect(unset.description).toBe("Feed = 100 (undefined feed mode)");
      expect(unset.isModalCarry).toBe(false);
      expect(inherited.description).toBe("Feed = 100 (units per minute)");
      expect(inherited.isModalCarry).toBe(true);
    });

    it("should not make a modal code depend on the group it sets", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        {
          letter: "G",
          pattern: exact(90),
          description: "Absolute positioning",
          modalGroup: ModalGroup.POSITIONING,
        },
      ];

      const [result] = annotateLast(dictionary, "G91", "G90");

      expect(result).toMatchObject({ description: "Absolute positioning", isModalCarry: false, context: [] });
    });
  });

  // --------------------------------------------------------------------------
  // Special tokens and line scope
  // --------------------------------------------------------------------------

  describe("special tokens", () => {
    it("should fall back to built-in descriptions", () => {
      expect(descriptions(annotateLast([], "/N10 #100 *45"))).toEqual([
        "Block skip",
        "Unknown code: N10",
        "Macro variable #100 = 100",
        "Checksum = 45",
      ]);
      expect(descriptions(annotateLast([], "%"))).toEqual(["Program start/end marker"]);
    });

    it("should prefer a dictionary entry for a special symbol", () => {
      const dictionary: ProfileDictionaryEntry[] = [{ letter: "%", pattern: wildcard, description: "Program boundary" }];

      expect(annotateLast(dictionary, "%")[0]).toMatchObject({
        description: "Program boundary",
        source: AnnotationSource.WILDCARD,
      });
    });

    it("should keep comma-prefixed words apart from plain words", () => {
      const dictionary: ProfileDictionaryEntry[] = [
        { letter: "R", pattern: wildcard, description: "Radius" },
        { letter: ",R", pattern: wildcard, description: "Corner round" },
      ];

      expect(descriptions(annotateLast(dictionary, "R1 ,R2"))).toEqual(["Radius = 1", "Corner round = 2"]);
    });
  });

  describe("line scope", () => {
    it("should prefer a sub-description opened earlier on the line", () => {
      const dictionary: ProfileDictionaryEntry[] = [{ letter: "R", pattern: wildcard, description: "Radius" }];
      const line = tokenize("G81 R5 Z-2");
      const { context } = applyModalLine(line, createModalContext());
      const scope = { R: "Retract plane", Z: "Hole depth" };

      const r = annotate(line.tokens[1], context, dictionary, scope);
      const z = annotate(line.tokens[2], context, dictionary, scope);

      expect(r).toMatchObject({ description: "Retract plane = 5", source: AnnotationSource.LINE_SCOPE });
      expect(r.entry).toBeUndefined();
      expect(z.description).toBe("Hole depth = -2 (drilling cycle, undefined positioning mode)");
    });
  });

  it("should give the same result for a compiled dictionary and its entries", () => {
    const line = tokenize("G90 X3");
    const { context } = applyModalLine(line, createModalContext());

    expect(annotate(line.tokens[1], context, compileDictionary(AXES))).toEqual(
      annotate(line.tokens[1], context, AXES)
    );
  });
});

describe("CompiledDictionary", () => {
  it("should order rules exact, range, wildcard and then by declaration", () => {
    const compiled = compileDictionary([
      { letter: "G", pattern: wildcard, description: "any" },
      { letter: "G", pattern: range(0, 3), description: "low" },
      { letter: "G", pattern: exact(1), description: "one" },
      { letter: "G", pattern: exact(2), description: "two" },
      { letter: "X", pattern: wildcard, description: "x" },
    ]);

    expect(compiled.rulesFor("G").map((rule) => rule.index)).toEqual([2, 3, 1, 0]);
    expect(compiled.rulesFor("Y")).toEqual([]);
    expect(compiled.size).toBe(5);
  });

  it("should not follow later changes to the entries it was built from", () => {
    const entries: ProfileDictionaryEntry[] = [{ letter: "X", pattern: wildcard, description: "X axis" }];
    const compiled = compileDictionary(entries);

    entries.push({ letter: "Y", pattern: wildcard, description: "Y axis" });
    entries[0].description = "changed";

    expect(compiled.size).toBe(1);
    expect(compiled.match("X", 1)?.entry.description).toBe("X axis");
    expect(compiled.match("Y", 1)).toBeUndefined();
  });

  it("should not match exact or range rules for tokens without a value", () => {
    const compiled = compileDictionary([{ letter: "%", pattern: exact(1), description: "never" }]);

    expect(compiled.match("%", undefined)).toBeUndefined();
  });
});
