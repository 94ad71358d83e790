import { filterSnippets, prepareSnippetInsertion } from "../../src/ts/snippets";

const SNIPPETS = {
  "Spindle on": "M3 S1000",
  "Drill cycle": "G81 R2 Z-5 F100\nG80",
  Home: "G0 X0 Y0 Z0\n",
};

describe("filterSnippets", () => {
  it("should list every snippet by name for an empty query", () => {
    expect(filterSnippets(SNIPPETS, "")).toEqual(["Drill cycle", "Home", "Spindle on"]);
  });

  it("should match names ignoring case", () => {
    expect(filterSnippets(SNIPPETS, "HOME")).toEqual(["Home"]);
  });

  it("should match snippet text ignoring case", () => {
    expect(filterSnippets(SNIPPETS, "g81")).toEqual(["Drill cycle"]);
    expect(filterSnippets(SNIPPETS, "x0")).toEqual(["Home"]);
  });

  it("should return nothing when no snippet matches", () => {
    expect(filterSnippets(SNIPPETS, "G43")).toEqual([]);
    expect(filterSnippets({}, "")).toEqual([]);
  });
});

describe("prepareSnippetInsertion", () => {
  it("should end the inserted text with a newline", () => {
    expect(prepareSnippetInsertion("M3 S1000")).toBe("M3 S1000\n");
  });

  it("should not add a second newline", () => {
    expect(prepareSnippetInsertion("G0 X0 Y0 Z0\n")).toBe("G0 X0 Y0 Z0\n");
  });

  it("should insert nothing for an empty snippet", () => {
    expect(prepareSnippetInsertion("")).toBeUndefined();
  });
});
