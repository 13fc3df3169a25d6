import { describe, expect, it } from "vitest";
import { createTokenSet, substitute } from "../../index.js";

describe("createTokenSet", () => {
  it("stringifies numbers, trims names and drops empty names and undefined values", () => {
    const tokens = createTokenSet([
      [" a ", 1],
      ["", "x"],
      ["b", undefined],
      ["c", null],
    ]);
    expect([...tokens]).toEqual([
      ["a", "1"],
      ["c", null],
    ]);
  });

  it("keeps insertion order and the last value for a repeated name", () => {
    const tokens = createTokenSet([
      ["x", "1"],
      ["y", "2"],
      ["x", "3"],
    ]);
    expect([...tokens]).toEqual([
      ["x", "3"],
      ["y", "2"],
    ]);
  });

  it("accepts records", () => {
    expect([...createTokenSet({ EntityId: 10, Name: "n" })]).toEqual([
      ["EntityId", "10"],
      ["Name", "n"],
    ]);
  });
});

describe("substitute", () => {
  it("replaces known placeholders", () => {
    expect(
      substitute("The Article #EntityId# specified was not found", createTokenSet({ EntityId: "10" })),
    ).toBe("The Article 10 specified was not found");
  });

  it("leaves unknown placeholders verbatim", () => {
    expect(substitute("Hello #Name#, #Other#", createTokenSet({ Name: "Ada" }))).toBe(
      "Hello Ada, #Other#",
    );
  });

  it("ignores tokens without placeholders", () => {
    expect(substitute("static", createTokenSet({ Unused: "x" }))).toBe("static");
  });

  it("substitutes null as empty", () => {
    expect(substitute("a#X#b", createTokenSet({ X: null }))).toBe("ab");
  });

  it("does not rescan substituted values", () => {
    expect(substitute("#A#", createTokenSet({ A: "#B#", B: "x" }))).toBe("#B#");
  });

  it("lets a closing marker open the next placeholder", () => {
    expect(substitute("#a#b#", createTokenSet({ b: "1" }))).toBe("#a1");
  });

  it("is case-sensitive", () => {
    expect(substitute("#EntityId#", createTokenSet({ entityid: "1" }))).toBe("#EntityId#");
  });

  it("never treats an empty name as a placeholder", () => {
    const tokens = new Map([
      ["A", "1"],
      ["", "E"],
    ]);
    expect(substitute("##A## #A#", tokens)).toBe("#1# 1");
  });

  it("keeps a lone marker", () => {
    expect(substitute("50# off", createTokenSet({}))).toBe("50# off");
  });

  describe("#ChildMessage#", () => {
    it("uses the child message", () => {
      expect(substitute("x #ChildMessage#", createTokenSet({}), "child")).toBe("x child");
    });

    it("becomes empty without a child", () => {
      expect(substitute("x #ChildMessage#", createTokenSet({}))).toBe("x ");
    });

    it("prefers a ChildMessage token", () => {
      expect(substitute("x #ChildMessage#", createTokenSet({ ChildMessage: "tok" }), "child")).toBe(
        "x tok",
      );
    });
  });
});
