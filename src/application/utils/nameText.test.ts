import { describe, expect, it } from "vitest";
import {
  foldPunctuation,
  normalizeEntityName,
  stripFootnoteMarkers,
  toDisplayName,
} from "./nameText";

describe("toDisplayName", () => {
  it("strips trailing footnote references and marks", () => {
    expect(toDisplayName("  Greenfield Foundation(1)(2) ")).toBe("Greenfield Foundation");
    expect(toDisplayName("Jane Doe (1, 2)")).toBe("Jane Doe");
    expect(toDisplayName("Jane Doe*")).toBe("Jane Doe");
    expect(toDisplayName("Jane Doe (3) †")).toBe("Jane Doe");
  });

  it("keeps numbers that are part of the name", () => {
    expect(toDisplayName("Vintage Fund 2020")).toBe("Vintage Fund 2020");
    expect(toDisplayName("Fund (Series 2)")).toBe("Fund (Series 2)");
  });
});

describe("stripFootnoteMarkers", () => {
  it("returns an empty string when only markers remain", () => {
    expect(stripFootnoteMarkers("(1)")).toBe("");
    expect(stripFootnoteMarkers("*")).toBe("");
  });
});

describe("foldPunctuation", () => {
  it("lower-cases and folds punctuation into single spaces", () => {
    expect(foldPunctuation("Smith & Wesson, L.L.C.")).toBe("smith and wesson llc");
    expect(foldPunctuation("O'Brien Capital")).toBe("obrien capital");
  });

  it("strips diacritics and keeps letters from any script", () => {
    expect(foldPunctuation("José Müller")).toBe("jose muller");
    expect(foldPunctuation("王小明")).toBe("王小明");
    expect(foldPunctuation("ガ")).not.toBe(foldPunctuation("カ"));
  });
});

describe("normalizeEntityName", () => {
  it("drops legal suffixes and a leading article", () => {
    expect(normalizeEntityName("Acme Ventures, L.P.")).toBe("acme ventures");
    expect(normalizeEntityName("The Greenfield Foundation")).toBe("greenfield");
    expect(normalizeEntityName("Acme Holdings Trust Inc.")).toBe("acme holdings");
  });

  it("treats spacing and punctuation variants alike", () => {
    expect(normalizeEntityName("ACME  VENTURES LP")).toBe(
      normalizeEntityName("Acme Ventures, L.P."),
    );
  });

  it("folds accented names onto their plain spelling", () => {
    expect(normalizeEntityName("José Müller")).toBe("jose muller");
    expect(normalizeEntityName("Jose Muller")).toBe(normalizeEntityName("José Müller"));
  });

  it("never strips a name down to nothing", () => {
    expect(normalizeEntityName("Foundation")).toBe("foundation");
    expect(normalizeEntityName("The")).toBe("the");
    expect(normalizeEntityName("")).toBe("");
  });
});
