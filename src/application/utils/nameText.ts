const TRAILING_FOOTNOTES = /(?:\s*\(\s*\d+(?:\s*,\s*\d+)*\s*\))+\s*$/;
const TRAILING_MARKS = /[\s*†‡]+$/;

/**
 * Legal suffixes removed from the end of a name for matching. Compared after punctuation folding, so `L.P.` arrives as `lp`.
 */
export const LEGAL_SUFFIXES: ReadonlySet<string> = new Set([
  "llc",
  "lp",
  "llp",
  "lllp",
  "inc",
  "incorporated",
  "corp",
  "corporation",
  "co",
  "company",
  "ltd",
  "limited",
  "plc",
  "trust",
  "foundation",
  "nv",
  "sa",
  "ag",
  "gmbh",
]);

export const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Removes trailing footnote references such as `(1)`, `(1)(2)`, `(1, 2)` and `*`.
 */
export const stripFootnoteMarkers = (value: string): string => {
  let current = value;
  let previous = "";

  while (current !== previous) {
    previous = current;
    current = current.replace(TRAILING_FOOTNOTES, "").replace(TRAILING_MARKS, "");
  }

  return current;
};

export const toDisplayName = (raw: string): string =>
  collapseWhitespace(stripFootnoteMarkers(collapseWhitespace(raw)));

/**
 * Lower-cases, strips accents from Latin letters, drops periods and turns remaining punctuation into spaces:
 * `Acme Ventures, L.P.` becomes `acme ventures lp` and `José Müller` becomes `jose muller`.
 * Letters and digits of any script are kept.
 */
export const foldPunctuation = (value: string): string =>
  collapseWhitespace(
    value
      .normalize("NFKD")
      .replace(/(\p{Script=Latin})\p{M}+/gu, "$1")
      .normalize("NFC")
      .toLowerCase()
      .replace(/[’']/g, "")
      .replace(/&/g, " and ")
      .replace(/\./g, "")
      .replace(/[^\p{L}\p{M}\p{N}]+/gu, " "),
  );

export const foldedTokens = (value: string): string[] =>
  foldPunctuation(value).split(" ").filter(Boolean);

/**
 * Canonical matching form: folded punctuation, no leading article and no trailing legal suffixes. Never returns an empty string for a non-empty name.
 */
export const normalizeEntityName = (raw: string): string => {
  const tokens = foldedTokens(toDisplayName(raw));
  if (tokens.length === 0) {
    return "";
  }

  let start = 0;
  if (tokens[0] === "the" && tokens.length > 1) {
    start = 1;
  }

  let end = tokens.length;
  while (end - start > 1 && LEGAL_SUFFIXES.has(tokens[end - 1] ?? "")) {
    end -= 1;
  }

  return tokens.slice(start, end).join(" ");
};
