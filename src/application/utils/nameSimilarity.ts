/**
 * Fuzzy string scores on a 0-100 scale. All ratios are indel based: 2 * LCS / (|a| + |b|).
 */

const longestCommonSubsequence = (a: string, b: string): number => {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    for (let j = 1; j <= b.length; j += 1) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
};

const rawRatio = (a: string, b: string): number => {
  const total = a.length + b.length;
  if (total === 0) {
    return 100;
  }

  return (200 * longestCommonSubsequence(a, b)) / total;
};

export const ratio = (a: string, b: string): number => Math.round(rawRatio(a, b));

const rawPartialRatio = (a: string, b: string): number => {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length === 0) {
    return longer.length === 0 ? 100 : 0;
  }

  let best = 0;
  for (let offset = 0; offset + shorter.length <= longer.length; offset += 1) {
    const window = longer.slice(offset, offset + shorter.length);
    best = Math.max(best, rawRatio(shorter, window));
    if (best === 100) {
      break;
    }
  }

  return best;
};

/**
 * Best ratio of the shorter string against every same-length window of the longer one.
 */
export const partialRatio = (a: string, b: string): number =>
  Math.round(rawPartialRatio(a, b));

const tokensOf = (value: string): string[] =>
  value.split(" ").filter(Boolean);

const rawTokenSortRatio = (a: string, b: string): number =>
  rawRatio(tokensOf(a).sort().join(" "), tokensOf(b).sort().join(" "));

export const tokenSortRatio = (a: string, b: string): number =>
  Math.round(rawTokenSortRatio(a, b));

const rawTokenSetRatio = (a: string, b: string): number => {
  const left = new Set(tokensOf(a));
  const right = new Set(tokensOf(b));
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  const shared = [...left].filter((token) => right.has(token)).sort();
  const onlyLeft = [...left].filter((token) => !right.has(token)).sort();
  const onlyRight = [...right].filter((token) => !left.has(token)).sort();

  const base = shared.join(" ");
  const combinedLeft = [base, ...onlyLeft].filter(Boolean).join(" ");
  const combinedRight = [base, ...onlyRight].filter(Boolean).join(" ");

  return Math.max(
    base ? rawRatio(base, combinedLeft) : 0,
    base ? rawRatio(base, combinedRight) : 0,
    rawRatio(combinedLeft, combinedRight),
  );
};

/**
 * Compares the shared token set against each side's full token set, so word order and extra words are tolerated.
 */
export const tokenSetRatio = (a: string, b: string): number =>
  Math.round(rawTokenSetRatio(a, b));

const TOKEN_SCALE = 0.95;

/**
 * Weighted blend of the ratios above. Token scores are discounted and partial scores only count when the lengths differ markedly.
 */
export const weightedRatio = (a: string, b: string): number => {
  if (a.length === 0 || b.length === 0) {
    return 0;
  }

  const base = rawRatio(a, b);
  const lengthRatio =
    Math.max(a.length, b.length) / Math.min(a.length, b.length);

  if (lengthRatio < 1.5) {
    return Math.round(
      Math.max(
        base,
        rawTokenSortRatio(a, b) * TOKEN_SCALE,
        rawTokenSetRatio(a, b) * TOKEN_SCALE,
      ),
    );
  }

  const partialScale = lengthRatio < 8 ? 0.9 : 0.6;
  return Math.round(
    Math.max(
      base,
      rawPartialRatio(a, b) * partialScale,
      rawTokenSetRatio(a, b) * TOKEN_SCALE * partialScale,
    ),
  );
};

/**
 * Classic edit distance with unit insert, delete and substitute costs.
 */
export const levenshteinDistance = (a: string, b: string): number => {
  if (a === b) {
    return 0;
  }
  if (a.length === 0) {
    return b.length;
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    current[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + substitution,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
};
