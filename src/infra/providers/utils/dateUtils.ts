/**
 * `YYYY-MM-DD` in UTC, the form EDGAR search parameters and filing dates use.
 */
export const toIsoDate = (value: Date): string =>
  value.toISOString().slice(0, 10);
