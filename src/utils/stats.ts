export const toNum = (x: unknown): number =>
  typeof x === "number" && Number.isFinite(x) ? x : Number(x) || 0;

export const round = (value: number, digits = 1): number => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};

/** Percentage to one decimal; an empty denominator yields 0. */
export const rate = (numerator: number, denominator: number): number =>
  denominator > 0 ? round((numerator / denominator) * 100, 1) : 0;
