/**
 * Health Module - Trend Analysis
 *
 * Least-squares slope over the trailing window of a metric. Each
 * evaluation returns an explicit outcome; nothing here throws.
 */
import type { HistoryPoint } from "./schema.js";

export type TrendOutcome =
  | { readonly kind: "trend"; readonly slope: number; readonly samples: number }
  | {
      readonly kind: "insufficient-data";
      readonly samples: number;
      readonly required: number;
    }
  | { readonly kind: "computation-error"; readonly message: string };

export type TrendMetric = "motorTemp" | "current" | "overallHealth";

export type TrendRule = Readonly<{
  metric: TrendMetric;
  window: number;
  deduction: number;
  breached: (slope: number) => boolean;
  describe: (slope: number) => string;
}>;

export const TREND_RULES: readonly TrendRule[] = [
  {
    metric: "motorTemp",
    window: 10,
    deduction: 30,
    breached: (slope) => slope > 1.0,
    describe: (slope) => `Rising temperature trend: +${slope.toFixed(1)}°C/reading`,
  },
  {
    metric: "current",
    window: 10,
    deduction: 25,
    breached: (slope) => Math.abs(slope) > 0.5,
    describe: (slope) => `Current instability: ±${Math.abs(slope).toFixed(1)}A/reading`,
  },
  {
    metric: "overallHealth",
    window: 20,
    deduction: 35,
    breached: (slope) => slope < -1.0,
    describe: (slope) => `Health degradation: ${slope.toFixed(1)} points/reading`,
  },
];

/**
 * Slope of the least-squares line through (i, values[i]).
 */
export function leastSquaresSlope(values: readonly number[]): TrendOutcome {
  const n = values.length;
  if (n < 2) {
    return { kind: "computation-error", message: `Need at least 2 samples, got ${n}` };
  }

  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;

  let numerator = 0;
  let denominator = 0;
  values.forEach((y, x) => {
    numerator += (x - meanX) * (y - meanY);
    denominator += (x - meanX) ** 2;
  });

  const slope = numerator / denominator;
  if (!Number.isFinite(slope)) {
    return { kind: "computation-error", message: "Slope is not finite" };
  }

  return { kind: "trend", slope, samples: n };
}

/**
 * Evaluate the trend of one metric over chronologically ordered history.
 *
 * Missing values are dropped before the trailing window is taken; at
 * least half the window must remain.
 */
export function evaluateTrend(
  history: readonly HistoryPoint[],
  metric: TrendMetric,
  window: number,
): TrendOutcome {
  const series = history
    .map((point) => point[metric])
    .filter((value): value is number => value !== null && Number.isFinite(value))
    .slice(-window);

  const required = Math.ceil(window / 2);
  if (series.length < required) {
    return { kind: "insufficient-data", samples: series.length, required };
  }

  return leastSquaresSlope(series);
}
