/**
 * Health Module - Outlier Detection
 *
 * Optional z-score detector plugged into predictive scoring. The most
 * recent readings are compared against the window that precedes them.
 */
import type { HistoryPoint } from "./schema.js";

export type OutlierReport = Readonly<{
  inspected: number;
  anomalies: number;
}>;

/**
 * Inspects chronologically ordered history. Returns null when there is
 * not enough history to judge.
 */
export type OutlierDetector = (history: readonly HistoryPoint[]) => OutlierReport | null;

export type ZScoreOptions = Readonly<{
  minSamples: number;
  recent: number;
  threshold: number;
  metrics: ReadonlyArray<keyof HistoryPoint>;
}>;

export const DEFAULT_ZSCORE_OPTIONS: ZScoreOptions = {
  minSamples: 20,
  recent: 5,
  threshold: 3,
  metrics: ["current", "voltage", "rpm", "motorTemp", "ambientTemp"],
};

/** Anomalous readings among the inspected ones that cost the predictive score. */
export const ANOMALY_COUNT_THRESHOLD = 3;
export const ANOMALY_DEDUCTION = 40;

type Baseline = Readonly<{ mean: number; std: number }>;

function baselineOf(values: readonly number[]): Baseline | null {
  if (values.length < 2) return null;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  const std = Math.sqrt(variance);
  return std > 0 ? { mean, std } : null;
}

/**
 * Build a detector flagging a reading when any metric's |z| exceeds the
 * threshold against the baseline window.
 */
export function createZScoreDetector(
  options: ZScoreOptions = DEFAULT_ZSCORE_OPTIONS,
): OutlierDetector {
  return (history) => {
    if (history.length < options.minSamples) {
      return null;
    }

    const baselineRows = history.slice(0, -options.recent);
    const recentRows = history.slice(-options.recent);

    const baselines = new Map<keyof HistoryPoint, Baseline>();
    for (const metric of options.metrics) {
      const values = baselineRows
        .map((row) => row[metric])
        .filter((value): value is number => value !== null);
      const baseline = baselineOf(values);
      if (baseline) baselines.set(metric, baseline);
    }

    const anomalies = recentRows.filter((row) =>
      [...baselines].some(([metric, { mean, std }]) => {
        const value = row[metric];
        return value !== null && Math.abs((value - mean) / std) > options.threshold;
      }),
    ).length;

    return { inspected: recentRows.length, anomalies };
  };
}
