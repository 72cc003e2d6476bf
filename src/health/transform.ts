/**
 * Health Module - Pure Transformations
 *
 * Sub-scores start at 100, lose fixed deductions per threshold band and
 * are clamped to [0, 100]. The overall score is a weighted sum of the
 * four sub-scores.
 */
import {
  ANOMALY_COUNT_THRESHOLD,
  ANOMALY_DEDUCTION,
  type OutlierDetector,
} from "./outlier.js";
import {
  AMBIENT_TEMP_BANDS,
  CRITICAL_STATUS,
  CURRENT_BANDS,
  type HealthBreakdown,
  type HealthInput,
  type HealthStatus,
  type HistoryPoint,
  HUMIDITY_BANDS,
  MIN_PREDICTIVE_HISTORY,
  MOTOR_PROFILE,
  MOTOR_TEMP_BANDS,
  type MetricBands,
  NEUTRAL_PREDICTIVE_SCORE,
  RPM_BANDS,
  SCORE_WEIGHTS,
  STATUS_BUCKETS,
  type StatusClass,
  type SubScore,
  VOLTAGE_BANDS,
} from "./schema.js";
import { TREND_RULES, evaluateTrend } from "./trend.js";

// =============================================================================
// Helpers
// =============================================================================

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

export function roundScore(score: number): number {
  return Math.round(score * 10) / 10;
}

type BandHit = Readonly<{ deduction: number; issue: string }>;

/**
 * Find the first band the value falls into.
 */
export function applyBands(value: number, metric: MetricBands): BandHit | null {
  const band = metric.bands.find((row) =>
    row.comparison === "below" ? value < row.limit : value > row.limit,
  );
  if (!band) {
    return null;
  }
  return {
    deduction: band.deduction,
    issue: `${band.label}: ${value.toFixed(metric.decimals)}${metric.unit}`,
  };
}

/**
 * Run every (value, bands) pair against a starting score of 100.
 */
function scoreBands(
  checks: ReadonlyArray<readonly [number | null, MetricBands]>,
): { score: number; issues: string[] } {
  let score = 100;
  const issues: string[] = [];

  for (const [value, metric] of checks) {
    if (value === null) continue;
    const hit = applyBands(value, metric);
    if (hit) {
      score -= hit.deduction;
      issues.push(hit.issue);
    }
  }

  return { score, issues };
}

/**
 * Sensor voltage, falling back to the controller's reading.
 */
export function effectiveVoltage(input: HealthInput): number | null {
  return input.voltage ?? input.controllerVoltage;
}

// =============================================================================
// Sub-scores
// =============================================================================

export function scoreElectrical(input: HealthInput): SubScore {
  const voltage = effectiveVoltage(input);
  if (voltage === null && input.current === null) {
    return { score: 0, issues: ["No electrical data available"] };
  }

  const { score, issues } = scoreBands([
    [voltage, VOLTAGE_BANDS],
    [input.current, CURRENT_BANDS],
  ]);
  return { score: clampScore(score), issues };
}

export function scoreThermal(input: HealthInput): SubScore {
  if (input.controllerTemp === null && input.ambientTempC === null) {
    return { score: 0, issues: ["No thermal data available"] };
  }

  const { score, issues } = scoreBands([
    [input.controllerTemp, MOTOR_TEMP_BANDS],
    [input.ambientTempC, AMBIENT_TEMP_BANDS],
    [input.humidity, HUMIDITY_BANDS],
  ]);
  return { score: clampScore(score), issues };
}

export function scoreMechanical(input: HealthInput): SubScore {
  const { rpm, current } = input;
  if (rpm === null) {
    return { score: 0, issues: ["No RPM data available"] };
  }

  let { score, issues } = scoreBands([[rpm, RPM_BANDS]]);

  // Load balance: current should track RPM linearly around the operating point
  if (current !== null && rpm > 0) {
    const expected = (rpm / MOTOR_PROFILE.optimalRpm) * MOTOR_PROFILE.optimalCurrent;
    const deviation = Math.abs(current - expected) / expected;
    if (deviation > MOTOR_PROFILE.imbalanceTolerance) {
      score -= MOTOR_PROFILE.imbalanceDeduction;
      issues = [...issues, "Current/RPM imbalance detected"];
    }
  }

  return { score: clampScore(score), issues };
}

/**
 * Trend-based score over history ordered oldest to newest.
 */
export function scorePredictive(
  history: readonly HistoryPoint[],
  detector?: OutlierDetector,
): SubScore {
  if (history.length < MIN_PREDICTIVE_HISTORY) {
    return {
      score: NEUTRAL_PREDICTIVE_SCORE,
      issues: ["Insufficient data for prediction"],
    };
  }

  let score = 100;
  const issues: string[] = [];

  for (const rule of TREND_RULES) {
    const outcome = evaluateTrend(history, rule.metric, rule.window);
    switch (outcome.kind) {
      case "insufficient-data":
        break;
      case "computation-error":
        issues.push(`Trend analysis unavailable for ${rule.metric}: ${outcome.message}`);
        break;
      case "trend":
        if (rule.breached(outcome.slope)) {
          score -= rule.deduction;
          issues.push(rule.describe(outcome.slope));
        }
        break;
    }
  }

  const report = detector?.(history) ?? null;
  if (report && report.anomalies >= ANOMALY_COUNT_THRESHOLD) {
    score -= ANOMALY_DEDUCTION;
    issues.push(
      `Multiple anomalies detected (${report.anomalies}/${report.inspected} recent readings)`,
    );
  }

  return { score: clampScore(score), issues };
}

/**
 * Closeness to nameplate speed and power, averaged. 0 unless voltage,
 * current and RPM are all present and non-zero.
 */
export function scoreEfficiency(input: HealthInput): number {
  const voltage = effectiveVoltage(input);
  const { current, rpm } = input;
  if (!voltage || !current || !rpm) {
    return 0;
  }

  const rpmEfficiency = Math.min(100, (rpm / MOTOR_PROFILE.optimalRpm) * 100);

  const actualPowerKw = (voltage * current) / 1000;
  const ratedPowerKw =
    (MOTOR_PROFILE.optimalVoltage * MOTOR_PROFILE.optimalCurrent) / 1000;
  const powerEfficiency =
    actualPowerKw > 0 ? Math.min(100, (ratedPowerKw / actualPowerKw) * 100) : 0;

  return clampScore((rpmEfficiency + powerEfficiency) / 2);
}

// =============================================================================
// Overall
// =============================================================================

export function weightedOverall(scores: {
  electrical: number;
  thermal: number;
  mechanical: number;
  predictive: number;
}): number {
  return clampScore(
    scores.electrical * SCORE_WEIGHTS.electrical +
      scores.thermal * SCORE_WEIGHTS.thermal +
      scores.mechanical * SCORE_WEIGHTS.mechanical +
      scores.predictive * SCORE_WEIGHTS.predictive,
  );
}

export function classifyStatus(overall: number): {
  status: HealthStatus;
  statusClass: StatusClass;
} {
  const bucket = STATUS_BUCKETS.find((row) => overall >= row.min);
  return bucket
    ? { status: bucket.status, statusClass: bucket.statusClass }
    : { ...CRITICAL_STATUS };
}

/**
 * Full health breakdown for the current snapshot.
 *
 * @param history - Recent readings, oldest first
 */
export function computeHealth(
  input: HealthInput,
  history: readonly HistoryPoint[],
  detector?: OutlierDetector,
): HealthBreakdown {
  const electrical = scoreElectrical(input);
  const thermal = scoreThermal(input);
  const mechanical = scoreMechanical(input);
  const predictive = scorePredictive(history, detector);

  const overall = weightedOverall({
    electrical: electrical.score,
    thermal: thermal.score,
    mechanical: mechanical.score,
    predictive: predictive.score,
  });

  // Status is bucketed on the unrounded score
  const { status, statusClass } = classifyStatus(overall);

  return {
    electricalHealth: roundScore(electrical.score),
    thermalHealth: roundScore(thermal.score),
    mechanicalHealth: roundScore(mechanical.score),
    predictiveHealth: roundScore(predictive.score),
    efficiencyScore: roundScore(scoreEfficiency(input)),
    overallHealth: roundScore(overall),
    status,
    statusClass,
    issues: {
      electrical: electrical.issues,
      thermal: thermal.issues,
      mechanical: mechanical.issues,
      predictive: predictive.issues,
    },
  };
}
