/**
 * Health Module - Schemas and Types
 *
 * Threshold tables, motor profile and the shape of a health breakdown.
 * Band tables are evaluated top to bottom; the first matching row wins.
 */
import { z } from "zod";

// =============================================================================
// Inputs
// =============================================================================

/**
 * Latest values the scorer reads from the live snapshot.
 */
export type HealthInput = Readonly<{
  current: number | null;
  voltage: number | null;
  controllerVoltage: number | null;
  controllerTemp: number | null;
  ambientTempC: number | null;
  humidity: number | null;
  rpm: number | null;
}>;

/**
 * One historical row as seen by trend prediction and outlier detection.
 */
export type HistoryPoint = Readonly<{
  current: number | null;
  voltage: number | null;
  rpm: number | null;
  motorTemp: number | null;
  ambientTemp: number | null;
  overallHealth: number | null;
}>;

// =============================================================================
// Threshold Bands
// =============================================================================

export type Band = Readonly<{
  comparison: "below" | "above";
  limit: number;
  deduction: number;
  label: string;
}>;

export type MetricBands = Readonly<{
  unit: string;
  decimals: number;
  bands: readonly Band[];
}>;

export const VOLTAGE_BANDS: MetricBands = {
  unit: "V",
  decimals: 1,
  bands: [
    { comparison: "below", limit: 20, deduction: 40, label: "Critical undervoltage" },
    { comparison: "below", limit: 22, deduction: 20, label: "Low voltage" },
    { comparison: "above", limit: 28, deduction: 40, label: "Critical overvoltage" },
    { comparison: "above", limit: 26, deduction: 20, label: "High voltage" },
  ],
};

export const CURRENT_BANDS: MetricBands = {
  unit: "A",
  decimals: 1,
  bands: [
    { comparison: "below", limit: 4, deduction: 30, label: "Motor underloaded" },
    { comparison: "above", limit: 12, deduction: 50, label: "Critical overcurrent" },
    { comparison: "above", limit: 9, deduction: 25, label: "Motor overloaded" },
  ],
};

export const MOTOR_TEMP_BANDS: MetricBands = {
  unit: "°C",
  decimals: 1,
  bands: [
    { comparison: "above", limit: 60, deduction: 50, label: "Critical motor temperature" },
    { comparison: "above", limit: 50, deduction: 30, label: "High motor temperature" },
    { comparison: "above", limit: 40, deduction: 15, label: "Elevated motor temperature" },
  ],
};

export const AMBIENT_TEMP_BANDS: MetricBands = {
  unit: "°C",
  decimals: 1,
  bands: [
    { comparison: "above", limit: 35, deduction: 25, label: "Critical ambient temperature" },
    { comparison: "above", limit: 30, deduction: 15, label: "High ambient temperature" },
  ],
};

export const HUMIDITY_BANDS: MetricBands = {
  unit: "%",
  decimals: 1,
  bands: [
    { comparison: "above", limit: 80, deduction: 20, label: "Critical humidity" },
    { comparison: "above", limit: 70, deduction: 10, label: "High humidity" },
    { comparison: "below", limit: 30, deduction: 5, label: "Low humidity" },
  ],
};

export const RPM_BANDS: MetricBands = {
  unit: "",
  decimals: 0,
  bands: [
    { comparison: "below", limit: 2400, deduction: 50, label: "Critical low RPM" },
    { comparison: "below", limit: 2600, deduction: 30, label: "Low RPM" },
    { comparison: "above", limit: 3100, deduction: 50, label: "Critical high RPM" },
    { comparison: "above", limit: 2900, deduction: 30, label: "High RPM" },
  ],
};

// =============================================================================
// Motor Profile and Weights
// =============================================================================

/**
 * Nameplate operating point of the monitored 24V motor.
 */
export const MOTOR_PROFILE = {
  optimalVoltage: 24,
  optimalCurrent: 6.25,
  optimalRpm: 2750,
  /** Relative current deviation from the RPM-expected value. */
  imbalanceTolerance: 0.5,
  imbalanceDeduction: 20,
} as const;

export const SCORE_WEIGHTS = {
  electrical: 0.3,
  thermal: 0.35,
  mechanical: 0.25,
  predictive: 0.1,
} as const;

/** Minimum history rows before trends are evaluated. */
export const MIN_PREDICTIVE_HISTORY = 5;

/** Predictive score when there is not enough history. */
export const NEUTRAL_PREDICTIVE_SCORE = 50;

// =============================================================================
// Health Breakdown
// =============================================================================

export const HealthStatusSchema = z.enum(["Excellent", "Good", "Warning", "Critical"]);
export type HealthStatus = z.infer<typeof HealthStatusSchema>;

export const StatusClassSchema = z.enum(["success", "info", "warning", "danger"]);
export type StatusClass = z.infer<typeof StatusClassSchema>;

export const STATUS_BUCKETS: ReadonlyArray<
  Readonly<{ min: number; status: HealthStatus; statusClass: StatusClass }>
> = [
  { min: 90, status: "Excellent", statusClass: "success" },
  { min: 75, status: "Good", statusClass: "info" },
  { min: 60, status: "Warning", statusClass: "warning" },
];

export const CRITICAL_STATUS = {
  status: "Critical",
  statusClass: "danger",
} as const satisfies Readonly<{ status: HealthStatus; statusClass: StatusClass }>;

export type SubScore = Readonly<{
  score: number;
  issues: readonly string[];
}>;

export type HealthIssues = Readonly<{
  electrical: readonly string[];
  thermal: readonly string[];
  mechanical: readonly string[];
  predictive: readonly string[];
}>;

export type HealthBreakdown = Readonly<{
  electricalHealth: number;
  thermalHealth: number;
  mechanicalHealth: number;
  predictiveHealth: number;
  efficiencyScore: number;
  overallHealth: number;
  status: HealthStatus;
  statusClass: StatusClass;
  issues: HealthIssues;
}>;
