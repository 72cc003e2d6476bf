/**
 * Recommendations Module - Schemas and Types
 */
import { z } from "zod";

export const SeveritySchema = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW"]);
export type Severity = z.infer<typeof SeveritySchema>;

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
};

export const MAX_RECOMMENDATIONS = 10;

/** Sub-scores below this raise a category warning. */
export const SUBSCORE_WARNING_THRESHOLD = 70;

/** Overall scores below this raise a critical alert. */
export const OVERALL_CRITICAL_THRESHOLD = 60;

export const RecommendationSchema = z.object({
  type: z.string(),
  category: z.string(),
  severity: SeveritySchema,
  priority: SeveritySchema,
  title: z.string(),
  description: z.string(),
  action: z.string(),
  confidence: z.number().min(0).max(1),
});

export type Recommendation = z.infer<typeof RecommendationSchema>;

export type Connectivity = Readonly<{
  sensorConnected: boolean;
  controllerConnected: boolean;
}>;
