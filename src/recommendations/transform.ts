/**
 * Recommendations Module - Pure Transformations
 *
 * Independent rules over the latest health breakdown and device
 * connectivity, ranked by priority.
 */
import type { HealthBreakdown } from "../health/index.js";
import {
  type Connectivity,
  MAX_RECOMMENDATIONS,
  OVERALL_CRITICAL_THRESHOLD,
  type Recommendation,
  SEVERITY_RANK,
  SUBSCORE_WARNING_THRESHOLD,
} from "./schema.js";

// =============================================================================
// Rules
// =============================================================================

function connectionRecommendations(connectivity: Connectivity): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (!connectivity.sensorConnected) {
    recommendations.push({
      type: "Connection Alert",
      category: "System",
      severity: "HIGH",
      priority: "HIGH",
      title: "Sensor Module Disconnected",
      description: "Sensor module not responding",
      action: "Check sensor module power and network connectivity",
      confidence: 1.0,
    });
  }

  if (!connectivity.controllerConnected) {
    recommendations.push({
      type: "Connection Alert",
      category: "System",
      severity: "HIGH",
      priority: "HIGH",
      title: "Controller Disconnected",
      description: "Controller not responding to register reads",
      action: "Check controller network and MC protocol settings",
      confidence: 1.0,
    });
  }

  return recommendations;
}

function healthRecommendations(health: HealthBreakdown): Recommendation[] {
  const recommendations: Recommendation[] = [];

  if (health.overallHealth < OVERALL_CRITICAL_THRESHOLD) {
    recommendations.push({
      type: "Critical Alert",
      category: "Health",
      severity: "CRITICAL",
      priority: "CRITICAL",
      title: "Motor Health Critical",
      description: `Overall health: ${health.overallHealth}% - Immediate attention required`,
      action: "Stop motor and perform immediate inspection",
      confidence: 0.95,
    });
  }

  if (health.electricalHealth < SUBSCORE_WARNING_THRESHOLD) {
    recommendations.push({
      type: "Electrical Warning",
      category: "Electrical",
      severity: "MEDIUM",
      priority: "MEDIUM",
      title: "Electrical System Issues",
      description: "Voltage or current outside optimal range",
      action: "Check 24V motor connections and measure with a multimeter",
      confidence: 0.8,
    });
  }

  if (health.thermalHealth < SUBSCORE_WARNING_THRESHOLD) {
    recommendations.push({
      type: "Temperature Warning",
      category: "Thermal",
      severity: "MEDIUM",
      priority: "MEDIUM",
      title: "Thermal Issues",
      description: "Temperature above optimal levels",
      action: "Improve ventilation and check cooling system",
      confidence: 0.85,
    });
  }

  if (health.mechanicalHealth < SUBSCORE_WARNING_THRESHOLD) {
    recommendations.push({
      type: "Mechanical Warning",
      category: "Mechanical",
      severity: "MEDIUM",
      priority: "MEDIUM",
      title: "Mechanical Issues",
      description: "RPM or load outside optimal range",
      action: "Inspect bearings and check coupling alignment",
      confidence: 0.8,
    });
  }

  return recommendations;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Stable sort, highest priority first. Equal priorities keep rule order.
 */
export function rankRecommendations(
  recommendations: readonly Recommendation[],
): Recommendation[] {
  return recommendations
    .map((recommendation, index) => ({ recommendation, index }))
    .sort(
      (a, b) =>
        SEVERITY_RANK[b.recommendation.priority] -
          SEVERITY_RANK[a.recommendation.priority] || a.index - b.index,
    )
    .map(({ recommendation }) => recommendation)
    .slice(0, MAX_RECOMMENDATIONS);
}

/**
 * Generate ranked recommendations. Without a health breakdown only the
 * connection rules apply.
 */
export function generateRecommendations(
  health: HealthBreakdown | null,
  connectivity: Connectivity,
): Recommendation[] {
  return rankRecommendations([
    ...connectionRecommendations(connectivity),
    ...(health ? healthRecommendations(health) : []),
  ]);
}
