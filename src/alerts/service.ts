/**
 * Alerts Module - Service Layer
 *
 * Promotes high-severity recommendations to persisted alerts, skipping
 * a type that already has an open alert inside the dedup window.
 */
import { createLogger } from "../logger.js";
import type { Recommendation } from "../recommendations/index.js";
import { broadcast } from "../sse/index.js";
import {
  type Alert,
  type MonitoringStore,
  type StoreError,
  formatStoreError,
} from "../store/index.js";
import { ALERT_DEDUP_WINDOW_MS, type PromotionSummary } from "./schema.js";
import { isPromotable, toAlertEvent, toNewAlert } from "./transform.js";

const log = createLogger("alerts");

/**
 * Persist and announce every promotable recommendation not already open.
 *
 * Store failures are logged and returned in the summary; the remaining
 * recommendations are still processed.
 */
export async function promoteAlerts(
  recommendations: readonly Recommendation[],
  store: MonitoringStore,
  now: number,
): Promise<PromotionSummary> {
  const raised: Alert[] = [];
  const failures: StoreError[] = [];
  let suppressed = 0;

  for (const recommendation of recommendations.filter(isPromotable)) {
    const existing = await store.findUnacknowledgedAlert(
      recommendation.type,
      now - ALERT_DEDUP_WINDOW_MS,
    );
    if (existing.isErr()) {
      log.error(
        { alertType: recommendation.type, error: formatStoreError(existing.error) },
        "Alert lookup failed",
      );
      failures.push(existing.error);
      continue;
    }
    if (existing.value) {
      log.debug(
        { alertType: recommendation.type, openAlertId: existing.value.id },
        "Alert suppressed, already open",
      );
      suppressed++;
      continue;
    }

    const saved = await store.appendAlert(toNewAlert(recommendation, now));
    if (saved.isErr()) {
      log.error(
        { alertType: recommendation.type, error: formatStoreError(saved.error) },
        "Alert could not be saved",
      );
      failures.push(saved.error);
      continue;
    }

    log.warn(
      { alertId: saved.value.id, alertType: saved.value.type, severity: saved.value.severity },
      "Maintenance alert raised",
    );
    raised.push(saved.value);
    broadcast(toAlertEvent(saved.value));
  }

  return { raised, suppressed, failures };
}
