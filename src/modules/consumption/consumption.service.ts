import type { HistoryEvent } from '../../connections/db/models/history-event.model';
import { elapsedWholeDays } from '../../utils/timestamp';

// Consumption is projected over a 30-day month
export const DAYS_PER_MONTH = 30;

export interface ConsumptionEstimate {
  product_id: number;
  latest_audit: HistoryEvent;
  previous_audit: HistoryEvent;
  elapsed_days: number;
  purchased_between: number;
  consumed: number;
  monthly_rate: number;
}

/**
 * Nearest tenth of the exact binary value, ties to the even tenth. Only
 * values ending in .25 or .75 sit exactly halfway between two tenths;
 * every other value is settled by `toFixed`, which rounds the exact value.
 */
export const roundToTenth = (value: number): number => {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(value.toFixed(1));
};

/**
 * Two most recent AUDIT events of a product, newest first. Audits sharing a
 * timestamp are ordered by their position in the log.
 */
const latestAudits = (productId: number, history: readonly HistoryEvent[]): HistoryEvent[] =>
  history
    .map((event, position) => ({ event, position }))
    .filter(({ event }) => event.product_id === productId && event.kind === 'AUDIT')
    .sort(
      (a, b) =>
        b.event.timestamp.getTime() - a.event.timestamp.getTime() || b.position - a.position
    )
    .slice(0, 2)
    .map(({ event }) => event);

/**
 * Consumption between the two most recent audits of a product:
 * previous count + purchases in (previous, latest] - latest count.
 * Returns null when the product has fewer than two audits.
 */
export const estimateConsumption = (
  productId: number,
  history: readonly HistoryEvent[]
): ConsumptionEstimate | null => {
  const audits = latestAudits(productId, history);
  if (audits.length < 2) {
    return null;
  }

  const [latest, previous] = audits;
  const from = previous.timestamp.getTime();
  const to = latest.timestamp.getTime();

  // Same-day re-audits count as one day
  const elapsedDays = Math.max(elapsedWholeDays(latest.timestamp, previous.timestamp), 0) || 1;

  const purchasedBetween = history
    .filter(event => {
      const at = event.timestamp.getTime();
      return event.product_id === productId && event.kind === 'PURCHASE' && at > from && at <= to;
    })
    .reduce((sum, event) => sum + event.quantity, 0);

  const consumed = Math.max(previous.quantity + purchasedBetween - latest.quantity, 0);

  return {
    product_id: productId,
    latest_audit: latest,
    previous_audit: previous,
    elapsed_days: elapsedDays,
    purchased_between: purchasedBetween,
    consumed,
    monthly_rate: roundToTenth((consumed / elapsedDays) * DAYS_PER_MONTH),
  };
};

/**
 * Estimated units consumed per month, or null without two audits.
 */
export const estimateMonthlyRate = (productId: number, history: readonly HistoryEvent[]): number | null =>
  estimateConsumption(productId, history)?.monthly_rate ?? null;
