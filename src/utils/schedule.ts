const AGGREGATION_INTERVAL_DAYS = 3;

/**
 * Start of the next aggregation window for a subscription checked at `from`
 */
export function nextAggregationAt(from: Date): Date {
  const next = new Date(from.getTime());
  next.setUTCDate(next.getUTCDate() + AGGREGATION_INTERVAL_DAYS);
  return next;
}
