import { Logger, silentLogger } from "../lib/logger";
import { OfferOptions, PriceSort, PriceSortSchema } from "../types";

export interface CollectorLimits {
  timeoutLimit: number;
  countLimit: number;
  priceSort: PriceSort | null;
}

export const TIMEOUT_LIMIT = { fallback: 60, min: 10, max: 60 } as const;
export const COUNT_LIMIT = { fallback: 10, min: 10, max: 1000 } as const;

export type CollectorOutcome = "no_token" | "no_candidates" | "timed_out" | "count_satisfied" | "exhausted";

export interface CollectorResult<T> {
  outcome: CollectorOutcome;
  records: Map<string, T>;
  examined: number;
}

/**
 * One offer-listing run as seen by the collector: a session token, a single candidate query
 * made with that token, and per-candidate enrichment (redirect resolution).
 */
export interface BoundedCollection<C, T> {
  acquireToken(): Promise<string | null>;
  listCandidates(token: string): Promise<readonly C[] | null>;
  enrich(candidate: C): Promise<{ id: string; record: T }>;
  price(record: T): number;
}

export interface CollectorClock {
  /** Epoch milliseconds at which the caller's time budget started. */
  startedAt: number;
  now(): number;
}

function toInteger(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

function boundedInteger(
  name: string,
  value: unknown,
  bounds: { fallback: number; min: number; max: number },
  logger: Logger
): number {
  if (value === undefined || value === null || value === "") {
    return bounds.fallback;
  }
  const parsed = toInteger(value);
  if (parsed === null) {
    logger.warn("collector_param_not_integer", { name, value, fallback: bounds.fallback });
    return bounds.fallback;
  }
  return Math.min(bounds.max, Math.max(bounds.min, parsed));
}

export function normalizeCollectorLimits(options: OfferOptions, logger: Logger = silentLogger()): CollectorLimits {
  const timeoutLimit = boundedInteger("timeout_limit", options.timeoutLimit, TIMEOUT_LIMIT, logger);
  const countLimit = boundedInteger("count_limit", options.countLimit, COUNT_LIMIT, logger);

  let priceSort: PriceSort | null = null;
  if (options.priceSort !== undefined && options.priceSort !== null && options.priceSort !== "") {
    const parsed = PriceSortSchema.safeParse(options.priceSort);
    if (parsed.success) {
      priceSort = parsed.data;
    } else {
      logger.warn("collector_param_invalid_sort", { value: options.priceSort });
    }
  }

  const limits = { timeoutLimit, countLimit, priceSort };
  logger.debug("collector_limits", { ...limits });
  return limits;
}

export function sortAndTruncate<T>(
  records: ReadonlyMap<string, T>,
  limits: CollectorLimits,
  price: (record: T) => number
): Map<string, T> {
  let entries = [...records.entries()];
  if (limits.priceSort) {
    const direction = limits.priceSort === "desc" ? -1 : 1;
    // Array#sort is stable, so equal prices keep their encounter order.
    entries = entries.sort(([, left], [, right]) => direction * (price(left) - price(right)));
  }
  return new Map(entries.slice(0, limits.countLimit));
}

export async function runBoundedCollector<C, T>(
  collection: BoundedCollection<C, T>,
  limits: CollectorLimits,
  clock: CollectorClock,
  logger: Logger = silentLogger()
): Promise<CollectorResult<T>> {
  const token = await collection.acquireToken();
  if (!token) {
    logger.warn("collector_no_token");
    return { outcome: "no_token", records: new Map(), examined: 0 };
  }

  const candidates = await collection.listCandidates(token);
  if (!candidates) {
    logger.warn("collector_no_candidates");
    return { outcome: "no_candidates", records: new Map(), examined: 0 };
  }

  const collected = new Map<string, T>();
  const budgetMs = limits.timeoutLimit * 1000;
  let outcome: CollectorOutcome = "exhausted";
  let examined = 0;

  for (const candidate of candidates) {
    const elapsedMs = clock.now() - clock.startedAt;
    if (elapsedMs >= budgetMs) {
      logger.warn("collector_timeout_reached", {
        timeout_limit: limits.timeoutLimit,
        elapsed_ms: elapsedMs,
        partial_results: collected.size
      });
      outcome = "timed_out";
      break;
    }

    const { id, record } = await collection.enrich(candidate);
    collected.set(id, record);
    examined += 1;

    // With a sort requested every candidate must be seen before truncating.
    if (!limits.priceSort && collected.size >= limits.countLimit) {
      outcome = "count_satisfied";
      break;
    }
  }

  const records = sortAndTruncate(collected, limits, (record) => collection.price(record));
  logger.info("collector_completed", {
    outcome,
    candidates: candidates.length,
    examined,
    returned: records.size,
    price_sort: limits.priceSort,
    count_limit: limits.countLimit
  });
  return { outcome, records, examined };
}
