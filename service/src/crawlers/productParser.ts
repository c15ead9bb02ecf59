import { Logger } from "../lib/logger";
import { MergeOutcome, MergeStore } from "../lib/mergeStore";
import { SourceRegistry } from "../sources/registry";
import {
  CommentOptions,
  OfferOptions,
  ProductComments,
  ProductCommentsView,
  ProductOffers,
  ProductOffersView
} from "../types";

export type DatabaseState = "up" | "down" | "disabled";

export interface ServiceHealth {
  ok: boolean;
  db: DatabaseState;
}

export interface HealthProbe {
  isEnabled(): boolean;
  healthcheck(): Promise<boolean>;
}

export function toOffersView(result: ProductOffers): ProductOffersView {
  return {
    url: result.url,
    offers: [...result.records.values()].map((offer) => ({
      url: offer.url,
      original_url: offer.original_url,
      title: offer.title,
      shop: offer.shop,
      price: offer.price,
      is_used: offer.is_used
    }))
  };
}

export function toCommentsView(result: ProductComments): ProductCommentsView {
  return {
    url: result.url,
    comments: [...result.records.values()].map((comment) => ({
      rating: comment.rating,
      advantages: comment.advantages,
      shortcomings: comment.shortcomings,
      comment: comment.comment,
      created_at: comment.created_at
    }))
  };
}

/**
 * Runs one acquisition per request: pick the source for the URL, parse, merge the records into
 * the document store, and project the run's own records into the response shape.
 */
export class ProductParserService {
  private readonly logger: Logger;

  constructor(
    private readonly sources: SourceRegistry,
    private readonly store: MergeStore,
    private readonly database: HealthProbe,
    logger: Logger
  ) {
    this.logger = logger.child("parser");
  }

  async getOffers(url: string, options: OfferOptions = {}): Promise<ProductOffersView> {
    const source = this.sources.resolve(url, "offers");
    const startedAt = Date.now();
    this.logger.info("offers_run_started", { url, source: source.name });

    const result = await source.parse(url, options);
    const saved = await this.store.merge(result);

    this.logRunCompleted("offers", result.url, result.records.size, saved, startedAt);
    return toOffersView(result);
  }

  async getComments(url: string, options: CommentOptions = {}): Promise<ProductCommentsView> {
    const source = this.sources.resolve(url, "comments");
    const startedAt = Date.now();
    this.logger.info("comments_run_started", { url, source: source.name });

    const result = await source.parse(url, options);
    const saved = await this.store.merge(result);

    this.logRunCompleted("comments", result.url, result.records.size, saved, startedAt);
    return toCommentsView(result);
  }

  async health(): Promise<ServiceHealth> {
    if (!this.database.isEnabled()) {
      return { ok: true, db: "disabled" };
    }
    const up = await this.database.healthcheck();
    return { ok: up, db: up ? "up" : "down" };
  }

  private logRunCompleted(kind: string, url: string, records: number, saved: MergeOutcome, startedAt: number): void {
    this.logger.info("run_completed", {
      kind,
      url,
      records,
      persistence: saved,
      duration_ms: Date.now() - startedAt
    });
  }
}
