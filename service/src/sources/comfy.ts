import { z } from "zod";
import { PageLoader } from "../lib/browser";
import { HttpClient } from "../lib/http";
import { Logger, silentLogger } from "../lib/logger";
import { cleanText, isAfterCutoff, nowSeconds, parseDateTimeToTimestamp, parseDateToTimestamp } from "../lib/text";
import { isNormalized, normalizeProductUrl } from "../lib/url";
import { Comment, CommentOptions, emptyComments, ProductComments } from "../types";
import { CommentSource } from "./types";

export const COMFY_DOMAIN = "comfy.ua";
const REVIEWS_URL = "https://im.comfy.ua/api/reviews/paged";
const BASE_HEADERS = { Referer: "https://comfy.ua/", Cookie: "g_state={}" };

const PRODUCT_ID_PATTERN = /"product":\s*{\s*"id":\s*(\d+)/;
const STORE_ID_PATTERN = /"storeId":\s*"(\d+)"/;
const REVIEWS_TOTAL_PATTERN = /"reviewsTotal":\s*(\d+)/;

const nullableText = z.string().nullable().optional();

export const ComfyReviewSchema = z.object({
  reviewId: z.union([z.string(), z.number()]).nullable().optional(),
  createdAt: nullableText,
  productRating: z.union([z.number(), z.string()]).nullable().optional(),
  advantages: nullableText,
  disadvantages: nullableText,
  detail: nullableText
});

const ReviewsPageSchema = z.object({
  reviews: z.array(z.unknown()).nullable().optional()
});

export type ComfyReview = z.infer<typeof ComfyReviewSchema>;

export interface ComfyProductInfo {
  productId: string | null;
  storeId: string | null;
  reviewsTotal: number | null;
}

export function extractComfyProductInfo(html: string): ComfyProductInfo {
  const productId = html.match(PRODUCT_ID_PATTERN)?.[1] ?? null;
  const storeId = html.match(STORE_ID_PATTERN)?.[1] ?? null;
  const total = html.match(REVIEWS_TOTAL_PATTERN)?.[1];
  return { productId, storeId, reviewsTotal: total === undefined ? null : Number(total) };
}

// The reviews API reports ratings on a 0-100 scale.
export function comfyRating(value: number | string | null | undefined): number {
  const raw = typeof value === "string" ? Number.parseFloat(value) : value ?? 0;
  if (!Number.isFinite(raw)) {
    return 0;
  }
  return Math.min(5, Math.max(0, raw / 20));
}

export function reviewPageSize(reviewsTotal: number): number {
  return Math.max(1, Math.floor(reviewsTotal / 10));
}

export interface ComfySourceDeps {
  http: HttpClient;
  pages: PageLoader;
  logger?: Logger;
}

export class ComfySource implements CommentSource {
  readonly kind = "comments" as const;
  readonly name = "comfy";
  readonly domain = COMFY_DOMAIN;
  private readonly http: HttpClient;
  private readonly pages: PageLoader;
  private readonly logger: Logger;

  constructor(deps: ComfySourceDeps) {
    this.http = deps.http;
    this.pages = deps.pages;
    this.logger = deps.logger ?? silentLogger();
  }

  async parse(url: string, options: CommentOptions): Promise<ProductComments> {
    const normalized = normalizeProductUrl(url, this.domain);
    if (!isNormalized(normalized) || !normalized.slug) {
      this.logger.error("url_validation_failed", { url });
      return emptyComments(normalized.url);
    }

    const cutoff = parseDateToTimestamp(options.dateTo);
    if (options.dateTo && cutoff === null) {
      this.logger.warn("date_to_ignored", { date_to: options.dateTo });
    }

    const info = await this.fetchProductInfo(normalized.url);
    if (!info.productId || !info.storeId || !info.reviewsTotal) {
      this.logger.error("product_info_missing", { url: normalized.url, ...info });
      return emptyComments(normalized.url);
    }

    const pageSize = reviewPageSize(info.reviewsTotal);
    this.logger.info("reviews_paging", { url: normalized.url, reviews_total: info.reviewsTotal, pages: pageSize });

    const records = new Map<string, Comment>();
    for (let page = 1; page <= pageSize; page += 1) {
      const reviews = await this.fetchReviewsPage(info.productId, info.storeId, page, pageSize);
      if (reviews.length === 0) {
        this.logger.warn("reviews_page_empty", { url: normalized.url, page });
        continue;
      }
      for (const review of reviews) {
        const comment = this.toComment(review, cutoff);
        if (comment) {
          records.set(comment.id, comment);
        }
      }
    }

    this.logger.info("comments_parsed", { url: normalized.url, comments: records.size });
    return { kind: "comments", url: normalized.url, records };
  }

  async fetchProductInfo(url: string): Promise<ComfyProductInfo> {
    const html = await this.pages.loadPage(url, BASE_HEADERS);
    if (!html) {
      return { productId: null, storeId: null, reviewsTotal: null };
    }
    return extractComfyProductInfo(html);
  }

  async fetchReviewsPage(productId: string, storeId: string, page: number, pageSize: number): Promise<ComfyReview[]> {
    const payload = await this.http.getJson(REVIEWS_URL, {
      headers: BASE_HEADERS,
      query: { productId, storeId, page, pageSize, type: "1", order: "date", parseCodes: "1" }
    });
    const parsed = ReviewsPageSchema.safeParse(payload);
    if (!parsed.success) {
      return [];
    }

    const reviews: ComfyReview[] = [];
    for (const item of parsed.data.reviews ?? []) {
      const review = ComfyReviewSchema.safeParse(item);
      if (review.success) {
        reviews.push(review.data);
      } else {
        this.logger.warn("review_invalid", { page, errors: review.error.flatten() });
      }
    }
    return reviews;
  }

  toComment(review: ComfyReview, cutoff: number | null): Comment | null {
    if (review.reviewId === null || review.reviewId === undefined || review.reviewId === "") {
      return null;
    }
    const createdAt = parseDateTimeToTimestamp(review.createdAt);
    if (createdAt === null) {
      if (review.createdAt) {
        this.logger.warn("review_date_invalid", { review_id: review.reviewId, created_at: review.createdAt });
      }
      return null;
    }
    if (isAfterCutoff(createdAt, cutoff)) {
      return null;
    }

    const id = String(review.reviewId);
    return {
      id,
      rating: comfyRating(review.productRating),
      advantages: cleanText(review.advantages),
      shortcomings: cleanText(review.disadvantages),
      comment: cleanText(review.detail),
      created_at: createdAt,
      parsed_at: nowSeconds()
    };
  }
}
