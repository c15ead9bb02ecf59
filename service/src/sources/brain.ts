import { load } from "cheerio";
import { z } from "zod";
import { HttpClient } from "../lib/http";
import { Logger, silentLogger } from "../lib/logger";
import { cleanText, isAfterCutoff, nowSeconds, parseDateToTimestamp, parseUkrainianDate } from "../lib/text";
import { isNormalized, normalizeProductUrl } from "../lib/url";
import { Comment, CommentOptions, emptyComments, ProductComments } from "../types";
import { CommentSource } from "./types";

export const BRAIN_DOMAIN = "brain.com.ua";
const COMMENTS_URL = "https://brain.com.ua/api/v1/product_comments";
const BASE_HEADERS = { Referer: "https://brain.com.ua/" };

// Top-level comments only; replies carry deeper "deep-N" classes.
const COMMENT_SELECTOR = "div.br-pt-bc-item.br-ct-bc-item-out.br-pt-bc-item-in.deep-1";

const CommentsResponseSchema = z.object({
  commentsTpl: z.string().nullable().optional()
});

export function extractBrainProductId(url: string): string | null {
  return url.match(/-p(\d+)\.html/)?.[1] ?? null;
}

function markToRating(mark: string | undefined): number {
  const value = mark === undefined ? Number.NaN : Number.parseFloat(mark);
  return Number.isFinite(value) ? Math.min(5, Math.max(0, value)) : 0;
}

export function parseBrainReviews(html: string, cutoff: number | null, parsedAt: number = nowSeconds()): Map<string, Comment> {
  const $ = load(html);
  const comments = new Map<string, Comment>();

  $(COMMENT_SELECTOR).each((_, element) => {
    const item = $(element);
    const id = item.attr("data-cid");
    if (!id) {
      return;
    }
    const createdAt = parseUkrainianDate(item.find("div.br-pt-bc-date").first().text());
    if (createdAt === null || isAfterCutoff(createdAt, cutoff)) {
      return;
    }

    comments.set(id, {
      id,
      rating: markToRating(item.find("div.br-pt-bc-rating").first().attr("data-comment-mark")),
      advantages: "",
      shortcomings: "",
      comment: cleanText(item.find("div.br-comment-text").first().text()),
      created_at: createdAt,
      parsed_at: parsedAt
    });
  });

  return comments;
}

export interface BrainSourceDeps {
  http: HttpClient;
  logger?: Logger;
}

export class BrainSource implements CommentSource {
  readonly kind = "comments" as const;
  readonly name = "brain";
  readonly domain = BRAIN_DOMAIN;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(deps: BrainSourceDeps) {
    this.http = deps.http;
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

    const productId = extractBrainProductId(normalized.url);
    if (!productId) {
      this.logger.error("product_id_missing", { url: normalized.url });
      return emptyComments(normalized.url);
    }

    const html = await this.fetchCommentsHtml(productId);
    if (!html) {
      this.logger.warn("comments_html_empty", { url: normalized.url, product_id: productId });
      return emptyComments(normalized.url);
    }

    const records = parseBrainReviews(html, cutoff);
    this.logger.info("comments_parsed", { url: normalized.url, comments: records.size });
    return { kind: "comments", url: normalized.url, records };
  }

  async fetchCommentsHtml(productId: string): Promise<string> {
    const payload = await this.http.getJson(`${COMMENTS_URL}/${productId}`, { headers: BASE_HEADERS });
    const parsed = CommentsResponseSchema.safeParse(payload);
    return parsed.success ? parsed.data.commentsTpl ?? "" : "";
  }
}
