import { z } from "zod";
import { HttpClient } from "../lib/http";
import { Logger, silentLogger } from "../lib/logger";
import { nowSeconds } from "../lib/text";
import { isNormalized, normalizeProductUrl } from "../lib/url";
import { emptyOffers, NormalizedUrl, Offer, OfferOptions, ProductOffers } from "../types";
import { BoundedCollection, CollectorLimits, normalizeCollectorLimits, runBoundedCollector } from "./collector";
import { OfferSource } from "./types";

export const HOTLINE_DOMAIN = "hotline.ua";
const HOTLINE_ORIGIN = "https://hotline.ua";
const GRAPHQL_URL = "https://hotline.ua/svc/frontend-api/graphql";
const BASE_HEADERS = { Referer: "https://hotline.ua/" };
const USED_CONDITION_ID = 1;

const TOKEN_QUERY = `
  query urlTypeDefiner($path: String!) {
    urlTypeDefiner(path: $path) {
      token
    }
  }
`;

const OFFERS_QUERY = `
  query getOffers($path: String!, $first: Int!, $cityId: Int!) {
    byPathQueryProduct(path: $path, cityId: $cityId) {
      offers(first: $first) {
        edges {
          node {
            _id
            conversionUrl
            condition
            conditionId
            descriptionFull
            firmTitle
            price
          }
        }
      }
    }
  }
`;

const TokenResponseSchema = z.object({
  data: z
    .object({
      urlTypeDefiner: z.object({ token: z.string().nullable().optional() }).nullable().optional()
    })
    .nullable()
    .optional()
});

export const OfferNodeSchema = z.object({
  _id: z.union([z.string(), z.number()]).nullable().optional(),
  conversionUrl: z.string().nullable().optional(),
  conditionId: z.number().nullable().optional(),
  descriptionFull: z.string().nullable().optional(),
  firmTitle: z.string().nullable().optional(),
  price: z.union([z.number(), z.string()]).nullable().optional()
});

const OffersResponseSchema = z.object({
  data: z
    .object({
      byPathQueryProduct: z
        .object({
          offers: z
            .object({
              edges: z.array(z.object({ node: z.unknown() })).nullable().optional()
            })
            .nullable()
            .optional()
        })
        .nullable()
        .optional()
    })
    .nullable()
    .optional()
});

export type OfferNode = z.infer<typeof OfferNodeSchema>;

export function absoluteOfferUrl(conversionUrl: string | null | undefined): string {
  try {
    return new URL(conversionUrl ?? "", HOTLINE_ORIGIN).toString().replace(/\/+$/, "");
  } catch {
    return HOTLINE_ORIGIN;
  }
}

export function offerPrice(value: number | string | null | undefined): number {
  const price = typeof value === "string" ? Number.parseFloat(value) : value ?? 0;
  return Number.isFinite(price) && price > 0 ? price : 0;
}

export interface HotlineSourceDeps {
  http: HttpClient;
  cityId: number;
  logger?: Logger;
  now?: () => number;
}

export class HotlineSource implements OfferSource {
  readonly kind = "offers" as const;
  readonly name = "hotline";
  readonly domain = HOTLINE_DOMAIN;
  private readonly http: HttpClient;
  private readonly cityId: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: HotlineSourceDeps) {
    this.http = deps.http;
    this.cityId = deps.cityId;
    this.logger = deps.logger ?? silentLogger();
    this.now = deps.now ?? (() => Date.now());
  }

  async parse(url: string, options: OfferOptions): Promise<ProductOffers> {
    const startedAt = this.now();
    const normalized = normalizeProductUrl(url, this.domain);
    if (!isNormalized(normalized) || !normalized.slug) {
      this.logger.error("url_validation_failed", { url });
      return emptyOffers(normalized.url);
    }

    const limits = normalizeCollectorLimits(options, this.logger);
    const result = await runBoundedCollector(
      this.collection(normalized, limits),
      limits,
      { startedAt, now: this.now },
      this.logger
    );

    this.logger.info("offers_parsed", { url: normalized.url, outcome: result.outcome, offers: result.records.size });
    return { kind: "offers", url: normalized.url, records: result.records };
  }

  async fetchToken(path: string): Promise<string | null> {
    const payload = await this.http.postJson(
      GRAPHQL_URL,
      { operationName: "urlTypeDefiner", variables: { path }, query: TOKEN_QUERY },
      { headers: BASE_HEADERS }
    );
    const parsed = TokenResponseSchema.safeParse(payload);
    const token = parsed.success ? parsed.data.data?.urlTypeDefiner?.token : null;
    if (!token) {
      this.logger.warn("token_missing", { path });
      return null;
    }
    return token;
  }

  async fetchOfferNodes(normalized: NormalizedUrl, token: string, first: number): Promise<OfferNode[] | null> {
    const payload = await this.http.postJson(
      GRAPHQL_URL,
      {
        operationName: "getOffers",
        variables: { path: normalized.slug, first, cityId: this.cityId },
        query: OFFERS_QUERY
      },
      { headers: { ...BASE_HEADERS, "x-token": token, "x-referer": normalized.url } }
    );
    if (payload === null) {
      this.logger.warn("offers_query_failed", { url: normalized.url });
      return null;
    }

    const parsed = OffersResponseSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn("offers_payload_invalid", { url: normalized.url, errors: parsed.error.flatten() });
      return null;
    }

    const nodes: OfferNode[] = [];
    for (const edge of parsed.data.data?.byPathQueryProduct?.offers?.edges ?? []) {
      const node = OfferNodeSchema.safeParse(edge.node ?? {});
      if (node.success) {
        nodes.push(node.data);
      } else {
        this.logger.warn("offer_node_invalid", { url: normalized.url, errors: node.error.flatten() });
      }
    }
    return nodes;
  }

  async toOffer(node: OfferNode): Promise<{ id: string; record: Offer }> {
    const id = node._id === null || node._id === undefined ? "unknown" : String(node._id);
    const offerUrl = absoluteOfferUrl(node.conversionUrl);
    const originalUrl = await this.http.resolveRedirect(offerUrl, { headers: BASE_HEADERS });
    return {
      id,
      record: {
        id,
        url: offerUrl,
        original_url: originalUrl,
        title: node.descriptionFull ?? "",
        shop: node.firmTitle ?? "",
        price: offerPrice(node.price),
        is_used: node.conditionId === USED_CONDITION_ID,
        parsed_at: nowSeconds()
      }
    };
  }

  private collection(normalized: NormalizedUrl, limits: CollectorLimits): BoundedCollection<OfferNode, Offer> {
    return {
      acquireToken: () => this.fetchToken(normalized.path),
      listCandidates: (token) => this.fetchOfferNodes(normalized, token, limits.countLimit),
      enrich: (node) => this.toOffer(node),
      price: (offer) => offer.price
    };
  }
}
