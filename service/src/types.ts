import { z } from "zod";

export const RecordKindSchema = z.enum(["offers", "comments"]);
export const PriceSortSchema = z.enum(["asc", "desc"]);

export const OfferSchema = z.object({
  id: z.string().min(1),
  url: z.string(),
  original_url: z.string().nullable(),
  title: z.string(),
  shop: z.string(),
  price: z.number().nonnegative(),
  is_used: z.boolean(),
  parsed_at: z.number().int()
});

export const CommentSchema = z.object({
  id: z.string().min(1),
  rating: z.number().min(0).max(5),
  advantages: z.string(),
  shortcomings: z.string(),
  comment: z.string(),
  created_at: z.number().int(),
  parsed_at: z.number().int()
});

export type RecordKind = z.infer<typeof RecordKindSchema>;
export type PriceSort = z.infer<typeof PriceSortSchema>;
export type Offer = z.infer<typeof OfferSchema>;
export type Comment = z.infer<typeof CommentSchema>;

export interface NormalizedUrl {
  url: string;
  path: string;
  slug: string;
}

export interface RejectedUrl {
  url: string;
  path: null;
  slug: null;
}

export type RecordMap<T> = ReadonlyMap<string, T>;

export interface ProductOffers {
  kind: "offers";
  url: string;
  records: RecordMap<Offer>;
}

export interface ProductComments {
  kind: "comments";
  url: string;
  records: RecordMap<Comment>;
}

export type ProductRecords = ProductOffers | ProductComments;

export interface OfferOptions {
  timeoutLimit?: unknown;
  countLimit?: unknown;
  priceSort?: unknown;
}

export interface CommentOptions {
  dateTo?: string;
}

export interface OfferView {
  url: string;
  original_url: string | null;
  title: string;
  shop: string;
  price: number;
  is_used: boolean;
}

export interface CommentView {
  rating: number;
  advantages: string;
  shortcomings: string;
  comment: string;
  created_at: number;
}

export interface ProductOffersView {
  url: string;
  offers: OfferView[];
}

export interface ProductCommentsView {
  url: string;
  comments: CommentView[];
}

export function emptyOffers(url: string): ProductOffers {
  return { kind: "offers", url, records: new Map() };
}

export function emptyComments(url: string): ProductComments {
  return { kind: "comments", url, records: new Map() };
}
