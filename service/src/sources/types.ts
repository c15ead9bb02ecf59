import { CommentOptions, OfferOptions, ProductComments, ProductOffers } from "../types";

export interface OfferSource {
  readonly kind: "offers";
  readonly name: string;
  readonly domain: string;
  parse(url: string, options: OfferOptions): Promise<ProductOffers>;
}

export interface CommentSource {
  readonly kind: "comments";
  readonly name: string;
  readonly domain: string;
  parse(url: string, options: CommentOptions): Promise<ProductComments>;
}

export type ProductSource = OfferSource | CommentSource;
