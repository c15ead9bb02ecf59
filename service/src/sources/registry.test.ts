import assert from "node:assert/strict";
import test from "node:test";
import { CommentOptions, emptyComments, emptyOffers, OfferOptions, ProductComments, ProductOffers } from "../types";
import { SourceRegistry, UnsupportedSourceError } from "./registry";
import { CommentSource, OfferSource } from "./types";

const offers: OfferSource = {
  kind: "offers",
  name: "hotline",
  domain: "hotline.ua",
  parse: async (url: string, _options: OfferOptions): Promise<ProductOffers> => emptyOffers(url)
};

const comments: CommentSource = {
  kind: "comments",
  name: "comfy",
  domain: "comfy.ua",
  parse: async (url: string, _options: CommentOptions): Promise<ProductComments> => emptyComments(url)
};

const registry = new SourceRegistry([offers, comments]);

test("resolve dispatches by host suffix", () => {
  assert.equal(registry.resolve("https://hotline.ua/ua/test-phone/", "offers"), offers);
  assert.equal(registry.resolve("https://www.comfy.ua/test-kettle.html", "comments"), comments);
});

test("resolve rejects unknown hosts", () => {
  assert.throws(() => registry.resolve("https://example.com/item", "offers"), UnsupportedSourceError);
  assert.throws(() => registry.resolve("not a url", "comments"), UnsupportedSourceError);
});

test("resolve rejects a source that serves the other kind", () => {
  assert.throws(
    () => registry.resolve("https://comfy.ua/test-kettle.html", "offers"),
    (error: unknown) =>
      error instanceof UnsupportedSourceError && error.message === "Unsupported source URL for offers: https://comfy.ua/test-kettle.html"
  );
});
