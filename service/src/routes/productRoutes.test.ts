import assert from "node:assert/strict";
import { AddressInfo } from "node:net";
import { Server } from "node:http";
import test, { after, before } from "node:test";
import { createApp } from "../app";
import { HealthProbe, ProductParserService } from "../crawlers/productParser";
import { DocumentStore, StoredRecords } from "../lib/db";
import { silentLogger } from "../lib/logger";
import { MergeStore } from "../lib/mergeStore";
import { SourceRegistry } from "../sources/registry";
import { CommentSource, OfferSource } from "../sources/types";
import { CommentOptions, OfferOptions } from "../types";

class NoStore implements DocumentStore {
  async isAvailable(): Promise<boolean> {
    return false;
  }

  async readRecords(): Promise<StoredRecords | null> {
    return null;
  }

  async writeRecords(): Promise<void> {
    return undefined;
  }
}

const probe: HealthProbe = {
  isEnabled: () => false,
  healthcheck: async () => false
};

const offerCalls: OfferOptions[] = [];
const commentCalls: CommentOptions[] = [];

const offers: OfferSource = {
  kind: "offers",
  name: "hotline",
  domain: "hotline.ua",
  parse: async (url: string, options: OfferOptions) => {
    offerCalls.push(options);
    return {
      kind: "offers",
      url,
      records: new Map([
        [
          "1",
          {
            id: "1",
            url: "https://hotline.ua/go/price/1",
            original_url: null,
            title: "Phone",
            shop: "Shop",
            price: 10,
            is_used: true,
            parsed_at: 1_700_000_000
          }
        ]
      ])
    };
  }
};

const comments: CommentSource = {
  kind: "comments",
  name: "brain",
  domain: "brain.com.ua",
  parse: async (url: string, options: CommentOptions) => {
    commentCalls.push(options);
    if (url.includes("explode")) {
      throw new Error("listing exploded");
    }
    return { kind: "comments", url, records: new Map() };
  }
};

let server: Server;
let baseUrl = "";

before(async () => {
  const logger = silentLogger();
  const parser = new ProductParserService(
    new SourceRegistry([offers, comments]),
    new MergeStore(new NoStore(), logger),
    probe,
    logger
  );
  server = createApp(parser, logger).listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (address && typeof address === "object") {
    baseUrl = `http://127.0.0.1:${address.port}`;
  }
});

after(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function getJson(path: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${baseUrl}${path}`);
  const body: unknown = await response.json();
  return { status: response.status, body };
}

test("GET /product/offers passes the raw limits through and returns the view", async () => {
  const target = encodeURIComponent("https://hotline.ua/test-phone");
  const { status, body } = await getJson(`/product/offers?url=${target}&timeout_limit=15&count_limit=abc&sort=desc`);

  assert.equal(status, 200);
  assert.deepEqual(body, {
    url: "https://hotline.ua/test-phone",
    offers: [{ url: "https://hotline.ua/go/price/1", original_url: null, title: "Phone", shop: "Shop", price: 10, is_used: true }]
  });
  assert.deepEqual(offerCalls.at(-1), { timeoutLimit: "15", countLimit: "abc", priceSort: "desc" });
});

test("GET /product/offers falls back to defaults for repeated limit parameters", async () => {
  const target = encodeURIComponent("https://hotline.ua/test-phone");
  const { status } = await getJson(`/product/offers?url=${target}&count_limit=20&count_limit=30`);

  assert.equal(status, 200);
  assert.deepEqual(offerCalls.at(-1), { timeoutLimit: undefined, countLimit: ["20", "30"], priceSort: undefined });
});

test("GET /product/offers without url is a bad request", async () => {
  const { status } = await getJson("/product/offers");
  assert.equal(status, 400);
});

test("GET /product/comments forwards date_to", async () => {
  const target = encodeURIComponent("https://brain.com.ua/Noutbuk-p1.html");
  const { status, body } = await getJson(`/product/comments?url=${target}&date_to=2024-03-10`);

  assert.equal(status, 200);
  assert.deepEqual(body, { url: "https://brain.com.ua/Noutbuk-p1.html", comments: [] });
  assert.deepEqual(commentCalls.at(-1), { dateTo: "2024-03-10" });
});

test("unsupported sites and parser failures answer 500 with the message", async () => {
  const unsupported = await getJson(`/product/comments?url=${encodeURIComponent("https://example.com/x")}`);
  const failed = await getJson(`/product/comments?url=${encodeURIComponent("https://brain.com.ua/explode-p2.html")}`);

  assert.equal(unsupported.status, 500);
  assert.deepEqual(unsupported.body, { error: "Unsupported source URL for comments: https://example.com/x" });
  assert.equal(failed.status, 500);
  assert.deepEqual(failed.body, { error: "listing exploded" });
});

test("GET /health reports a disabled database as healthy", async () => {
  const { status, body } = await getJson("/health");
  assert.equal(status, 200);
  assert.deepEqual(body, { ok: true, db: "disabled" });
});
