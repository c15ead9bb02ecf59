import assert from "node:assert/strict";
import test from "node:test";
import { Comment, Offer, RecordKind } from "../types";
import { DocumentStore, StoredRecords } from "./db";
import { silentLogger } from "./logger";
import { MergeStore, mergeRecords } from "./mergeStore";

class InMemoryStore implements DocumentStore {
  readonly documents = new Map<string, StoredRecords>();
  writes = 0;

  constructor(private readonly available = true, private readonly failWrites = false) {}

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async readRecords(kind: RecordKind, url: string): Promise<StoredRecords | null> {
    const stored = this.documents.get(`${kind}:${url}`);
    return stored ? { ...stored } : null;
  }

  async writeRecords(kind: RecordKind, url: string, records: StoredRecords): Promise<void> {
    if (this.failWrites) {
      throw new Error("connection reset");
    }
    this.writes += 1;
    this.documents.set(`${kind}:${url}`, { ...records });
  }
}

function offer(id: string, price: number): Offer {
  return {
    id,
    url: `https://hotline.ua/go/price/${id}`,
    original_url: null,
    title: `Offer ${id}`,
    shop: "Test Shop",
    price,
    is_used: false,
    parsed_at: 1_700_000_000
  };
}

function comment(id: string, rating: number): Comment {
  return {
    id,
    rating,
    advantages: "",
    shortcomings: "",
    comment: `Comment ${id}`,
    created_at: 1_690_000_000,
    parsed_at: 1_700_000_000
  };
}

const productUrl = "https://hotline.ua/mobile/test-phone";

test("mergeRecords unions disjoint keys", () => {
  const merged = mergeRecords(new Map([["a", 1]]), new Map([["b", 2]]));
  assert.deepEqual(Object.fromEntries(merged), { a: 1, b: 2 });
});

test("mergeRecords overwrites existing keys with incoming values", () => {
  const existing = new Map([["a", 1]]);
  const merged = mergeRecords(existing, new Map([["a", 2]]));
  assert.deepEqual(Object.fromEntries(merged), { a: 2 });
  assert.deepEqual(Object.fromEntries(existing), { a: 1 });
});

test("merge keeps records from previous runs and replaces re-fetched ones", async () => {
  const store = new InMemoryStore();
  const merger = new MergeStore(store, silentLogger());

  await merger.merge({ kind: "offers", url: productUrl, records: new Map([["1", offer("1", 100)], ["2", offer("2", 200)]]) });
  await merger.merge({ kind: "offers", url: productUrl, records: new Map([["2", offer("2", 150)], ["3", offer("3", 300)]]) });

  const stored = store.documents.get(`offers:${productUrl}`);
  assert.deepEqual(Object.keys(stored ?? {}).sort(), ["1", "2", "3"]);
  assert.deepEqual(stored?.["2"], offer("2", 150));
  assert.deepEqual(stored?.["1"], offer("1", 100));
});

test("merging the same record set twice is idempotent", async () => {
  const store = new InMemoryStore();
  const merger = new MergeStore(store, silentLogger());
  const records = new Map([["c1", comment("c1", 4)], ["c2", comment("c2", 5)]]);

  await merger.merge({ kind: "comments", url: productUrl, records });
  const once = store.documents.get(`comments:${productUrl}`);
  await merger.merge({ kind: "comments", url: productUrl, records });
  const twice = store.documents.get(`comments:${productUrl}`);

  assert.deepEqual(twice, once);
});

test("offers and comments for the same URL live in separate documents", async () => {
  const store = new InMemoryStore();
  const merger = new MergeStore(store, silentLogger());

  await merger.merge({ kind: "offers", url: productUrl, records: new Map([["1", offer("1", 10)]]) });
  await merger.merge({ kind: "comments", url: productUrl, records: new Map([["1", comment("1", 3)]]) });

  assert.deepEqual(store.documents.get(`offers:${productUrl}`)?.["1"], offer("1", 10));
  assert.deepEqual(store.documents.get(`comments:${productUrl}`)?.["1"], comment("1", 3));
});

test("merge is skipped when the store is unreachable", async () => {
  const store = new InMemoryStore(false);
  const merger = new MergeStore(store, silentLogger());

  const outcome = await merger.merge({ kind: "offers", url: productUrl, records: new Map([["1", offer("1", 10)]]) });

  assert.equal(outcome, "skipped");
  assert.equal(store.writes, 0);
});

test("merge reports a failed write without throwing", async () => {
  const store = new InMemoryStore(true, true);
  const merger = new MergeStore(store, silentLogger());

  const outcome = await merger.merge({ kind: "comments", url: productUrl, records: new Map([["1", comment("1", 3)]]) });

  assert.equal(outcome, "failed");
});
