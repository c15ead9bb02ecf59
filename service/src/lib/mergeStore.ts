import { CommentSchema, OfferSchema, ProductRecords, RecordKind, RecordMap } from "../types";
import { DocumentStore, StoredRecords } from "./db";
import { Logger, silentLogger } from "./logger";

export type MergeOutcome = "saved" | "skipped" | "failed";

function validateRecord(kind: RecordKind, record: unknown): unknown {
  return kind === "offers" ? OfferSchema.parse(record) : CommentSchema.parse(record);
}

export function mergeRecords<T>(existing: RecordMap<T>, incoming: RecordMap<T>): Map<string, T> {
  const merged = new Map(existing);
  for (const [id, record] of incoming) {
    merged.set(id, record);
  }
  return merged;
}

export function toStoredRecords<T>(records: RecordMap<T>): StoredRecords {
  return Object.fromEntries(records);
}

export function fromStoredRecords(stored: StoredRecords | null): Map<string, unknown> {
  return new Map(Object.entries(stored ?? {}));
}

export class MergeStore {
  constructor(
    private readonly store: DocumentStore,
    private readonly logger: Logger = silentLogger()
  ) {}

  async merge(result: ProductRecords): Promise<MergeOutcome> {
    const { kind, url, records } = result;
    const available = await this.store.isAvailable();
    if (!available) {
      this.logger.warn("store_unavailable_skip_save", { kind, url, records: records.size });
      return "skipped";
    }

    try {
      const existing = fromStoredRecords(await this.store.readRecords(kind, url));
      const incoming = new Map<string, unknown>();
      for (const [id, record] of records) {
        incoming.set(id, validateRecord(kind, record));
      }
      const merged = mergeRecords(existing, incoming);
      await this.store.writeRecords(kind, url, toStoredRecords(merged));
      this.logger.info("records_merged", {
        kind,
        url,
        incoming: incoming.size,
        previous: existing.size,
        total: merged.size
      });
      return "saved";
    } catch (error) {
      this.logger.error("records_merge_failed", { kind, url, error });
      return "failed";
    }
  }
}
