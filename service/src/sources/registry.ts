import { detectSourceDomain } from "../lib/url";
import { RecordKind } from "../types";
import { CommentSource, OfferSource, ProductSource } from "./types";

export class UnsupportedSourceError extends Error {
  constructor(readonly url: string, readonly kind: RecordKind) {
    super(`Unsupported source URL for ${kind}: ${url}`);
    this.name = "UnsupportedSourceError";
  }
}

export class SourceRegistry {
  private readonly byDomain = new Map<string, ProductSource>();

  constructor(sources: readonly ProductSource[]) {
    for (const source of sources) {
      this.byDomain.set(source.domain, source);
    }
  }

  domains(): string[] {
    return [...this.byDomain.keys()];
  }

  resolve(url: string, kind: "offers"): OfferSource;
  resolve(url: string, kind: "comments"): CommentSource;
  resolve(url: string, kind: RecordKind): ProductSource {
    const domain = detectSourceDomain(url, this.domains());
    const source = domain === null ? undefined : this.byDomain.get(domain);
    if (!source || source.kind !== kind) {
      throw new UnsupportedSourceError(url, kind);
    }
    return source;
  }
}
