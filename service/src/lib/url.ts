import { NormalizedUrl, RejectedUrl } from "../types";

export const LANGUAGE_PREFIXES = ["ua", "ukr", "en", "ru"];

function parseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

function rejected(url: string): RejectedUrl {
  return { url, path: null, slug: null };
}

function stripExtension(segment: string): string {
  const dot = segment.lastIndexOf(".");
  return dot > 0 ? segment.slice(0, dot) : segment;
}

export function hostMatchesDomain(hostname: string, domain: string): boolean {
  return hostname.toLowerCase().endsWith(domain.toLowerCase());
}

export function normalizeProductUrl(input: string, domain: string): NormalizedUrl | RejectedUrl {
  if (!input) {
    return rejected(input);
  }

  const parsed = parseUrl(input.trim());
  if (!parsed || !hostMatchesDomain(parsed.hostname, domain)) {
    return rejected(input);
  }

  let segments = parsed.pathname.split("/").filter((segment) => segment.length > 0);
  const first = segments[0];
  if (first !== undefined && LANGUAGE_PREFIXES.includes(first.toLowerCase())) {
    segments = segments.slice(1);
  }

  const path = `/${segments.join("/")}`;
  const last = segments[segments.length - 1];
  const slug = last === undefined ? "" : stripExtension(last);

  return {
    url: `https://${domain}${path}`,
    path,
    slug
  };
}

export function isNormalized(value: NormalizedUrl | RejectedUrl): value is NormalizedUrl {
  return value.path !== null;
}

export function detectSourceDomain(input: string, domains: readonly string[]): string | null {
  const parsed = parseUrl(input.trim());
  if (!parsed) {
    return null;
  }
  return domains.find((domain) => hostMatchesDomain(parsed.hostname, domain)) ?? null;
}
