export interface Viewport {
  width: number;
  height: number;
}

export interface Fingerprint {
  userAgent: string;
  locale: string;
  acceptLanguage: string;
  viewport: Viewport;
}

const FINGERPRINTS: readonly Fingerprint[] = [
  {
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    locale: "uk-UA",
    acceptLanguage: "uk-UA,uk;q=0.9,en-US;q=0.8,en;q=0.7",
    viewport: { width: 1920, height: 1080 }
  },
  {
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
    locale: "uk-UA",
    acceptLanguage: "uk-UA,uk;q=0.9,ru;q=0.8,en;q=0.7",
    viewport: { width: 1440, height: 900 }
  },
  {
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
    locale: "uk-UA",
    acceptLanguage: "uk,en-US;q=0.7,en;q=0.3",
    viewport: { width: 1536, height: 864 }
  },
  {
    userAgent:
      "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
    locale: "en-US",
    acceptLanguage: "en-US,en;q=0.9,uk;q=0.8",
    viewport: { width: 1680, height: 1050 }
  },
  {
    userAgent:
      "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
    locale: "en-US",
    acceptLanguage: "en-US,en;q=0.9",
    viewport: { width: 1366, height: 768 }
  }
];

export function pickFingerprint(random: () => number = Math.random): Fingerprint {
  const index = Math.min(FINGERPRINTS.length - 1, Math.max(0, Math.floor(random() * FINGERPRINTS.length)));
  return FINGERPRINTS[index];
}

export function fingerprintHeaders(fingerprint: Fingerprint, base: Record<string, string> = {}): Record<string, string> {
  return {
    ...base,
    "User-Agent": fingerprint.userAgent,
    "Accept-Language": fingerprint.acceptLanguage
  };
}
