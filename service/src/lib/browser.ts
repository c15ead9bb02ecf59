import { chromium } from "playwright-extra";
import stealth from "puppeteer-extra-plugin-stealth";
import { Fingerprint, fingerprintHeaders, pickFingerprint } from "./fingerprint";
import { defaultSleep, RetryPolicy, Sleep, withRetries } from "./http";
import { Logger, silentLogger } from "./logger";

chromium.use(stealth());

export interface PageLoader {
  loadPage(url: string, headers?: Record<string, string>): Promise<string | null>;
}

export interface BrowserRuntimeConfig extends RetryPolicy {
  timeoutMs: number;
}

export type PageRenderer = (
  url: string,
  fingerprint: Fingerprint,
  headers: Record<string, string>,
  timeoutMs: number
) => Promise<string>;

export const BLOCKED_RESOURCE_TYPES: ReadonlySet<string> = new Set(["image", "font", "media", "stylesheet"]);
const CHALLENGE_MARKERS = ["Pardon Our Interruption"];

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-infobars",
  "--disable-extensions"
];

export function isChallengePage(html: string): boolean {
  return CHALLENGE_MARKERS.some((marker) => html.includes(marker));
}

export interface AssetRoute {
  request(): { resourceType(): string };
  abort(): Promise<void>;
  continue(): Promise<void>;
}

export async function routeAssets(route: AssetRoute): Promise<void> {
  if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType())) {
    await route.abort();
    return;
  }
  await route.continue();
}

export const renderWithChromium: PageRenderer = async (url, fingerprint, headers, timeoutMs) => {
  const browser = await chromium.launch({ headless: true, args: LAUNCH_ARGS });
  try {
    const context = await browser.newContext({
      userAgent: fingerprint.userAgent,
      extraHTTPHeaders: fingerprintHeaders(fingerprint, headers),
      viewport: fingerprint.viewport,
      locale: fingerprint.locale
    });
    const page = await context.newPage();
    await page.route("**/*", routeAssets);
    await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    return await page.content();
  } finally {
    await browser.close();
  }
};

export interface BrowserPageLoaderDeps {
  render?: PageRenderer;
  sleep?: Sleep;
  random?: () => number;
}

export class BrowserPageLoader implements PageLoader {
  private readonly render: PageRenderer;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly runtime: BrowserRuntimeConfig,
    private readonly logger: Logger = silentLogger(),
    deps: BrowserPageLoaderDeps = {}
  ) {
    this.render = deps.render ?? renderWithChromium;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async loadPage(url: string, headers: Record<string, string> = {}): Promise<string | null> {
    const html = await withRetries(
      `PAGE ${url}`,
      this.runtime,
      async () => {
        const content = await this.render(url, pickFingerprint(this.random), headers, this.runtime.timeoutMs);
        if (isChallengePage(content)) {
          throw new Error("challenge page served");
        }
        return content;
      },
      this.logger,
      this.sleep
    );
    if (html !== null) {
      this.logger.info("page_loaded", { url, bytes: html.length });
    }
    return html;
  }
}
