/**
 * Headless Chromium access to the fixture list page and match pages.
 *
 * PlaywrightExtractor: one browser per tracker session, so a crashed or
 * wedged page only takes down its own match.
 * PlaywrightMatchListSource: one long-lived browser for discovery.
 */

import { chromium } from "playwright-core";
import type { Browser, Page } from "playwright-core";
import { describeError, ExtractionError, SchedulerInitError } from "../errors";
import type {
  ExtractorSession,
  MatchListSource,
  PageExtractor,
  RawMatchRecord,
  SnapshotKind,
  SnapshotPayloads,
} from "../types";
import { TIMING } from "../types";
import { withTimeout } from "../utils/async";
import { createLogger } from "../utils/logger";
import { isTerminalStatusText } from "./MatchStateMachine";
import {
  clickTab,
  readLiveState,
  readMatchInfo,
  readMatchList,
  readMatchStatusText,
  readScorecard,
  readSquads,
} from "./pageScripts";

export interface BrowserConfig {
  headless: boolean;
  /** Chromium binary; playwright-core ships none of its own */
  executablePath?: string;
  navigationTimeoutMs: number;
  /** Wait after navigation for client-side rendering */
  pageSettleMs: number;
  /** Wait after switching tabs */
  tabSettleMs: number;
  /** Upper bound on one in-page script run */
  operationTimeoutMs: number;
}

export const DEFAULT_BROWSER_CONFIG: BrowserConfig = {
  headless: true,
  navigationTimeoutMs: 30_000,
  pageSettleMs: 5_000,
  tabSettleMs: 2_000,
  operationTimeoutMs: TIMING.PAGE_OPERATION_TIMEOUT,
};

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 " +
  "(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

async function openPage(config: BrowserConfig): Promise<{ browser: Browser; page: Page }> {
  const browser = await chromium.launch({
    headless: config.headless,
    executablePath: config.executablePath,
    args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-gpu"],
  });
  try {
    const context = await browser.newContext({
      userAgent: USER_AGENT,
      viewport: { width: 1920, height: 1080 },
    });
    const page = await context.newPage();
    return { browser, page };
  } catch (err) {
    await browser.close();
    throw err;
  }
}

interface Extraction<K extends SnapshotKind> {
  tab: string;
  read: () => SnapshotPayloads[K] | null;
}

const EXTRACTIONS: { [K in SnapshotKind]: Extraction<K> } = {
  info: { tab: "info", read: readMatchInfo },
  squads: { tab: "squad", read: readSquads },
  live: { tab: "live", read: readLiveState },
  scorecard: { tab: "scorecard", read: readScorecard },
};

interface OpenSession {
  browser: Browser;
  page: Page;
}

export class PlaywrightExtractor implements PageExtractor {
  private readonly config: BrowserConfig;
  private readonly sessions = new Map<string, OpenSession>();
  private readonly log = createLogger("Extractor");
  private nextSessionId = 1;

  constructor(config: Partial<BrowserConfig> = {}) {
    this.config = { ...DEFAULT_BROWSER_CONFIG, ...config };
  }

  async open(url: string): Promise<ExtractorSession> {
    let opened: OpenSession;
    try {
      opened = await openPage(this.config);
    } catch (err) {
      throw new ExtractionError(`Failed to launch browser: ${describeError(err)}`, "open", { cause: err });
    }

    try {
      await opened.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.config.navigationTimeoutMs });
      await opened.page.waitForTimeout(this.config.pageSettleMs);
    } catch (err) {
      await opened.browser.close().catch((closeErr) => this.log.error("Failed to close browser", closeErr));
      throw new ExtractionError(`Failed to load ${url}: ${describeError(err)}`, "open", { cause: err });
    }

    const session: ExtractorSession = { id: `session-${this.nextSessionId++}`, url };
    this.sessions.set(session.id, opened);
    this.log.info(`Opened ${session.id} for ${url}`);
    return session;
  }

  async fetch<K extends SnapshotKind>(session: ExtractorSession, kind: K): Promise<SnapshotPayloads[K] | null> {
    const { page } = this.requireSession(session);
    const extraction: Extraction<K> = EXTRACTIONS[kind];
    try {
      const timeout = this.config.operationTimeoutMs;
      const switched = await withTimeout(
        page.evaluate(clickTab, extraction.tab),
        timeout,
        `Switching to ${kind} tab`,
      );
      if (switched) {
        await page.waitForTimeout(this.config.tabSettleMs);
      }
      return await withTimeout(page.evaluate(extraction.read), timeout, `Reading ${kind}`);
    } catch (err) {
      throw new ExtractionError(`Failed to extract ${kind}: ${describeError(err)}`, kind, { cause: err });
    }
  }

  async isEnded(session: ExtractorSession): Promise<boolean> {
    const { page } = this.requireSession(session);
    try {
      const statusText = await withTimeout(
        page.evaluate(readMatchStatusText),
        this.config.operationTimeoutMs,
        "Reading match status",
      );
      return isTerminalStatusText(statusText);
    } catch (err) {
      throw new ExtractionError(`Failed to read match status: ${describeError(err)}`, "isEnded", { cause: err });
    }
  }

  async close(session: ExtractorSession): Promise<void> {
    const opened = this.sessions.get(session.id);
    if (!opened) return;
    this.sessions.delete(session.id);
    await opened.browser.close();
    this.log.info(`Closed ${session.id}`);
  }

  openSessionCount(): number {
    return this.sessions.size;
  }

  private requireSession(session: ExtractorSession): OpenSession {
    const opened = this.sessions.get(session.id);
    if (!opened) {
      throw new ExtractionError(`Unknown or closed session ${session.id}`, "session");
    }
    return opened;
  }
}

export class PlaywrightMatchListSource implements MatchListSource {
  private readonly listUrl: string;
  private readonly config: BrowserConfig;
  private readonly log = createLogger("Discovery");
  private opened: OpenSession | null = null;

  constructor(listUrl: string, config: Partial<BrowserConfig> = {}) {
    this.listUrl = listUrl;
    this.config = { ...DEFAULT_BROWSER_CONFIG, ...config };
  }

  async initialize(): Promise<void> {
    if (this.opened) return;
    try {
      this.opened = await openPage(this.config);
    } catch (err) {
      throw new SchedulerInitError(`Failed to start discovery browser: ${describeError(err)}`, { cause: err });
    }
    this.log.info("Discovery browser ready");
  }

  async fetchMatchList(): Promise<RawMatchRecord[]> {
    if (!this.opened) {
      throw new ExtractionError("Discovery source not initialized", "fetchMatchList");
    }
    const { page } = this.opened;
    try {
      await page.goto(this.listUrl, { waitUntil: "domcontentloaded", timeout: this.config.navigationTimeoutMs });
      await page.waitForTimeout(this.config.pageSettleMs);
      const records = await withTimeout(
        page.evaluate(readMatchList),
        this.config.operationTimeoutMs,
        "Reading match list",
      );
      this.log.info(`Found ${records.length} match cards on ${this.listUrl}`);
      return records.map((record) => ({ ...record, url: this.resolveUrl(record.url) }));
    } catch (err) {
      throw new ExtractionError(`Failed to read match list: ${describeError(err)}`, "fetchMatchList", { cause: err });
    }
  }

  async close(): Promise<void> {
    const opened = this.opened;
    this.opened = null;
    if (opened) {
      await opened.browser.close();
      this.log.info("Discovery browser closed");
    }
  }

  /** Card links are usually site-relative. */
  private resolveUrl(href: string): string {
    if (!href) return href;
    try {
      return new URL(href, this.listUrl).toString();
    } catch {
      return href;
    }
  }
}
