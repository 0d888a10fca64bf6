/**
 * Application shell: wires the store, browser extractor, discovery source,
 * scheduler and HTTP API together.
 */

import type { AppConfig } from "./config";
import { SchedulerInitError } from "./errors";
import { ApiServer } from "./services/ApiServer";
import type { MatchStatusProvider } from "./services/ApiServer";
import { DataStore } from "./services/DataStore";
import { MatchScheduler } from "./services/MatchScheduler";
import type { StatusChangeEvent } from "./services/MatchScheduler";
import { PlaywrightExtractor, PlaywrightMatchListSource } from "./services/PlaywrightExtractor";
import type { BrowserConfig } from "./services/PlaywrightExtractor";
import type { AppStatus, MatchData, MatchListSource, PageExtractor, StoredMatch } from "./types";
import { createLogger } from "./utils/logger";

export interface MatchTrackerAppDeps {
  store?: DataStore;
  extractor?: PageExtractor;
  source?: MatchListSource;
  now?: () => number;
  /** Skip the HTTP API (tests, one-off runs) */
  withApi?: boolean;
}

export class MatchTrackerApp implements MatchStatusProvider {
  readonly scheduler: MatchScheduler;
  private readonly store: DataStore;
  private readonly api: ApiServer | null;
  private readonly log = createLogger("App");
  private stopping: Promise<void> | null = null;

  constructor(config: AppConfig, deps: MatchTrackerAppDeps = {}) {
    const browser: Partial<BrowserConfig> = {
      headless: config.headless,
      executablePath: config.chromiumPath,
      pageSettleMs: config.pageSettleMs,
      operationTimeoutMs: config.pageOperationTimeoutMs,
    };

    this.store = deps.store ?? new DataStore(config.dataDir);
    this.scheduler = new MatchScheduler(
      {
        store: this.store,
        source: deps.source ?? new PlaywrightMatchListSource(config.matchListUrl, browser),
        extractor: deps.extractor ?? new PlaywrightExtractor(browser),
        now: deps.now,
      },
      {
        discoveryIntervalMs: config.discoveryIntervalMs,
        tickIntervalMs: config.tickIntervalMs,
        preRollMs: config.preRollMs,
        maxLateStartMs: config.maxLateStartMs,
        shutdownTimeoutMs: config.shutdownTimeoutMs,
        defaultTimeZone: config.defaultTimeZone,
        tracker: {
          livePollIntervalMs: config.livePollIntervalMs,
          endCheckTimeoutMs: config.endCheckTimeoutMs,
          maxProvisionAttempts: config.provisionMaxAttempts,
          provisionRetryDelayMs: config.provisionRetryDelayMs,
          stopTimeoutMs: config.trackerStopTimeoutMs,
        },
      },
    );
    this.api = deps.withApi === false ? null : new ApiServer(this, config.apiPort, config.apiKey);

    this.scheduler.on("statusChange", (event: StatusChangeEvent) => {
      this.log.info(`Match ${event.matchId}: ${event.from} -> ${event.to}`);
    });
  }

  /**
   * @throws SchedulerInitError after a controlled stop when discovery cannot start
   */
  async start(): Promise<void> {
    this.log.info("Starting match tracker");
    try {
      await this.scheduler.start();
    } catch (err) {
      if (err instanceof SchedulerInitError) {
        this.log.error("Scheduler failed to initialize, shutting down", err);
        await this.stop();
      }
      throw err;
    }
    if (this.api) {
      await this.api.start();
    }
    this.log.info("Match tracker running");
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.log.info("Stopping match tracker");
    if (this.api) {
      try {
        await this.api.stop();
      } catch (err) {
        this.log.error("Failed to stop API server", err);
      }
    }
    await this.scheduler.stop();
    this.log.info("Match tracker stopped");
  }

  getStatus(): AppStatus {
    return {
      scheduler: { ...this.scheduler.getStatus(), stats: this.scheduler.getStats() },
      dataStore: this.store.getStorageStats(),
      timestamp: new Date().toISOString(),
    };
  }

  getMatchList(): StoredMatch[] {
    return this.scheduler.getMatchList();
  }

  getMatchData(matchId: string): MatchData {
    return this.scheduler.getMatchData(matchId);
  }
}
