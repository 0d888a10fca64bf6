/**
 * Match Tracker
 *
 * Owns one extractor session for one match:
 * - provision(): open the session and pull info + squads, with bounded retry
 * - startLiveTracking(): poll live state + scorecard until stopped
 * - checkIfEnded(): ask the page whether the match is over
 * - stop(): cancel the loop and release the session (idempotent)
 *
 * All session calls go through `sessionLock`, so the poll loop, end checks
 * and provisioning never talk to the browser at the same time.
 */

import { ExtractionError, ProvisioningError } from "../errors";
import { PROVISION_MAX_ATTEMPTS, TIMING } from "../types";
import type {
  ExtractorSession,
  Match,
  MatchDataStore,
  PageExtractor,
  SnapshotKind,
} from "../types";
import { AsyncLock, settlesWithin, sleep, withTimeout } from "../utils/async";
import { createLogger } from "../utils/logger";
import type { Logger } from "../utils/logger";

export interface MatchTrackerConfig {
  livePollIntervalMs: number;
  /** Longest wait for the session when checking for the end of the match */
  endCheckTimeoutMs: number;
  maxProvisionAttempts: number;
  provisionRetryDelayMs: number;
  stopTimeoutMs: number;
}

export const DEFAULT_TRACKER_CONFIG: MatchTrackerConfig = {
  livePollIntervalMs: TIMING.LIVE_POLL_INTERVAL,
  endCheckTimeoutMs: TIMING.END_CHECK_TIMEOUT,
  maxProvisionAttempts: PROVISION_MAX_ATTEMPTS,
  provisionRetryDelayMs: TIMING.PROVISION_RETRY_DELAY,
  stopTimeoutMs: TIMING.TRACKER_STOP_TIMEOUT,
};

export interface TrackerStats {
  provisionAttempts: number;
  polls: number;
  pollFailures: number;
  lastPollAt: number;
}

export class MatchTracker {
  readonly matchId: string;
  private readonly url: string;
  private readonly extractor: PageExtractor;
  private readonly store: MatchDataStore;
  private readonly config: MatchTrackerConfig;
  private readonly log: Logger;

  private session: ExtractorSession | null = null;
  private readonly sessionLock = new AsyncLock();
  private readonly abort = new AbortController();
  private provisioning: Promise<void> | null = null;
  private loop: Promise<void> | null = null;
  private polling = false;
  private stopping: Promise<void> | null = null;

  private stats: TrackerStats = {
    provisionAttempts: 0,
    polls: 0,
    pollFailures: 0,
    lastPollAt: 0,
  };

  constructor(
    match: Pick<Match, "id" | "url">,
    extractor: PageExtractor,
    store: MatchDataStore,
    config: Partial<MatchTrackerConfig> = {},
  ) {
    this.matchId = match.id;
    this.url = match.url;
    this.extractor = extractor;
    this.store = store;
    this.config = { ...DEFAULT_TRACKER_CONFIG, ...config };
    this.log = createLogger(`Tracker ${match.id}`);
  }

  get pollingActive(): boolean {
    return this.polling;
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  isProvisioned(): boolean {
    return this.session !== null;
  }

  getStats(): TrackerStats {
    return { ...this.stats };
  }

  // ==========================================================================
  // PROVISIONING
  // ==========================================================================

  /**
   * Open a session and pull the static snapshots. Each attempt starts from a
   * fresh session; a failed attempt closes what it opened.
   * @throws ProvisioningError once every attempt has failed or the tracker was stopped
   */
  provision(): Promise<void> {
    if (this.session) return Promise.resolve();
    if (!this.provisioning) {
      this.provisioning = this.provisionWithRetry().finally(() => {
        this.provisioning = null;
      });
    }
    return this.provisioning;
  }

  private async provisionWithRetry(): Promise<void> {
    const maxAttempts = this.config.maxProvisionAttempts;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.stopped) {
        throw new ProvisioningError(this.matchId, attempt - 1, new Error("tracker stopped"));
      }
      this.stats.provisionAttempts++;
      try {
        await this.sessionLock.runExclusive(() => this.initializeSession());
        this.log.info(`Provisioned (attempt ${attempt}/${maxAttempts})`);
        return;
      } catch (err) {
        lastError = err;
        this.log.error(`Provisioning attempt ${attempt}/${maxAttempts} failed`, err);
        if (attempt < maxAttempts) {
          await sleep(this.config.provisionRetryDelayMs, this.abort.signal);
        }
      }
    }

    throw new ProvisioningError(this.matchId, maxAttempts, lastError);
  }

  private async initializeSession(): Promise<void> {
    const session = await this.extractor.open(this.url);
    try {
      if (this.stopped) throw new Error("tracker stopped while opening session");
      await this.pullSnapshot(session, "info");
      await this.pullSnapshot(session, "squads");
      if (this.stopped) throw new Error("tracker stopped during initial pull");
    } catch (err) {
      await this.closeSession(session);
      throw err;
    }
    this.session = session;
  }

  // ==========================================================================
  // LIVE TRACKING
  // ==========================================================================

  startLiveTracking(): void {
    if (this.loop || this.stopped) return;
    if (!this.session) {
      throw new Error(`Tracker for match ${this.matchId} is not provisioned`);
    }
    this.polling = true;
    this.loop = this.runLiveLoop();
    this.log.info(`Live tracking started (every ${this.config.livePollIntervalMs / 1000}s)`);
  }

  private async runLiveLoop(): Promise<void> {
    try {
      while (!this.stopped) {
        await this.pollOnce();
        await sleep(this.config.livePollIntervalMs, this.abort.signal);
      }
    } finally {
      this.polling = false;
      this.log.info("Live tracking loop exited");
    }
  }

  private async pollOnce(): Promise<void> {
    await this.sessionLock.runExclusive(async () => {
      const session = this.session;
      if (!session || this.stopped) return;

      for (const kind of ["live", "scorecard"] as const) {
        try {
          await this.pullSnapshot(session, kind);
        } catch (err) {
          this.stats.pollFailures++;
          this.log.error(`Live poll of ${kind} failed`, err);
        }
      }
      this.stats.polls++;
      this.stats.lastPollAt = Date.now();
    });
  }

  private async pullSnapshot<K extends SnapshotKind>(session: ExtractorSession, kind: K): Promise<void> {
    const payload = await this.extractor.fetch(session, kind);
    if (payload === null) {
      throw new ExtractionError(`No ${kind} data on page`, kind);
    }
    this.store.putSnapshot(this.matchId, kind, payload);
  }

  // ==========================================================================
  // END DETECTION / SHUTDOWN
  // ==========================================================================

  /**
   * False when unprovisioned, stopped, or the page could not be read within
   * `endCheckTimeoutMs` (a poll wedged on the page holds the session lock).
   */
  async checkIfEnded(): Promise<boolean> {
    if (this.stopped) return false;
    const check = this.sessionLock.runExclusive(async () => {
      const session = this.session;
      if (!session || this.stopped) return false;
      return this.extractor.isEnded(session);
    });
    try {
      return await withTimeout(check, this.config.endCheckTimeoutMs, `End check for match ${this.matchId}`);
    } catch (err) {
      this.log.error("Error checking whether match has ended", err);
      return false;
    }
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.log.info("Stopping tracker");
    this.abort.abort();

    const inFlight = [this.loop, this.provisioning].filter(
      (p): p is Promise<void> => p !== null,
    );
    if (inFlight.length > 0) {
      const settled = await settlesWithin(Promise.allSettled(inFlight), this.config.stopTimeoutMs);
      if (!settled) {
        this.log.warn(`Tracker did not wind down within ${this.config.stopTimeoutMs}ms, closing session anyway`);
      }
    }

    // Unconditional release, even if a pull is still hanging on the page
    const session = this.session;
    this.session = null;
    if (session) {
      await this.closeSession(session);
    }
    this.polling = false;
    this.log.info(`Tracker stopped (polls=${this.stats.polls}, failures=${this.stats.pollFailures})`);
  }

  private async closeSession(session: ExtractorSession): Promise<void> {
    try {
      await this.extractor.close(session);
    } catch (err) {
      this.log.error(`Failed to close session ${session.id}`, err);
    }
  }
}

