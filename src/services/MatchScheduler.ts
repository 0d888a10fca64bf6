/**
 * Match Scheduler
 *
 * Owns the in-memory match list and the active tracker map, and drives them
 * from two independent timers:
 * - discovery refresh (default every 15 minutes)
 * - transition tick (default every minute)
 *
 * All mutations of the shared state happen inside `lock`. Browser I/O
 * (provisioning, end checks) runs outside it, so a slow page never holds up
 * a discovery refresh. Ticks never overlap: a tick requested while one is
 * still running is skipped. Provisioning runs as a background task that the
 * tick starts but does not wait for; end checks are bounded per tracker.
 *
 * Events:
 *   statusChange    { matchId, from, to }
 *   trackerStarted  { matchId }
 *   trackerStopped  { matchId, reason }
 *   tickStarted / tickFinished
 */

import { EventEmitter } from "events";
import { describeError, SchedulerInitError } from "../errors";
import { MatchStatus, TIMING } from "../types";
import type {
  Match,
  MatchData,
  MatchDataStore,
  MatchListSource,
  PageExtractor,
  RawMatchRecord,
  SchedulerStats,
  SchedulerStatus,
  StoredMatch,
} from "../types";
import { AsyncLock, settlesWithin } from "../utils/async";
import { createLogger } from "../utils/logger";
import { evaluateTransition, isProvisioningDue, needsEndCheck, TransitionAction } from "./MatchStateMachine";
import { parseMatchRecords } from "./MatchTimeParser";
import { MatchTracker } from "./MatchTracker";
import type { MatchTrackerConfig } from "./MatchTracker";

export interface MatchSchedulerConfig {
  discoveryIntervalMs: number;
  tickIntervalMs: number;
  preRollMs: number;
  maxLateStartMs: number;
  shutdownTimeoutMs: number;
  defaultTimeZone: string;
  tracker: Partial<MatchTrackerConfig>;
}

export const DEFAULT_SCHEDULER_CONFIG: MatchSchedulerConfig = {
  discoveryIntervalMs: TIMING.DISCOVERY_INTERVAL,
  tickIntervalMs: TIMING.TICK_INTERVAL,
  preRollMs: TIMING.PRE_ROLL,
  maxLateStartMs: TIMING.MAX_LATE_START,
  shutdownTimeoutMs: TIMING.SHUTDOWN_TIMEOUT,
  defaultTimeZone: "UTC",
  tracker: {},
};

export interface MatchSchedulerDeps {
  store: MatchDataStore;
  source: MatchListSource;
  extractor: PageExtractor;
  /** Injectable wall clock (epoch ms) */
  now?: () => number;
}

export interface RefreshResult {
  accepted: number;
  dropped: number;
  carriedForward: number;
}

export interface StatusChangeEvent {
  matchId: string;
  from: MatchStatus;
  to: MatchStatus;
}

/** The single owned state object; only touched inside the scheduler lock. */
interface SchedulerState {
  matches: Map<string, Match>;
  trackers: Map<string, MatchTracker>;
  provisioning: Map<string, MatchTracker>;
}

function toStoredMatch(match: Match): StoredMatch {
  return {
    id: match.id,
    teams: match.teams,
    format: match.format,
    dateTime: new Date(match.scheduledStart).toISOString(),
    url: match.url,
    status: match.status,
  };
}

export class MatchScheduler extends EventEmitter {
  private readonly store: MatchDataStore;
  private readonly source: MatchListSource;
  private readonly extractor: PageExtractor;
  private readonly now: () => number;
  private readonly config: MatchSchedulerConfig;
  private readonly log = createLogger("Scheduler");

  private readonly state: SchedulerState = {
    matches: new Map(),
    trackers: new Map(),
    provisioning: new Map(),
  };
  private readonly lock = new AsyncLock();

  private running = false;
  private stopping: Promise<void> | null = null;
  private discoveryInterval: NodeJS.Timeout | null = null;
  private tickInterval: NodeJS.Timeout | null = null;
  private tickInFlight: Promise<void> | null = null;
  private readonly provisionTasks = new Set<Promise<void>>();

  private stats: SchedulerStats = {
    ticks: 0,
    ticksSkipped: 0,
    refreshes: 0,
    refreshFailures: 0,
    provisionFailures: 0,
    lastRefreshAt: 0,
    lastTickAt: 0,
  };

  constructor(deps: MatchSchedulerDeps, config: Partial<MatchSchedulerConfig> = {}) {
    super();
    this.store = deps.store;
    this.source = deps.source;
    this.extractor = deps.extractor;
    this.now = deps.now ?? Date.now;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Bring up the discovery browser, load the first match list, then start
   * both timers.
   * @throws SchedulerInitError when the discovery source cannot start
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log.warn("Scheduler already running");
      return;
    }
    if (this.stopping) {
      throw new SchedulerInitError("Scheduler has been stopped and cannot be restarted");
    }

    this.log.info("Initializing scheduler");
    try {
      await this.source.initialize();
    } catch (err) {
      throw err instanceof SchedulerInitError
        ? err
        : new SchedulerInitError(`Failed to initialize discovery source: ${describeError(err)}`, { cause: err });
    }

    this.running = true;
    this.log.info(
      `Scheduler started (discovery every ${this.config.discoveryIntervalMs / 1000}s, ` +
        `tick every ${this.config.tickIntervalMs / 1000}s, pre-roll ${this.config.preRollMs / 1000}s)`,
    );

    await this.refreshMatches();

    this.discoveryInterval = setInterval(() => {
      this.refreshMatches().catch((err) => this.log.error("Periodic discovery failed", err));
    }, this.config.discoveryIntervalMs);

    this.tickInterval = setInterval(() => {
      this.tick().catch((err) => this.log.error("Periodic tick failed", err));
    }, this.config.tickIntervalMs);
  }

  /**
   * Stop both timers and every tracker (active or still provisioning), then
   * close the discovery source. Waits at most `shutdownTimeoutMs`.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.log.info("Stopping scheduler");
    this.running = false;

    if (this.discoveryInterval) {
      clearInterval(this.discoveryInterval);
      this.discoveryInterval = null;
    }
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }

    const pendingTick = this.tickInFlight;
    const drain = async () => {
      await this.stopAllTrackers();
      if (pendingTick) await pendingTick;
      // A provision that was mid-flight may have registered one more tracker
      await this.whenProvisioningSettled();
      await this.stopAllTrackers();
    };

    const finished = await settlesWithin(drain(), this.config.shutdownTimeoutMs);
    if (!finished) {
      this.log.warn(`Trackers did not all stop within ${this.config.shutdownTimeoutMs}ms`);
    }

    try {
      await this.source.close();
    } catch (err) {
      this.log.error("Failed to close discovery source", err);
    }
    this.log.info("Scheduler stopped");
  }

  private async stopAllTrackers(): Promise<void> {
    const trackers = await this.lock.runExclusive(() => {
      const all = [...this.state.trackers.values(), ...this.state.provisioning.values()];
      this.state.trackers.clear();
      this.state.provisioning.clear();
      return all;
    });

    await Promise.all(
      trackers.map(async (tracker) => {
        this.log.info(`Stopping tracker for match ${tracker.matchId}`);
        await tracker.stop();
        this.emit("trackerStopped", { matchId: tracker.matchId, reason: "shutdown" });
      }),
    );
  }

  // ==========================================================================
  // DISCOVERY
  // ==========================================================================

  /**
   * Replace the match list with a fresh discovery pass and persist it.
   * Tracked matches missing from the new list are carried forward; matches
   * present in both keep their current status. Returns null when the source
   * could not be read.
   */
  async refreshMatches(): Promise<RefreshResult | null> {
    if (!this.running) return null;

    this.log.info("Updating match list");
    this.stats.lastRefreshAt = this.now();

    let records: RawMatchRecord[];
    try {
      records = await this.source.fetchMatchList();
    } catch (err) {
      this.stats.refreshFailures++;
      this.log.error("Failed to fetch match list", err);
      return null;
    }

    const parsed = parseMatchRecords(records, {
      defaultTimeZone: this.config.defaultTimeZone,
      log: this.log,
    });

    const result = await this.lock.runExclusive(() => {
      const previous = this.state.matches;
      const next = new Map<string, Match>();

      for (const fresh of parsed.matches) {
        next.set(fresh.id, previous.get(fresh.id) ?? fresh);
      }

      let carriedForward = 0;
      const trackedIds = [...this.state.trackers.keys(), ...this.state.provisioning.keys()];
      for (const id of trackedIds) {
        const tracked = previous.get(id);
        if (!next.has(id) && tracked) {
          next.set(id, tracked);
          carriedForward++;
          this.log.warn(`Match ${id} dropped out of discovery while tracked, keeping it`);
        }
      }

      this.state.matches = next;
      this.persistMatchList();
      return { accepted: parsed.matches.length, dropped: parsed.dropped, carriedForward };
    });

    this.stats.refreshes++;
    this.log.info(
      `Updated match list with ${result.accepted} matches` +
        (result.dropped ? `, dropped ${result.dropped}` : "") +
        (result.carriedForward ? `, carried forward ${result.carriedForward}` : ""),
    );
    return result;
  }

  private persistMatchList(): void {
    try {
      this.store.putMatchList([...this.state.matches.values()].map(toStoredMatch));
    } catch (err) {
      this.log.error("Failed to store match list", err);
    }
  }

  // ==========================================================================
  // TICK
  // ==========================================================================

  /**
   * Evaluate every known match against the clock. Resolves false when the
   * tick was skipped (scheduler not running, or a tick already in flight).
   */
  async tick(): Promise<boolean> {
    if (!this.running) return false;
    if (this.tickInFlight) {
      this.stats.ticksSkipped++;
      this.log.warn("Previous tick still running, skipping this one");
      return false;
    }

    this.tickInFlight = this.runTick();
    try {
      await this.tickInFlight;
      return true;
    } finally {
      this.tickInFlight = null;
    }
  }

  private async runTick(): Promise<void> {
    this.emit("tickStarted");
    const now = this.now();
    this.stats.ticks++;
    this.stats.lastTickAt = now;

    try {
      const plan = await this.lock.runExclusive(() =>
        [...this.state.matches.values()]
          .filter((match) => match.status !== MatchStatus.COMPLETED)
          .map((match) => ({ match, tracker: this.state.trackers.get(match.id) ?? null })),
      );

      // Each match is isolated: one failing page never aborts the tick
      await Promise.all(
        plan.map(({ match, tracker }) =>
          this.evaluateMatch(match, tracker, now).catch((err) =>
            this.log.error(`Error checking match ${match.id}`, err),
          ),
        ),
      );

      const violations = this.checkInvariants();
      for (const violation of violations) {
        this.log.warn(`Invariant violated: ${violation}`);
      }
    } finally {
      this.emit("tickFinished");
    }
  }

  private async evaluateMatch(match: Match, tracker: MatchTracker | null, now: number): Promise<void> {
    const hasTracker = tracker !== null;
    const ended = tracker && needsEndCheck(match.status, hasTracker) ? await tracker.checkIfEnded() : false;

    const { next, action } = evaluateTransition({
      status: match.status,
      now,
      scheduledStart: match.scheduledStart,
      hasTracker,
      ended,
      preRollMs: this.config.preRollMs,
      maxLateStartMs: this.config.maxLateStartMs,
    });

    switch (action) {
      case TransitionAction.NONE:
        return;

      case TransitionAction.PROVISION:
        this.startProvisioning(match);
        return;

      case TransitionAction.START_LIVE:
        if (!tracker) return;
        this.log.info(`Match ${match.id} has started, switching to live mode`);
        tracker.startLiveTracking();
        await this.setStatus(match, next);
        return;

      case TransitionAction.COMPLETE:
        if (!tracker) return;
        this.log.info(`Match ${match.id} has ended, stopping tracker`);
        await tracker.stop();
        await this.lock.runExclusive(() => {
          if (this.state.trackers.get(match.id) === tracker) {
            this.state.trackers.delete(match.id);
          }
        });
        this.emit("trackerStopped", { matchId: match.id, reason: "completed" });
        await this.setStatus(match, next);
        return;
    }
  }

  private startProvisioning(match: Match): void {
    const task = this.provisionTracker(match)
      .catch((err) => this.log.error(`Provisioning match ${match.id} failed`, err))
      .finally(() => this.provisionTasks.delete(task));
    this.provisionTasks.add(task);
  }

  /** Resolves once no provisioning task is in flight. */
  async whenProvisioningSettled(): Promise<void> {
    while (this.provisionTasks.size > 0) {
      await Promise.allSettled([...this.provisionTasks]);
    }
  }

  private async provisionTracker(match: Match): Promise<void> {
    const tracker = new MatchTracker(match, this.extractor, this.store, this.config.tracker);
    const claimed = await this.lock.runExclusive(() => {
      if (!this.running || this.state.trackers.has(match.id) || this.state.provisioning.has(match.id)) {
        return false;
      }
      this.state.provisioning.set(match.id, tracker);
      return true;
    });
    if (!claimed) return;

    this.log.info(`Match ${match.id} is about to start, preparing tracker`);
    try {
      await tracker.provision();
    } catch (err) {
      this.stats.provisionFailures++;
      this.log.error(`Could not provision match ${match.id}, will retry next tick`, err);
      await this.lock.runExclusive(() => {
        if (this.state.provisioning.get(match.id) === tracker) {
          this.state.provisioning.delete(match.id);
        }
      });
      await tracker.stop();
      return;
    }

    const registered = await this.lock.runExclusive(() => {
      if (this.state.provisioning.get(match.id) !== tracker) return false;
      this.state.provisioning.delete(match.id);
      if (!this.running) return false;
      this.state.trackers.set(match.id, tracker);
      return true;
    });
    if (!registered) {
      await tracker.stop();
      return;
    }

    this.emit("trackerStarted", { matchId: match.id });
    if (match.status === MatchStatus.LIVE) {
      // Recovered a live match that had lost its tracker
      tracker.startLiveTracking();
    }
  }

  private async setStatus(match: Match, next: MatchStatus): Promise<void> {
    const from = match.status;
    if (from === next) return;

    await this.lock.runExclusive(() => {
      match.status = next;
    });
    try {
      this.store.putMatchStatus(match.id, next);
    } catch (err) {
      this.log.error(`Failed to persist status of match ${match.id}`, err);
    }
    const event: StatusChangeEvent = { matchId: match.id, from, to: next };
    this.emit("statusChange", event);
  }

  // ==========================================================================
  // STATUS
  // ==========================================================================

  /** Point-in-time summary from memory only. */
  getStatus(): SchedulerStatus {
    const countsByStatus: Record<MatchStatus, number> = {
      [MatchStatus.UPCOMING]: 0,
      [MatchStatus.LIVE]: 0,
      [MatchStatus.COMPLETED]: 0,
    };
    for (const match of this.state.matches.values()) {
      countsByStatus[match.status]++;
    }
    return {
      running: this.running,
      matchCount: this.state.matches.size,
      activeIds: [...this.state.trackers.keys()],
      countsByStatus,
    };
  }

  getStats(): SchedulerStats {
    return { ...this.stats };
  }

  /**
   * Check "a tracker exists iff the match is UPCOMING inside its pre-roll
   * window or LIVE". Returns a description of every violation.
   */
  checkInvariants(): string[] {
    const violations: string[] = [];
    const now = this.now();

    for (const match of this.state.matches.values()) {
      const hasTracker = this.state.trackers.has(match.id);
      switch (match.status) {
        case MatchStatus.LIVE:
          if (!hasTracker) violations.push(`match ${match.id} is LIVE without a tracker`);
          break;
        case MatchStatus.COMPLETED:
          if (hasTracker) violations.push(`match ${match.id} is COMPLETED but still tracked`);
          break;
        case MatchStatus.UPCOMING:
          if (
            hasTracker &&
            !isProvisioningDue(now, match.scheduledStart, this.config.preRollMs, Number.POSITIVE_INFINITY)
          ) {
            violations.push(`match ${match.id} is tracked before its pre-roll window`);
          }
          break;
      }
    }

    for (const id of this.state.trackers.keys()) {
      if (!this.state.matches.has(id)) {
        violations.push(`tracker for ${id} has no match`);
      }
    }
    return violations;
  }

  isRunning(): boolean {
    return this.running;
  }

  // Read accessors delegated to the store

  getMatchList(): StoredMatch[] {
    return this.store.getMatchList();
  }

  getMatchData(matchId: string): MatchData {
    return this.store.getMatchData(matchId);
  }
}
