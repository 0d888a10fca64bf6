export enum MatchStatus {
  UPCOMING = "UPCOMING",
  LIVE = "LIVE",
  COMPLETED = "COMPLETED",
}

/**
 * A discovered match as the scheduler holds it in memory.
 * `scheduledStart` is epoch milliseconds.
 */
export interface Match {
  readonly id: string;
  readonly teams: string;
  readonly format: string;
  readonly url: string;
  readonly scheduledStart: number;
  status: MatchStatus;
}

/**
 * A match as persisted in match-list.json (start time as ISO-8601).
 */
export interface StoredMatch {
  id: string;
  teams: string;
  format: string;
  dateTime: string;
  url: string;
  status: MatchStatus;
}

/**
 * One row of the fixture list page, before the date/time text is parsed.
 * e.g. dateTime: "12 Mar 2025, 14:30 GMT"
 */
export interface RawMatchRecord {
  id: string;
  teams: string;
  format: string;
  dateTime: string;
  url: string;
}

// ============================================================================
// SNAPSHOTS
// ============================================================================

export type SnapshotKind = "info" | "squads" | "live" | "scorecard";

export const SNAPSHOT_KINDS: readonly SnapshotKind[] = ["info", "squads", "live", "scorecard"];

export interface MatchInfo {
  teams: {
    home: string;
    away: string;
  };
  matchDetails: {
    series: string;
    format: string;
    venue: string;
    date: string;
    time: string;
    toss: string;
    umpires: string[];
  };
}

export interface SquadPlayer {
  name: string;
  role: string;
  isCaptain: boolean;
  isWicketkeeper: boolean;
}

export interface Squads {
  homeTeam: { name: string; players: SquadPlayer[] };
  awayTeam: { name: string; players: SquadPlayer[] };
}

export interface BatsmanLine {
  name: string;
  runs: string;
  balls: string;
  fours: string;
  sixes: string;
  strikeRate: string;
}

export interface BowlerLine {
  name: string;
  overs: string;
  maidens: string;
  runs: string;
  wickets: string;
  economy: string;
}

export interface CommentaryItem {
  text: string;
  over: string;
  timestamp: string;
}

export interface LiveState {
  currentInnings: string;
  score: string;
  runRate: string;
  requiredRunRate: string;
  lastWicket: string;
  recentBalls: string[];
  partnership: string;
  batsmen: BatsmanLine[];
  bowlers: BowlerLine[];
  matchStatus: string;
  commentary: CommentaryItem[];
}

export interface InningsCard {
  team: string;
  totalScore: string;
  overs: string;
  extras: string;
  batsmen: Array<BatsmanLine & { dismissal: string }>;
  bowlers: BowlerLine[];
  fallOfWickets: string[];
}

export interface Scorecard {
  innings: InningsCard[];
  matchSummary: string;
  playerOfTheMatch: string;
}

export interface SnapshotPayloads {
  info: MatchInfo;
  squads: Squads;
  live: LiveState;
  scorecard: Scorecard;
}

/** Latest persisted snapshot of every kind for one match (null = never written). */
export type MatchData = { [K in SnapshotKind]: SnapshotPayloads[K] | null };

// ============================================================================
// BOUNDARIES
// ============================================================================

export interface ExtractorSession {
  readonly id: string;
  readonly url: string;
}

/**
 * Browser-backed access to a single match page. Every session is owned by
 * exactly one tracker.
 */
export interface PageExtractor {
  open(url: string): Promise<ExtractorSession>;
  fetch<K extends SnapshotKind>(
    session: ExtractorSession,
    kind: K,
  ): Promise<SnapshotPayloads[K] | null>;
  isEnded(session: ExtractorSession): Promise<boolean>;
  close(session: ExtractorSession): Promise<void>;
}

/** Scheduler-wide source of the fixture list. */
export interface MatchListSource {
  initialize(): Promise<void>;
  fetchMatchList(): Promise<RawMatchRecord[]>;
  close(): Promise<void>;
}

export interface StorageStats {
  totalMatches: number;
  matchesByStatus: Record<MatchStatus, number>;
  totalStorageBytes: number;
  totalStorageMb: number;
  lastUpdated: string;
}

export interface MatchDataStore {
  putMatchList(matches: StoredMatch[]): void;
  getMatchList(): StoredMatch[];
  putMatchStatus(matchId: string, status: MatchStatus): void;
  putSnapshot<K extends SnapshotKind>(
    matchId: string,
    kind: K,
    payload: SnapshotPayloads[K],
    at?: number,
  ): void;
  getMatchData(matchId: string): MatchData;
  getStorageStats(): StorageStats;
}

// ============================================================================
// STATUS
// ============================================================================

export interface SchedulerStatus {
  running: boolean;
  matchCount: number;
  activeIds: string[];
  countsByStatus: Record<MatchStatus, number>;
}

export interface SchedulerStats {
  ticks: number;
  ticksSkipped: number;
  refreshes: number;
  refreshFailures: number;
  provisionFailures: number;
  lastRefreshAt: number;
  lastTickAt: number;
}

// Reference cadences (ms)
export const TIMING = {
  DISCOVERY_INTERVAL: 15 * 60 * 1000,
  TICK_INTERVAL: 60 * 1000,
  PRE_ROLL: 5 * 60 * 1000,
  // No cutoff: a match is provisioned however late it is seen
  MAX_LATE_START: Number.POSITIVE_INFINITY,
  LIVE_POLL_INTERVAL: 30 * 1000,
  END_CHECK_TIMEOUT: 30 * 1000,
  PAGE_OPERATION_TIMEOUT: 30 * 1000,
  PROVISION_RETRY_DELAY: 5 * 1000,
  TRACKER_STOP_TIMEOUT: 5 * 1000,
  SHUTDOWN_TIMEOUT: 15 * 1000,
};

export const PROVISION_MAX_ATTEMPTS = 3;

/** Everything GET /api/status reports. */
export interface AppStatus {
  scheduler: SchedulerStatus & { stats: SchedulerStats };
  dataStore: StorageStats;
  timestamp: string;
}
