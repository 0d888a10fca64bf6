/**
 * JSON file store for the match list and per-match snapshots.
 *
 * Layout under the data directory:
 *   match-list.json
 *   matches/<id>/info.json
 *   matches/<id>/squads.json
 *   matches/<id>/live/<timestamp>.json       + live/latest.json
 *   matches/<id>/scorecard/<timestamp>.json  + scorecard/latest.json
 */

import { createHash } from "crypto";
import * as fs from "fs";
import * as path from "path";
import { MatchStatus } from "../types";
import type {
  MatchData,
  MatchDataStore,
  SnapshotKind,
  SnapshotPayloads,
  StorageStats,
  StoredMatch,
} from "../types";
import { createLogger } from "../utils/logger";

const MATCH_LIST_FILE = "match-list.json";
const LATEST_FILE = "latest.json";

// Kinds that keep a timestamped history next to latest.json
const HISTORY_KINDS: ReadonlySet<SnapshotKind> = new Set<SnapshotKind>(["live", "scorecard"]);

const log = createLogger("DataStore");

/** 2025-03-12T14:30:00.123Z -> 2025-03-12T14-30-00-123Z */
export function snapshotFileName(at: number): string {
  return `${new Date(at).toISOString().replace(/[:.]/g, "-")}.json`;
}

/**
 * Match ids become directory names; keep them to one safe path segment. An id
 * that needed rewriting gets a short hash of the original, so "a.b" and "a_b"
 * never share a directory.
 */
export function matchDirName(matchId: string): string {
  const safe = matchId.replace(/[^A-Za-z0-9_-]/g, "_");
  if (safe === matchId) return safe;
  const digest = createHash("sha1").update(matchId).digest("hex").slice(0, 8);
  return `${safe}-${digest}`;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DataStore implements MatchDataStore {
  readonly baseDir: string;
  private readonly matchListFile: string;

  constructor(baseDir: string = "./data") {
    this.baseDir = baseDir;
    this.matchListFile = path.join(baseDir, MATCH_LIST_FILE);
    fs.mkdirSync(path.join(baseDir, "matches"), { recursive: true });
  }

  // ==========================================================================
  // MATCH LIST
  // ==========================================================================

  putMatchList(matches: StoredMatch[]): void {
    this.writeJson(this.matchListFile, matches);
    log.info(`Stored ${matches.length} matches in match list`);
  }

  getMatchList(): StoredMatch[] {
    const list = this.readJson<StoredMatch[]>(this.matchListFile);
    return Array.isArray(list) ? list : [];
  }

  putMatchStatus(matchId: string, status: MatchStatus): void {
    const matches = this.getMatchList();
    const target = matches.find((m) => m.id === matchId);
    if (!target) {
      log.warn(`Match ${matchId} not in stored match list, status ${status} not persisted`);
      return;
    }
    target.status = status;
    this.writeJson(this.matchListFile, matches);
    log.info(`Updated status of match ${matchId} to ${status}`);
  }

  // ==========================================================================
  // SNAPSHOTS
  // ==========================================================================

  putSnapshot<K extends SnapshotKind>(
    matchId: string,
    kind: K,
    payload: SnapshotPayloads[K],
    at: number = Date.now(),
  ): void {
    const matchDir = this.matchDir(matchId);
    if (HISTORY_KINDS.has(kind)) {
      const kindDir = path.join(matchDir, kind);
      fs.mkdirSync(kindDir, { recursive: true });
      this.writeJson(path.join(kindDir, snapshotFileName(at)), payload);
      this.writeJson(path.join(kindDir, LATEST_FILE), payload);
    } else {
      fs.mkdirSync(matchDir, { recursive: true });
      this.writeJson(path.join(matchDir, `${kind}.json`), payload);
    }
    log.debug(`Stored ${kind} for match ${matchId}`);
  }

  getMatchData(matchId: string): MatchData {
    return {
      info: this.readSnapshot(matchId, "info"),
      squads: this.readSnapshot(matchId, "squads"),
      live: this.readSnapshot(matchId, "live"),
      scorecard: this.readSnapshot(matchId, "scorecard"),
    };
  }

  /** Timestamped history files for live/scorecard, oldest first. */
  listSnapshotHistory(matchId: string, kind: SnapshotKind): string[] {
    if (!HISTORY_KINDS.has(kind)) return [];
    const kindDir = path.join(this.matchDir(matchId), kind);
    if (!fs.existsSync(kindDir)) return [];
    return fs
      .readdirSync(kindDir)
      .filter((name) => name.endsWith(".json") && name !== LATEST_FILE)
      .sort();
  }

  getStorageStats(): StorageStats {
    const matches = this.getMatchList();
    const matchesByStatus: Record<MatchStatus, number> = {
      [MatchStatus.UPCOMING]: 0,
      [MatchStatus.LIVE]: 0,
      [MatchStatus.COMPLETED]: 0,
    };
    for (const match of matches) {
      if (match.status in matchesByStatus) {
        matchesByStatus[match.status]++;
      }
    }

    const totalStorageBytes = directorySize(this.baseDir);
    return {
      totalMatches: matches.length,
      matchesByStatus,
      totalStorageBytes,
      totalStorageMb: Math.round((totalStorageBytes / (1024 * 1024)) * 100) / 100,
      lastUpdated: new Date().toISOString(),
    };
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  private matchDir(matchId: string): string {
    return path.join(this.baseDir, "matches", matchDirName(matchId));
  }

  private readSnapshot<K extends SnapshotKind>(matchId: string, kind: K): SnapshotPayloads[K] | null {
    const matchDir = this.matchDir(matchId);
    const file = HISTORY_KINDS.has(kind)
      ? path.join(matchDir, kind, LATEST_FILE)
      : path.join(matchDir, `${kind}.json`);
    return this.readJson<SnapshotPayloads[K]>(file);
  }

  private readJson<T>(file: string): T | null {
    try {
      return JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (err) {
      if (!isNotFound(err)) {
        log.error(`Failed to read ${file}`, err);
      }
      return null;
    }
  }

  /** Temp file + rename: readers see the old or the new document. */
  private writeJson(file: string, data: unknown): void {
    const tmp = `${file}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf-8");
    fs.renameSync(tmp, file);
  }
}

function directorySize(dir: string): number {
  if (!fs.existsSync(dir)) return 0;
  let total = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += directorySize(full);
    } else if (entry.isFile()) {
      total += fs.statSync(full).size;
    }
  }
  return total;
}

