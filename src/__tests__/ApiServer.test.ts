import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";

import { ApiServer } from "../services/ApiServer";
import type { MatchStatusProvider } from "../services/ApiServer";
import { MatchStatus } from "../types";
import type { AppStatus, MatchData, StoredMatch } from "../types";
import { configureLogging } from "../utils/logger";
import { SAMPLE_PAYLOADS } from "./fakes";

const MATCH: StoredMatch = {
  id: "m1",
  teams: "Team A vs Team B",
  format: "T20",
  dateTime: "2026-01-10T10:03:00.000Z",
  url: "https://fixtures.example.test/match/m1",
  status: MatchStatus.LIVE,
};

const STATUS: AppStatus = {
  scheduler: {
    running: true,
    matchCount: 1,
    activeIds: ["m1"],
    countsByStatus: { [MatchStatus.UPCOMING]: 0, [MatchStatus.LIVE]: 1, [MatchStatus.COMPLETED]: 0 },
    stats: {
      ticks: 4,
      ticksSkipped: 0,
      refreshes: 1,
      refreshFailures: 0,
      provisionFailures: 0,
      lastRefreshAt: 0,
      lastTickAt: 0,
    },
  },
  dataStore: {
    totalMatches: 1,
    matchesByStatus: { [MatchStatus.UPCOMING]: 0, [MatchStatus.LIVE]: 1, [MatchStatus.COMPLETED]: 0 },
    totalStorageBytes: 2048,
    totalStorageMb: 0,
    lastUpdated: "2026-01-10T10:30:00.000Z",
  },
  timestamp: "2026-01-10T10:30:00.000Z",
};

const provider: MatchStatusProvider = {
  getStatus: () => STATUS,
  getMatchList: () => [MATCH],
  getMatchData: (): MatchData => ({ info: SAMPLE_PAYLOADS.info, squads: null, live: SAMPLE_PAYLOADS.live, scorecard: null }),
};

describe("ApiServer", () => {
  let server: ApiServer;
  let baseUrl: string;

  before(async () => {
    configureLogging({ level: "ERROR" });
    server = new ApiServer(provider, 0);
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  after(async () => {
    await server.stop();
  });

  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    assert.equal(res.status, 200);
    const body = await res.json();
    assert.equal(body.status, "success");
    assert.deepEqual(body.data, { healthy: true });
  });

  it("serves the application status", async () => {
    const res = await fetch(`${baseUrl}/api/status`);
    assert.deepEqual(await res.json(), { status: "success", data: STATUS, timestamp: STATUS.timestamp });
  });

  it("lists matches", async () => {
    const res = await fetch(`${baseUrl}/api/matches`);
    assert.deepEqual(await res.json(), { status: "success", data: [MATCH] });
  });

  it("serves one match with its snapshots", async () => {
    const res = await fetch(`${baseUrl}/api/matches/m1`);
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      status: "success",
      data: { match: MATCH, info: SAMPLE_PAYLOADS.info, squads: null, live: SAMPLE_PAYLOADS.live, scorecard: null },
    });
  });

  it("returns 404 for an unknown match", async () => {
    const res = await fetch(`${baseUrl}/api/matches/unknown`);
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { status: "error", error: "Match unknown not found" });
  });
});

describe("ApiServer with an API key", () => {
  let server: ApiServer;
  let baseUrl: string;

  before(async () => {
    server = new ApiServer(provider, 0, "test-secret");
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  after(async () => {
    await server.stop();
  });

  it("rejects requests without the key", async () => {
    const res = await fetch(`${baseUrl}/api/status`);
    assert.equal(res.status, 401);
    assert.deepEqual(await res.json(), { status: "error", error: "Unauthorized" });
  });

  it("accepts requests with the key", async () => {
    const res = await fetch(`${baseUrl}/api/status`, { headers: { "x-api-key": "test-secret" } });
    assert.equal(res.status, 200);
  });
});
