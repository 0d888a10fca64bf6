import { describe, it, before, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

import { ProvisioningError } from "../errors";
import { DataStore } from "../services/DataStore";
import { MatchTracker } from "../services/MatchTracker";
import type { MatchTrackerConfig } from "../services/MatchTracker";
import { configureLogging } from "../utils/logger";
import { FakeExtractor, SAMPLE_PAYLOADS, waitFor } from "./fakes";

const MATCH = { id: "m1", url: "https://fixtures.example.test/match/m1" };

describe("MatchTracker", () => {
  let dataDir: string;
  let store: DataStore;
  let extractor: FakeExtractor;
  let trackers: MatchTracker[];

  before(() => {
    configureLogging({ level: "ERROR" });
  });

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "match-tracker-tracker-"));
    store = new DataStore(dataDir);
    extractor = new FakeExtractor();
    trackers = [];
  });

  afterEach(async () => {
    await Promise.all(trackers.map((t) => t.stop()));
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function makeTracker(config: Partial<MatchTrackerConfig> = {}): MatchTracker {
    const tracker = new MatchTracker(MATCH, extractor, store, {
      livePollIntervalMs: 10,
      provisionRetryDelayMs: 1,
      stopTimeoutMs: 1000,
      ...config,
    });
    trackers.push(tracker);
    return tracker;
  }

  describe("provision", () => {
    it("opens one session and stores info and squads", async () => {
      const tracker = makeTracker();
      await tracker.provision();

      assert.equal(tracker.isProvisioned(), true);
      assert.equal(extractor.openSessions.size, 1);
      assert.deepEqual(store.getMatchData("m1").info, SAMPLE_PAYLOADS.info);
      assert.deepEqual(store.getMatchData("m1").squads, SAMPLE_PAYLOADS.squads);
    });

    it("shares one attempt between concurrent callers", async () => {
      const tracker = makeTracker();
      const first = tracker.provision();
      const second = tracker.provision();
      assert.equal(first, second);
      await first;
      assert.equal(extractor.openCalls, 1);
    });

    it("retries failed session opens", async () => {
      extractor.openFailures = 2;
      const tracker = makeTracker({ maxProvisionAttempts: 3 });
      await tracker.provision();

      assert.equal(tracker.isProvisioned(), true);
      assert.equal(extractor.openCalls, 3);
      assert.equal(tracker.getStats().provisionAttempts, 3);
    });

    it("gives up after the last attempt without leaking sessions", async () => {
      extractor.nullKinds.add("squads");
      const tracker = makeTracker({ maxProvisionAttempts: 3 });

      await assert.rejects(tracker.provision(), (err: unknown) => {
        assert.ok(err instanceof ProvisioningError);
        assert.equal(err.matchId, "m1");
        assert.equal(err.attempts, 3);
        return true;
      });
      assert.equal(tracker.isProvisioned(), false);
      assert.equal(extractor.opened, 3);
      assert.equal(extractor.closed, 3);
      assert.equal(extractor.openSessions.size, 0);
    });
  });

  describe("live tracking", () => {
    it("refuses to start before provisioning", () => {
      const tracker = makeTracker();
      assert.throws(() => tracker.startLiveTracking(), /not provisioned/);
    });

    it("polls live state and scorecard", async () => {
      const tracker = makeTracker();
      await tracker.provision();
      tracker.startLiveTracking();

      assert.equal(tracker.pollingActive, true);
      await waitFor(() => tracker.getStats().polls >= 2);
      assert.deepEqual(store.getMatchData("m1").live, SAMPLE_PAYLOADS.live);
      assert.deepEqual(store.getMatchData("m1").scorecard, SAMPLE_PAYLOADS.scorecard);
      assert.ok(store.listSnapshotHistory("m1", "live").length >= 1);
    });

    it("keeps polling through extraction failures", async () => {
      extractor.failKinds.add("live");
      const tracker = makeTracker();
      await tracker.provision();
      tracker.startLiveTracking();

      await waitFor(() => tracker.getStats().polls >= 3);
      const stats = tracker.getStats();
      assert.ok(stats.pollFailures >= 3);
      assert.ok(extractor.fetchCount("scorecard") >= 3);
      assert.equal(store.getMatchData("m1").live, null);
      assert.deepEqual(store.getMatchData("m1").scorecard, SAMPLE_PAYLOADS.scorecard);
    });

    it("starts only one loop", async () => {
      const tracker = makeTracker({ livePollIntervalMs: 60_000 });
      await tracker.provision();
      tracker.startLiveTracking();
      tracker.startLiveTracking();

      await waitFor(() => tracker.getStats().polls === 1);
      assert.equal(extractor.fetchCount("live"), 1);
    });
  });

  describe("checkIfEnded", () => {
    it("is false before provisioning", async () => {
      extractor.endedUrls.add(MATCH.url);
      assert.equal(await makeTracker().checkIfEnded(), false);
    });

    it("reports what the page says", async () => {
      const tracker = makeTracker();
      await tracker.provision();
      assert.equal(await tracker.checkIfEnded(), false);
      extractor.endedUrls.add(MATCH.url);
      assert.equal(await tracker.checkIfEnded(), true);
    });

    it("treats a page read failure as not ended", async () => {
      extractor.isEndedFails = true;
      const tracker = makeTracker();
      await tracker.provision();
      assert.equal(await tracker.checkIfEnded(), false);
    });

    it("waits for a running poll instead of sharing the page with it", async () => {
      extractor.pageDelayMs = 30;
      const tracker = makeTracker();
      await tracker.provision();
      tracker.startLiveTracking();
      await waitFor(() => extractor.inFlight > 0);

      const results = await Promise.all([tracker.checkIfEnded(), tracker.checkIfEnded()]);
      assert.deepEqual(results, [false, false]);
      assert.equal(extractor.maxInFlight, 1);
    });

    it("gives up with false when a poll is stuck on the page", async () => {
      extractor.hangKinds.add("live");
      extractor.endedUrls.add(MATCH.url);
      const tracker = makeTracker({ endCheckTimeoutMs: 50, stopTimeoutMs: 100 });
      await tracker.provision();
      tracker.startLiveTracking();
      await waitFor(() => extractor.fetchCount("live") === 1);

      const started = Date.now();
      assert.equal(await tracker.checkIfEnded(), false);
      assert.ok(Date.now() - started < 1000);
    });
  });

  describe("stop", () => {
    it("is idempotent and releases the session once", async () => {
      const tracker = makeTracker({ livePollIntervalMs: 60_000 });
      await tracker.provision();
      tracker.startLiveTracking();

      const started = Date.now();
      const first = tracker.stop();
      const second = tracker.stop();
      assert.equal(first, second);
      await first;
      await tracker.stop();

      assert.ok(Date.now() - started < 1000);
      assert.equal(tracker.stopped, true);
      assert.equal(tracker.pollingActive, false);
      assert.equal(tracker.isProvisioned(), false);
      assert.equal(extractor.closed, 1);
      assert.equal(extractor.openSessions.size, 0);
    });

    it("makes later start requests no-ops", async () => {
      const tracker = makeTracker();
      await tracker.provision();
      await tracker.stop();

      tracker.startLiveTracking();
      assert.equal(tracker.pollingActive, false);
      assert.equal(await tracker.checkIfEnded(), false);
    });

    it("closes a session that was still being opened", async () => {
      extractor.openDelayMs = 50;
      const tracker = makeTracker();
      const provisioning = tracker.provision();
      await waitFor(() => extractor.openCalls === 1);

      await tracker.stop();
      await assert.rejects(provisioning, ProvisioningError);
      assert.equal(extractor.openSessions.size, 0);
      assert.equal(tracker.isProvisioned(), false);
    });
  });
});
