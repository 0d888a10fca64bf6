import { describe, it, before, after, mock } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

import { configureLogging, createLogger, isLogLevel, logFilePath } from "../utils/logger";

describe("logger", () => {
  let logDir: string;

  before(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), "match-tracker-logs-"));
    mock.method(console, "log", () => {});
    mock.method(console, "error", () => {});
  });

  after(() => {
    mock.restoreAll();
    configureLogging({ level: "INFO", logDir: null });
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it("names the daily file after the UTC date", () => {
    const at = new Date(Date.UTC(2026, 0, 10, 23, 59));
    assert.equal(logFilePath("/var/log/tracker", at), path.join("/var/log/tracker", "match_tracker_2026-01-10.log"));
  });

  it("appends formatted lines at or above the configured level", () => {
    configureLogging({ level: "INFO", logDir });
    const log = createLogger("Test");

    log.debug("hidden");
    log.info("hello");
    log.error("broke", new Error("disk full"));

    const files = fs.readdirSync(logDir);
    assert.equal(files.length, 1);
    assert.match(files[0], /^match_tracker_\d{4}-\d{2}-\d{2}\.log$/);

    const lines = fs.readFileSync(path.join(logDir, files[0]), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0], /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] \[Test\] hello$/);
    assert.match(lines[1], /^\S+ \[ERROR\] \[Test\] broke: disk full$/);
  });

  it("recognizes log level names", () => {
    assert.equal(isLogLevel("WARN"), true);
    assert.equal(isLogLevel("warn"), false);
    assert.equal(isLogLevel("TRACE"), false);
  });
});
