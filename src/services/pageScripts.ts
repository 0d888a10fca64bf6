/**
 * Functions evaluated inside the match page by Playwright. They are
 * serialized with toString(), so each one must be self-contained: no imports,
 * no references to module scope.
 */

import type { InningsCard, LiveState, MatchInfo, RawMatchRecord, Scorecard, Squads } from "../types";

export function readMatchList(): RawMatchRecord[] {
  const cards = document.querySelectorAll(".match-card");
  return Array.from(cards).map((card) => ({
    id: card.getAttribute("data-match-id") || "",
    teams: card.querySelector(".teams")?.textContent?.trim() || "",
    format: card.querySelector(".format")?.textContent?.trim() || "",
    dateTime: card.querySelector(".date-time")?.textContent?.trim() || "",
    url: card.querySelector("a")?.getAttribute("href") || "",
  }));
}

/** Click the first inactive tab whose label contains `label` (lower-case). */
export function clickTab(label: string): boolean {
  const candidates = document.querySelectorAll<HTMLElement>(
    "li[class*='tab'], div[class*='tab'], li[class*='nav-item'], div[class*='nav-item'], " +
      "[class*='nav-link'], [class*='MuiTab-root'], [role='tab']",
  );
  for (const tab of Array.from(candidates)) {
    const text = (tab.textContent || "").toLowerCase();
    if (text.includes(label) && !tab.className.includes("active")) {
      tab.click();
      return true;
    }
  }
  return false;
}

export function readMatchStatusText(): string | null {
  return document.querySelector(".match-status")?.textContent?.trim() || null;
}

export function readMatchInfo(): MatchInfo | null {
  if (!document.querySelector("[class*='info']")) return null;
  const text = (selector: string) => document.querySelector(selector)?.textContent?.trim() || "";
  return {
    teams: {
      home: text(".team-home, .teamA, .team1, .team-left"),
      away: text(".team-away, .teamB, .team2, .team-right"),
    },
    matchDetails: {
      series: text(".series-name, .series"),
      format: text(".match-format, .format"),
      venue: text(".venue-name, .venue"),
      date: text(".match-date, .date"),
      time: text(".match-time, .time"),
      toss: text(".toss-result, .toss"),
      umpires: Array.from(document.querySelectorAll(".umpire, .umpires")).map(
        (el) => el.textContent?.trim() || "",
      ),
    },
  };
}

export function readSquads(): Squads | null {
  const container = document.querySelector("[class*='squad']");
  if (!container) return null;

  const players = (teamSelector: string) =>
    Array.from(
      container.querySelectorAll(
        teamSelector
          .split(",")
          .map((sel) => `${sel.trim()} .player, ${sel.trim()} .player-row, ${sel.trim()} .player-item`)
          .join(", "),
      ),
    ).map((player) => ({
      name: player.querySelector(".player-name")?.textContent?.trim() || player.textContent?.trim() || "",
      role: player.querySelector(".player-role")?.textContent?.trim() || "",
      isCaptain: !!player.querySelector(".captain-indicator, .captain"),
      isWicketkeeper: !!player.querySelector(".wicketkeeper-indicator, .wicketkeeper"),
    }));

  const home = ".home-team-squad, .teamA, .team1, .team-left";
  const away = ".away-team-squad, .teamB, .team2, .team-right";
  return {
    homeTeam: {
      name: container.querySelector(".home-team-name, .teamA, .team1, .team-left")?.textContent?.trim() || "",
      players: players(home),
    },
    awayTeam: {
      name: container.querySelector(".away-team-name, .teamB, .team2, .team-right")?.textContent?.trim() || "",
      players: players(away),
    },
  };
}

export function readLiveState(): LiveState | null {
  const container = document.querySelector("[class*='live']");
  if (!container) return null;
  const text = (root: Element, selector: string) => root.querySelector(selector)?.textContent?.trim() || "";

  return {
    currentInnings: text(container, ".current-innings"),
    score: text(container, ".current-score, .score"),
    runRate: text(container, ".run-rate"),
    requiredRunRate: text(container, ".required-run-rate"),
    lastWicket: text(container, ".last-wicket"),
    recentBalls: Array.from(container.querySelectorAll(".recent-ball")).map((el) => el.textContent?.trim() || ""),
    partnership: text(container, ".current-partnership"),
    batsmen: Array.from(container.querySelectorAll(".batsman, .batsman-row")).map((el) => ({
      name: text(el, ".batsman-name") || el.textContent?.trim() || "",
      runs: text(el, ".batsman-runs"),
      balls: text(el, ".batsman-balls"),
      fours: text(el, ".batsman-fours"),
      sixes: text(el, ".batsman-sixes"),
      strikeRate: text(el, ".batsman-strike-rate"),
    })),
    bowlers: Array.from(container.querySelectorAll(".bowler, .bowler-row")).map((el) => ({
      name: text(el, ".bowler-name") || el.textContent?.trim() || "",
      overs: text(el, ".bowler-overs"),
      maidens: text(el, ".bowler-maidens"),
      runs: text(el, ".bowler-runs"),
      wickets: text(el, ".bowler-wickets"),
      economy: text(el, ".bowler-economy"),
    })),
    matchStatus: text(container, ".match-status, .status"),
    commentary: Array.from(container.querySelectorAll(".commentary-item, .commentary-row"))
      .map((el) => ({
        text: text(el, ".commentary-text") || el.textContent?.trim() || "",
        over: text(el, ".commentary-over"),
        timestamp: text(el, ".commentary-timestamp"),
      }))
      .slice(0, 10),
  };
}

export function readScorecard(): Scorecard | null {
  const container = document.querySelector("[class*='scorecard']");
  if (!container) return null;
  const text = (root: Element, selector: string) => root.querySelector(selector)?.textContent?.trim() || "";

  const innings: InningsCard[] = [];
  for (let i = 1; i <= 4; i++) {
    const el = container.querySelector(`.innings-${i}`);
    if (!el) continue;
    innings.push({
      team: text(el, ".innings-team"),
      totalScore: text(el, ".innings-total"),
      overs: text(el, ".innings-overs"),
      extras: text(el, ".innings-extras"),
      batsmen: Array.from(el.querySelectorAll(".batsman-row")).map((row) => ({
        name: text(row, ".batsman-name") || row.textContent?.trim() || "",
        dismissal: text(row, ".batsman-dismissal"),
        runs: text(row, ".batsman-runs"),
        balls: text(row, ".batsman-balls"),
        fours: text(row, ".batsman-fours"),
        sixes: text(row, ".batsman-sixes"),
        strikeRate: text(row, ".batsman-strike-rate"),
      })),
      bowlers: Array.from(el.querySelectorAll(".bowler-row")).map((row) => ({
        name: text(row, ".bowler-name") || row.textContent?.trim() || "",
        overs: text(row, ".bowler-overs"),
        maidens: text(row, ".bowler-maidens"),
        runs: text(row, ".bowler-runs"),
        wickets: text(row, ".bowler-wickets"),
        economy: text(row, ".bowler-economy"),
      })),
      fallOfWickets: Array.from(el.querySelectorAll(".fow-item")).map((item) => item.textContent?.trim() || ""),
    });
  }

  return {
    innings,
    matchSummary: text(container, ".match-summary"),
    playerOfTheMatch: text(container, ".player-of-match"),
  };
}
