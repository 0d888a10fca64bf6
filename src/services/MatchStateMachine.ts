/**
 * Match lifecycle state machine.
 *
 *   UPCOMING ──(pre-roll, no tracker)──▶ UPCOMING + PROVISION
 *   UPCOMING ──(start reached, tracker)──▶ LIVE + START_LIVE
 *   LIVE ──(tracker reports ended)──▶ COMPLETED + COMPLETE
 *   LIVE ──(no tracker)──▶ LIVE + PROVISION   (recovery)
 *
 * COMPLETED is terminal. Pure: no clock, no I/O.
 */

import { MatchStatus } from "../types";

export enum TransitionAction {
  NONE = "NONE",
  PROVISION = "PROVISION",
  START_LIVE = "START_LIVE",
  COMPLETE = "COMPLETE",
}

export interface TransitionInput {
  status: MatchStatus;
  now: number;
  scheduledStart: number;
  hasTracker: boolean;
  ended: boolean;
  preRollMs: number;
  maxLateStartMs: number;
}

export interface Transition {
  next: MatchStatus;
  action: TransitionAction;
}

// Page status text that means the match is over
export const TERMINAL_STATUS_KEYWORDS = ["match ended", "completed", "won by", "drawn"];

export function isTerminalStatusText(text: string | null | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return TERMINAL_STATUS_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Inside the provisioning window: at most `preRollMs` before the start and
 * at most `maxLateStartMs` after it.
 */
export function isProvisioningDue(
  now: number,
  scheduledStart: number,
  preRollMs: number,
  maxLateStartMs: number,
): boolean {
  const untilStart = scheduledStart - now;
  return untilStart <= preRollMs && -untilStart <= maxLateStartMs;
}

/** Only live, tracked matches need the (I/O-bound) ended check before evaluation. */
export function needsEndCheck(status: MatchStatus, hasTracker: boolean): boolean {
  return status === MatchStatus.LIVE && hasTracker;
}

export function evaluateTransition(input: TransitionInput): Transition {
  const stay: Transition = { next: input.status, action: TransitionAction.NONE };

  switch (input.status) {
    case MatchStatus.UPCOMING:
      if (!input.hasTracker) {
        return isProvisioningDue(input.now, input.scheduledStart, input.preRollMs, input.maxLateStartMs)
          ? { next: MatchStatus.UPCOMING, action: TransitionAction.PROVISION }
          : stay;
      }
      return input.now >= input.scheduledStart
        ? { next: MatchStatus.LIVE, action: TransitionAction.START_LIVE }
        : stay;

    case MatchStatus.LIVE:
      if (!input.hasTracker) {
        return { next: MatchStatus.LIVE, action: TransitionAction.PROVISION };
      }
      return input.ended
        ? { next: MatchStatus.COMPLETED, action: TransitionAction.COMPLETE }
        : stay;

    case MatchStatus.COMPLETED:
      return stay;
  }
}
