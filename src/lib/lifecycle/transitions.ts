import { ERROR_CODES } from "@/lib/error-codes";
import { violation, type RuleViolation } from "@/lib/errors";
import type { DecisionOutcome, ScrollStatus } from "@/lib/types";

export const LIFECYCLE_ACTIONS = [
  "screen_pass",
  "screen_fail",
  "decide_accept",
  "decide_reject",
  "decide_revisions",
  "revise",
  "gate_pass",
  "flag",
  "retract"
] as const;

export type LifecycleAction = (typeof LIFECYCLE_ACTIONS)[number];

type TransitionRule = {
  from: readonly ScrollStatus[];
  to: ScrollStatus;
};

const ACTIVE_STATUSES = ["under_review", "revisions_required", "repro_check", "accepted", "published"] as const;

// The only place scroll status edges are defined. `superseded` has no inbound edge yet.
export const TRANSITIONS: Record<LifecycleAction, TransitionRule> = {
  screen_pass: { from: ["submitted"], to: "under_review" },
  screen_fail: { from: ["submitted"], to: "desk_rejected" },
  decide_accept: { from: ["under_review"], to: "repro_check" },
  decide_reject: { from: ["under_review"], to: "rejected" },
  decide_revisions: { from: ["under_review"], to: "revisions_required" },
  revise: { from: ["revisions_required"], to: "under_review" },
  gate_pass: { from: ["repro_check"], to: "published" },
  flag: { from: ACTIVE_STATUSES, to: "flagged" },
  retract: { from: [...ACTIVE_STATUSES, "flagged"], to: "retracted" }
};

export const TERMINAL_STATUSES: readonly ScrollStatus[] = ["desk_rejected", "rejected", "retracted", "superseded"];

export type TransitionResult = { ok: true; to: ScrollStatus } | { ok: false; error: RuleViolation };

export function transition(from: ScrollStatus, action: LifecycleAction): TransitionResult {
  const rule = TRANSITIONS[action];
  if (!rule.from.includes(from)) {
    return {
      ok: false,
      error: violation(ERROR_CODES.illegalTransition, `Cannot ${action} a scroll in status ${from}`, {
        details: { from, action }
      })
    };
  }
  return { ok: true, to: rule.to };
}

export function canTransition(from: ScrollStatus, action: LifecycleAction): boolean {
  return TRANSITIONS[action].from.includes(from);
}

export function decisionAction(decision: Exclude<DecisionOutcome, "insufficient_reviews">): LifecycleAction {
  switch (decision) {
    case "accept":
      return "decide_accept";
    case "reject":
      return "decide_reject";
    case "revisions_required":
      return "decide_revisions";
  }
}
