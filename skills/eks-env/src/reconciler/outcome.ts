import type { StrategyReport } from "./escalation.js";
import type { Ledger, RemainingResource } from "./ledger.js";
import type { ResourceRef } from "./types.js";
import type { VerificationReport } from "./verification.js";

export type DeclarativeReport = {
  primary: "succeeded" | "failed" | "skipped";
  detail?: string;
  escalation: StrategyReport[];
  /** Every escalation strategy was tried and none succeeded. */
  exhausted: boolean;
};

export type OutcomeStatus = "clean" | "partial" | "failed";

export type ReconciliationOutcome = {
  status: OutcomeStatus;
  removed: ResourceRef[];
  remaining: RemainingResource[];
  declarative: DeclarativeReport;
  verification: VerificationReport;
  warnings: string[];
  stateFilesRemoved: string[];
};

export function decideStatus(
  remaining: readonly RemainingResource[],
  verification: VerificationReport,
  declarative: DeclarativeReport
): OutcomeStatus {
  if (remaining.length === 0 && verification.status === "clean") return "clean";
  return declarative.exhausted ? "failed" : "partial";
}

/**
 * Fold the ledger and the verification pass into the final result. Anything
 * verification still sees is listed as remaining even without a failed attempt behind it.
 */
export function buildOutcome(
  ledger: Ledger,
  declarative: DeclarativeReport,
  verification: VerificationReport,
  warnings: string[]
): ReconciliationOutcome {
  const reason = "still present at verification";
  for (const id of verification.clusters) ledger.residual({ kind: "cluster", id }, reason);
  for (const id of verification.loadBalancers) ledger.residual({ kind: "load-balancer", id }, reason);
  for (const id of verification.vpcs) ledger.residual({ kind: "vpc", id }, reason);

  const remaining = ledger.remainingRefs;
  return {
    status: decideStatus(remaining, verification, declarative),
    removed: ledger.removedRefs,
    remaining,
    declarative,
    verification,
    warnings,
    stateFilesRemoved: [],
  };
}
