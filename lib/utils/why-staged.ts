/**
 * One-line explanations for a recommendation's terminal state.
 * Used next to allocation rows so reviewers see why an uplift is short or deferred.
 */

import type { Recommendation } from "@/lib/model/manager-budget";
import { formatCurrency } from "./format";

export function explainRecommendation(rec: Recommendation): string {
  switch (rec.state) {
    case "ACCEPTED":
      if (rec.requestedUplift === 0) {
        return rec.priorityTier === "NONE"
          ? "At or above median and not a high performer: no adjustment requested"
          : "No adjustment requested";
      }
      return `Funded in full: ${formatCurrency(rec.proposedUplift)}`;
    case "TRIMMED":
      return rec.proposedUplift > 0
        ? `Manager budget ran out: ${formatCurrency(rec.proposedUplift)} of ${formatCurrency(rec.requestedUplift)} funded`
        : `Manager budget ran out before this ${rec.priorityTier} request: nothing funded`;
    case "STAGED":
      return rec.inPool
        ? `Deferred to next cycle: budget exhausted before the ${rec.priorityTier} tier`
        : "Deferred to next cycle: outside the manager's capped review pool";
    case "PENDING":
    case "EVALUATED":
      return "Not yet allocated";
  }
}
