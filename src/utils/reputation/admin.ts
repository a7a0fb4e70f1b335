import { ValidationError } from "../errors";
import type { ReputationService } from "./service";
import type { RemovalReport, VoteRecord, VoteType } from "../../types";

/** Upper bound for one /repadd call; each vote is its own ledger record. */
export const MAX_ADMIN_VOTES = 1000;

/** Splits the `/repremove` argument into ids, dropping blanks and repeats. */
export function parseVoteIds(raw: string): string[] {
    const ids = raw
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean);
    return [...new Set(ids)];
}

/**
 * Manual corrections. These skip the reaction rules (self-vote, disabled voters)
 * but go through the same store+ledger pairing as reaction events.
 */
export class AdminAdjustments {
    constructor(private readonly reputation: ReputationService) {}

    addVotes(authorId: string, adminId: string, voteType: VoteType, count: number): VoteRecord[] {
        if (!Number.isInteger(count) || count <= 0) {
            throw new ValidationError("Amount must be positive", { count });
        }
        if (count > MAX_ADMIN_VOTES) {
            throw new ValidationError(`Amount must be at most ${MAX_ADMIN_VOTES}`, { count });
        }
        return this.reputation.addAdminVotes(authorId, adminId, voteType, count);
    }

    removeVotesByIds(ids: readonly string[]): RemovalReport {
        const report: RemovalReport = { removed: [], alreadyReversed: [], notFound: [] };
        for (const id of ids) {
            const outcome = this.reputation.reverseVote(id);
            if (outcome === "ok") report.removed.push(id);
            else if (outcome === "already_reversed") report.alreadyReversed.push(id);
            else report.notFound.push(id);
        }
        return report;
    }
}
