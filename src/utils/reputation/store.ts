import { ADMIN_TOKEN, type ApplyOutcome, type TokenAggregate, type UserAggregate, type VoteType } from "../../types";

export function oppositeOf(voteType: VoteType): VoteType {
    return voteType === "good" ? "bad" : "good";
}

function votersOf(token: TokenAggregate, voteType: VoteType) {
    return voteType === "good" ? token.goodVoters : token.badVoters;
}

function decrement(target: { good: number; bad: number }, voteType: VoteType) {
    target[voteType] = Math.max(0, target[voteType] - 1);
}

/**
 * Per-user and per-token running totals.
 *
 * Counters only move through the methods below and never go below zero. A voter
 * holds at most one stance per token: applying the opposite stance moves them
 * from one voter set to the other.
 */
export class ReputationStore {
    private readonly byUser = new Map<string, UserAggregate>();

    getOrCreateUser(userId: string): UserAggregate {
        let user = this.byUser.get(userId);
        if (!user) {
            user = { good: 0, bad: 0, tokens: new Map() };
            this.byUser.set(userId, user);
        }
        return user;
    }

    getUser(userId: string): UserAggregate | undefined {
        return this.byUser.get(userId);
    }

    users(): IterableIterator<[string, UserAggregate]> {
        return this.byUser.entries();
    }

    stanceOf(authorId: string, voterId: string, tokenAddress: string): VoteType | undefined {
        const token = this.byUser.get(authorId)?.tokens.get(tokenAddress);
        if (!token) return undefined;
        if (token.goodVoters.has(voterId)) return "good";
        if (token.badVoters.has(voterId)) return "bad";
        return undefined;
    }

    applyVote(authorId: string, voterId: string, tokenAddress: string, symbol: string, voteType: VoteType): ApplyOutcome {
        const user = this.getOrCreateUser(authorId);
        let token = user.tokens.get(tokenAddress);
        if (!token) {
            token = { symbol, good: 0, bad: 0, goodVoters: new Set(), badVoters: new Set() };
            user.tokens.set(tokenAddress, token);
        }
        token.symbol = symbol;

        if (votersOf(token, voteType).has(voterId)) return "unchanged";

        const opposite = oppositeOf(voteType);
        const switched = votersOf(token, opposite).delete(voterId);
        if (switched) {
            decrement(token, opposite);
            decrement(user, opposite);
        }

        votersOf(token, voteType).add(voterId);
        token[voteType] += 1;
        user[voteType] += 1;
        return switched ? "switched" : "added";
    }

    /**
     * Drops the voter's stance. Counters are decremented even when the voter was not
     * in the set (an out-of-order retraction), but never below zero.
     */
    retractVote(authorId: string, voterId: string, tokenAddress: string, voteType: VoteType): boolean {
        const user = this.byUser.get(authorId);
        if (!user) return false;
        const token = user.tokens.get(tokenAddress);
        if (!token) return false;
        const wasVoter = votersOf(token, voteType).delete(voterId);
        decrement(token, voteType);
        decrement(user, voteType);
        return wasVoter;
    }

    /** Admin corrections touch only the user totals, filed under `admin_added`. */
    applyAdminVote(authorId: string, voteType: VoteType, count = 1) {
        const user = this.getOrCreateUser(authorId);
        user[voteType] += count;
    }

    retractAdminVote(authorId: string, voteType: VoteType) {
        const user = this.byUser.get(authorId);
        if (user) decrement(user, voteType);
    }

    /** Undo of a ledger record; dispatches on whether it was token-bound. */
    retract(authorId: string, voterId: string, tokenAddress: string, voteType: VoteType) {
        if (tokenAddress === ADMIN_TOKEN) {
            this.retractAdminVote(authorId, voteType);
            return;
        }
        const user = this.byUser.get(authorId);
        if (!user) return;
        if (user.tokens.has(tokenAddress)) {
            this.retractVote(authorId, voterId, tokenAddress, voteType);
        } else {
            decrement(user, voteType);
        }
    }

    clear() {
        this.byUser.clear();
    }

    load(userId: string, user: UserAggregate) {
        this.byUser.set(userId, user);
    }
}
