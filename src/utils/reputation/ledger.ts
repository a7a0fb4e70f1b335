import { newVoteId } from "../id";
import type { ReverseOutcome, VoteRecord, VoteType } from "../../types";

export interface VoteQuery {
    voterId: string;
    authorId: string;
    tokenAddress: string;
    voteType: VoteType;
    // omitted: any source message
    sourceMessageId?: string;
}

export interface ActiveMatch {
    vote: VoteRecord;
    // more than one active record fit the query; the newest was picked
    ambiguous: boolean;
    candidates: number;
}

export interface LedgerOptions {
    now?: () => Date;
    generateId?: () => string;
}

/**
 * Append-only audit log of votes. Records are never deleted; reversal is a
 * one-way flag. Active (unreversed) records are also indexed by id, in
 * creation order.
 */
export class VoteLedger {
    private readonly log = new Map<string, VoteRecord>();
    private readonly activeIndex = new Map<string, VoteRecord>();
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(options: LedgerOptions = {}) {
        this.now = options.now ?? (() => new Date());
        this.generateId = options.generateId ?? newVoteId;
    }

    record(voterId: string, authorId: string, tokenAddress: string, voteType: VoteType, sourceMessageId: string): VoteRecord {
        let voteId = this.generateId();
        while (this.log.has(voteId)) voteId = this.generateId();
        const vote: VoteRecord = {
            voteId,
            voterId,
            authorId,
            tokenAddress,
            voteType,
            sourceMessageId,
            timestamp: this.now().toISOString(),
            reversed: false,
        };
        this.log.set(voteId, vote);
        this.activeIndex.set(voteId, vote);
        return vote;
    }

    reverse(voteId: string): ReverseOutcome {
        const vote = this.log.get(voteId);
        if (!vote) return "not_found";
        if (vote.reversed) return "already_reversed";
        vote.reversed = true;
        this.activeIndex.delete(voteId);
        return "ok";
    }

    get(voteId: string): VoteRecord | undefined {
        return this.log.get(voteId);
    }

    isActive(voteId: string) {
        return this.activeIndex.has(voteId);
    }

    /** Active records fitting the query, oldest first. */
    activeMatches(query: VoteQuery): VoteRecord[] {
        const matches: VoteRecord[] = [];
        for (const vote of this.activeIndex.values()) {
            if (
                vote.voterId === query.voterId &&
                vote.authorId === query.authorId &&
                vote.tokenAddress === query.tokenAddress &&
                vote.voteType === query.voteType &&
                (query.sourceMessageId === undefined || vote.sourceMessageId === query.sourceMessageId)
            ) {
                matches.push(vote);
            }
        }
        return matches;
    }

    findActiveMatch(query: VoteQuery): ActiveMatch | undefined {
        const matches = this.activeMatches(query);
        if (matches.length === 0) return undefined;
        return { vote: matches[matches.length - 1], ambiguous: matches.length > 1, candidates: matches.length };
    }

    /** Every record, oldest first. */
    all(): VoteRecord[] {
        return [...this.log.values()];
    }

    /** Unreversed records in creation order. */
    active(): VoteRecord[] {
        return [...this.activeIndex.values()];
    }

    recentActive(limit: number): VoteRecord[] {
        return this.active()
            .reverse()
            .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
            .slice(0, limit);
    }

    get size() {
        return this.log.size;
    }

    clear() {
        this.log.clear();
        this.activeIndex.clear();
    }

    /**
     * Loads a saved log and rebuilds the active index from the `reversed` flags.
     * Returns true when the saved `activeIds` disagreed with the log.
     */
    load(records: VoteRecord[], activeIds?: readonly string[]): boolean {
        this.clear();
        for (const vote of records) this.log.set(vote.voteId, vote);

        const derived = records.filter((v) => !v.reversed).map((v) => v.voteId);
        const consistent =
            activeIds !== undefined &&
            activeIds.length === derived.length &&
            activeIds.every((id) => {
                const vote = this.log.get(id);
                return vote !== undefined && !vote.reversed;
            });
        for (const id of derived) {
            const vote = this.log.get(id);
            if (vote) this.activeIndex.set(id, vote);
        }
        return !consistent;
    }
}
