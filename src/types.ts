export type VoteType = "good" | "bad";

export const VOTE_TYPES: readonly VoteType[] = ["good", "bad"];

/** Token key used when no address could be found in the source post. */
export const UNKNOWN_TOKEN = "unknown";
/** Pseudo-token that admin corrections are filed under. */
export const ADMIN_TOKEN = "admin_added";

export interface TokenAggregate {
    symbol: string;
    good: number;
    bad: number;
    goodVoters: Set<string>;
    badVoters: Set<string>;
}

export interface UserAggregate {
    good: number;
    bad: number;
    tokens: Map<string, TokenAggregate>;
}

export interface VoteRecord {
    readonly voteId: string;
    readonly voterId: string;
    readonly authorId: string;
    readonly tokenAddress: string;
    readonly voteType: VoteType;
    // "0" for admin-originated votes
    readonly sourceMessageId: string;
    readonly timestamp: string;
    reversed: boolean;
}

export interface TrackedMessage {
    authorId: string;
    tokenAddress: string;
    tokenSymbol: string;
}

export type ApplyOutcome = "added" | "switched" | "unchanged";

export type ReverseOutcome = "ok" | "already_reversed" | "not_found";

export interface RemovalReport {
    removed: string[];
    alreadyReversed: string[];
    notFound: string[];
}

export interface LeaderboardEntry {
    userId: string;
    score: number;
    good: number;
    bad: number;
}

export function isVoteType(value: string): value is VoteType {
    return value === "good" || value === "bad";
}
