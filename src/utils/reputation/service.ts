import { ReputationStore, oppositeOf } from "./store";
import { VoteLedger, type ActiveMatch, type LedgerOptions } from "./ledger";
import { TrackedMessages } from "./trackedMessages";
import { defaultSymbol } from "./tokenContext";
import {
    ADMIN_TOKEN,
    type ApplyOutcome,
    type LeaderboardEntry,
    type ReverseOutcome,
    type TrackedMessage,
    type UserAggregate,
    type VoteRecord,
    type VoteType,
} from "../../types";

export interface ReputationServiceOptions {
    ledger?: LedgerOptions;
    trackedMessageLimit?: number;
}

export interface CastVoteInput {
    voterId: string;
    messageId: string;
    context: TrackedMessage;
    voteType: VoteType;
}

export type CastVoteResult =
    | { outcome: "unchanged" }
    | { outcome: Exclude<ApplyOutcome, "unchanged">; vote: VoteRecord; replaced: VoteRecord[] };

export type WithdrawVoteResult = { outcome: "no_match" } | { outcome: "removed"; vote: VoteRecord; match: ActiveMatch };

export interface TokenStanding {
    address: string;
    symbol: string;
    good: number;
    bad: number;
    score: number;
}

export interface Profile {
    userId: string;
    good: number;
    bad: number;
    score: number;
    // share of good votes, 0-100
    percent: number;
    tokens: TokenStanding[];
}

export interface VoteSummary extends VoteRecord {
    tokenSymbol: string;
}

export interface ServiceState {
    users: Map<string, UserAggregate>;
    votes: VoteRecord[];
    activeVoteIds?: readonly string[];
    disabledVoters: Iterable<string>;
    logChannels: Iterable<[string, string]>;
}

type ChangeListener = () => void;

/**
 * Owns every piece of reputation state and is the only way to mutate it.
 *
 * Each public mutation updates the store and the ledger in one synchronous
 * block, so nothing running on the event loop can see one without the other.
 * Listeners registered with `onChange` run after every committed mutation.
 */
export class ReputationService {
    readonly store = new ReputationStore();
    readonly ledger: VoteLedger;
    private readonly tracked: TrackedMessages;
    private readonly disabledVoters = new Set<string>();
    private readonly logChannels = new Map<string, string>();
    private readonly listeners = new Set<ChangeListener>();

    constructor(options: ReputationServiceOptions = {}) {
        this.ledger = new VoteLedger(options.ledger);
        this.tracked = new TrackedMessages(options.trackedMessageLimit ?? 0);
    }

    onChange(listener: ChangeListener) {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private changed() {
        for (const listener of this.listeners) listener();
    }

    /* ---------- reaction votes ---------- */

    castVote({ voterId, messageId, context, voteType }: CastVoteInput): CastVoteResult {
        const { authorId, tokenAddress, tokenSymbol } = context;
        const outcome = this.store.applyVote(authorId, voterId, tokenAddress, tokenSymbol, voteType);
        if (outcome === "unchanged") return { outcome };

        const replaced: VoteRecord[] = [];
        if (outcome === "switched") {
            const previous = this.ledger.activeMatches({ voterId, authorId, tokenAddress, voteType: oppositeOf(voteType) });
            for (const vote of previous) {
                this.ledger.reverse(vote.voteId);
                replaced.push(vote);
            }
        }
        const vote = this.ledger.record(voterId, authorId, tokenAddress, voteType, messageId);
        this.changed();
        return { outcome, vote, replaced };
    }

    withdrawVote({ voterId, messageId, context, voteType }: CastVoteInput): WithdrawVoteResult {
        const { authorId, tokenAddress } = context;
        const match = this.ledger.findActiveMatch({ voterId, authorId, tokenAddress, voteType, sourceMessageId: messageId });
        if (!match) return { outcome: "no_match" };

        this.store.retractVote(authorId, voterId, tokenAddress, voteType);
        this.ledger.reverse(match.vote.voteId);
        this.changed();
        return { outcome: "removed", vote: match.vote, match };
    }

    /* ---------- admin corrections ---------- */

    addAdminVotes(authorId: string, adminId: string, voteType: VoteType, count: number): VoteRecord[] {
        const created: VoteRecord[] = [];
        for (let i = 0; i < count; i++) {
            created.push(this.ledger.record(adminId, authorId, ADMIN_TOKEN, voteType, "0"));
        }
        this.store.applyAdminVote(authorId, voteType, count);
        this.changed();
        return created;
    }

    /** Reverses any vote by id, whatever created it. */
    reverseVote(voteId: string): ReverseOutcome {
        const vote = this.ledger.get(voteId);
        if (!vote) return "not_found";
        if (vote.reversed) return "already_reversed";

        this.store.retract(vote.authorId, vote.voterId, vote.tokenAddress, vote.voteType);
        const outcome = this.ledger.reverse(voteId);
        this.changed();
        return outcome;
    }

    /* ---------- voters, audit sinks, tracked messages ---------- */

    /** Flips the voter's disabled flag and returns the new value. */
    toggleVoter(userId: string): boolean {
        const disabled = !this.disabledVoters.delete(userId);
        if (disabled) this.disabledVoters.add(userId);
        this.changed();
        return disabled;
    }

    isDisabled(userId: string) {
        return this.disabledVoters.has(userId);
    }

    setLogChannel(guildId: string, channelId: string) {
        this.logChannels.set(guildId, channelId);
        this.changed();
    }

    getLogChannel(guildId: string): string | undefined {
        return this.logChannels.get(guildId);
    }

    trackMessage(messageId: string, context: TrackedMessage) {
        this.tracked.track(messageId, context);
    }

    getTrackedMessage(messageId: string): TrackedMessage | undefined {
        return this.tracked.get(messageId);
    }

    /* ---------- reads ---------- */

    /** Users with at least one vote, ranked by score, then good votes, then fewest bad votes. */
    leaderboard(include: (userId: string) => boolean = () => true): LeaderboardEntry[] {
        const entries: LeaderboardEntry[] = [];
        for (const [userId, user] of this.store.users()) {
            if (user.good === 0 && user.bad === 0) continue;
            if (!include(userId)) continue;
            entries.push({ userId, score: user.good - user.bad, good: user.good, bad: user.bad });
        }
        return entries.sort((a, b) => b.score - a.score || b.good - a.good || a.bad - b.bad);
    }

    profile(userId: string, tokenLimit = 5): Profile {
        const user = this.store.getUser(userId);
        const good = user?.good ?? 0;
        const bad = user?.bad ?? 0;
        const total = good + bad;
        const tokens: TokenStanding[] = [];
        for (const [address, token] of user?.tokens ?? []) {
            tokens.push({ address, symbol: token.symbol, good: token.good, bad: token.bad, score: token.good - token.bad });
        }
        tokens.sort((a, b) => b.good + b.bad - (a.good + a.bad));
        return {
            userId,
            good,
            bad,
            score: good - bad,
            percent: total > 0 ? (good / total) * 100 : 0,
            tokens: tokens.slice(0, tokenLimit),
        };
    }

    recentVotes(limit = 10): VoteSummary[] {
        return this.ledger.recentActive(limit).map((vote) => ({ ...vote, tokenSymbol: this.symbolFor(vote) }));
    }

    symbolFor(vote: Pick<VoteRecord, "authorId" | "tokenAddress">) {
        if (vote.tokenAddress === ADMIN_TOKEN) return "unknown";
        const token = this.store.getUser(vote.authorId)?.tokens.get(vote.tokenAddress);
        return token?.symbol ?? defaultSymbol(vote.tokenAddress);
    }

    disabledVoterIds(): string[] {
        return [...this.disabledVoters];
    }

    logChannelEntries(): [string, string][] {
        return [...this.logChannels];
    }

    /**
     * Replaces all persisted state. Tracked messages are left alone. Returns true
     * when the active-vote index had to be rebuilt from the log.
     */
    replaceState(state: ServiceState): boolean {
        this.store.clear();
        for (const [userId, user] of state.users) this.store.load(userId, user);
        const rebuilt = this.ledger.load(state.votes, state.activeVoteIds);
        this.disabledVoters.clear();
        for (const id of state.disabledVoters) this.disabledVoters.add(id);
        this.logChannels.clear();
        for (const [guildId, channelId] of state.logChannels) this.logChannels.set(guildId, channelId);
        return rebuilt;
    }
}
