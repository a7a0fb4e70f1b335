import Joi from "joi";
import { PersistenceError, describeError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { defaultSymbol } from "./tokenContext";
import type { StateStorage } from "../db";
import type { ReputationService } from "./service";
import type { TokenAggregate, UserAggregate, VoteRecord, VoteType } from "../../types";

export const STATE_KEYS = {
    reputation: "reputation",
    log: "reputation_log",
    disabledVoters: "disabled_voters",
    logChannels: "reputation_log_channels",
    activeVotes: "current_votes",
} as const;

interface PersistedToken {
    symbol?: string;
    good: number;
    bad: number;
    goodVoters: string[];
    badVoters: string[];
}

interface PersistedUser {
    good: number;
    bad: number;
    tokens: Record<string, PersistedToken>;
}

interface PersistedVote {
    voteId: string;
    voterId: string;
    authorId: string;
    tokenAddress: string;
    voteType: VoteType;
    sourceMessageId: string;
    timestamp: string;
    reversed: boolean;
}

/** The five records written on every flush. */
export interface StateSnapshot {
    reputation: Record<string, PersistedUser>;
    reputation_log: Record<string, PersistedVote>;
    disabled_voters: string[];
    reputation_log_channels: Record<string, string>;
    current_votes: Record<string, PersistedVote>;
}

/* ---------- schemas ---------- */

const count = Joi.number().integer().min(0).required();
const voterList = Joi.array().items(Joi.string()).default([]);

const tokenSchema = Joi.object<PersistedToken>({
    symbol: Joi.string().allow(""),
    good: count,
    bad: count,
    goodVoters: voterList,
    badVoters: voterList,
});

const userSchema = Joi.object<PersistedUser>({
    good: count,
    bad: count,
    tokens: Joi.object().pattern(Joi.string(), tokenSchema).default({}),
});

const voteSchema = Joi.object<PersistedVote>({
    voteId: Joi.string().required(),
    voterId: Joi.string().required(),
    authorId: Joi.string().required(),
    tokenAddress: Joi.string().required(),
    voteType: Joi.string().valid("good", "bad").required(),
    sourceMessageId: Joi.string().required(),
    timestamp: Joi.string().required(),
    reversed: Joi.boolean().default(false),
});

const reputationSchema = Joi.object<Record<string, PersistedUser>>().pattern(Joi.string(), userSchema);
const voteMapSchema = Joi.object<Record<string, PersistedVote>>().pattern(Joi.string(), voteSchema);
const disabledSchema = Joi.array<string[]>().items(Joi.string());
const channelSchema = Joi.object<Record<string, string>>().pattern(Joi.string(), Joi.string());

function decode<T>(key: string, schema: Joi.AnySchema<T>, raw: unknown): T {
    const result = schema.validate(raw, { allowUnknown: true });
    if (result.error !== undefined) {
        throw new PersistenceError(`Stored record "${key}" is invalid: ${result.error.message}`, { key });
    }
    return result.value;
}

/* ---------- (de)serialization ---------- */

function toPersistedVote(vote: VoteRecord): PersistedVote {
    return { ...vote };
}

export function serializeState(reputation: ReputationService): StateSnapshot {
    const users: Record<string, PersistedUser> = {};
    for (const [userId, user] of reputation.store.users()) {
        const tokens: Record<string, PersistedToken> = {};
        for (const [address, token] of user.tokens) {
            tokens[address] = {
                symbol: token.symbol,
                good: token.good,
                bad: token.bad,
                goodVoters: [...token.goodVoters],
                badVoters: [...token.badVoters],
            };
        }
        users[userId] = { good: user.good, bad: user.bad, tokens };
    }

    const log: Record<string, PersistedVote> = {};
    for (const vote of reputation.ledger.all()) log[vote.voteId] = toPersistedVote(vote);
    const active: Record<string, PersistedVote> = {};
    for (const vote of reputation.ledger.active()) active[vote.voteId] = toPersistedVote(vote);

    return {
        reputation: users,
        reputation_log: log,
        disabled_voters: reputation.disabledVoterIds(),
        reputation_log_channels: Object.fromEntries(reputation.logChannelEntries()),
        current_votes: active,
    };
}

function toUserAggregate(user: PersistedUser): UserAggregate {
    const tokens = new Map(
        Object.entries(user.tokens).map(([address, token]): [string, TokenAggregate] => [
            address,
            {
                // entries written before symbols were tracked get a derived label
                symbol: token.symbol ?? defaultSymbol(address),
                good: token.good,
                bad: token.bad,
                goodVoters: new Set(token.goodVoters),
                badVoters: new Set(token.badVoters),
            },
        ]),
    );
    return { good: user.good, bad: user.bad, tokens };
}

export interface RestoreReport {
    users: number;
    votes: number;
    activeVotes: number;
    rebuiltIndex: boolean;
    missing: string[];
}

export interface PersistenceOptions {
    debounceMs?: number;
    logger?: Logger;
}

/**
 * Snapshots the reputation service to a `StateStorage` and loads it back.
 *
 * Flush requests are coalesced: a burst of mutations produces one write, and a
 * request that arrives mid-write schedules exactly one more. A failed write is
 * logged and retried on the next request; it never reaches the caller.
 */
export class ReputationPersistence {
    private readonly debounceMs: number;
    private readonly log: Logger;
    private dirty = false;
    private timer?: NodeJS.Timeout;
    private inFlight?: Promise<void>;
    private lastError?: PersistenceError;

    constructor(
        private readonly reputation: ReputationService,
        private readonly storage: StateStorage,
        options: PersistenceOptions = {},
    ) {
        this.debounceMs = options.debounceMs ?? 250;
        this.log = options.logger ?? createLogger("persistence");
    }

    /** Flush after every committed mutation. Returns the unsubscribe function. */
    attach() {
        return this.reputation.onChange(() => this.requestFlush());
    }

    get pending() {
        return this.dirty;
    }

    get error(): PersistenceError | undefined {
        return this.lastError;
    }

    requestFlush() {
        this.dirty = true;
        if (this.timer || this.inFlight) return;
        this.timer = setTimeout(() => {
            this.timer = undefined;
            this.startDrain().catch((err) => this.log.error(`Flush loop crashed: ${describeError(err)}`));
        }, this.debounceMs);
        this.timer.unref();
    }

    /**
     * Serializes and writes all five records now, whether or not anything is
     * pending. Resolves false when the write failed.
     */
    async snapshot(): Promise<boolean> {
        this.dirty = true;
        return this.flush();
    }

    /** Writes any pending changes now. Resolves false when the write failed. */
    async flush(): Promise<boolean> {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = undefined;
        }
        if (this.inFlight) await this.inFlight;
        if (this.dirty) await this.startDrain();
        return !this.dirty;
    }

    private startDrain() {
        if (!this.inFlight) {
            this.inFlight = this.drain().finally(() => {
                this.inFlight = undefined;
            });
        }
        return this.inFlight;
    }

    private async drain() {
        while (this.dirty) {
            this.dirty = false;
            // taken synchronously, so it cannot contain half of a mutation
            const snapshot = serializeState(this.reputation);
            try {
                await this.write(snapshot);
                this.lastError = undefined;
            } catch (err) {
                this.dirty = true;
                this.lastError = new PersistenceError(`Snapshot to ${this.storage.name} failed`, undefined, err);
                this.log.error(`${this.lastError.message}: ${describeError(err)}`);
                return;
            }
        }
    }

    private async write(snapshot: StateSnapshot) {
        await Promise.all([
            this.storage.write(STATE_KEYS.reputation, snapshot.reputation),
            this.storage.write(STATE_KEYS.log, snapshot.reputation_log),
            this.storage.write(STATE_KEYS.disabledVoters, snapshot.disabled_voters),
            this.storage.write(STATE_KEYS.logChannels, snapshot.reputation_log_channels),
            this.storage.write(STATE_KEYS.activeVotes, snapshot.current_votes),
        ]);
    }

    /**
     * Loads every record. Missing records mean empty state. An invalid record
     * aborts the restore with a `PersistenceError`, except the active-vote index:
     * it is derived from the log, so when it is unreadable, invalid or out of
     * step it is rebuilt and a flush is requested to overwrite it.
     */
    async restore(): Promise<RestoreReport> {
        const keys = [STATE_KEYS.reputation, STATE_KEYS.log, STATE_KEYS.disabledVoters, STATE_KEYS.logChannels];
        let raw: unknown[];
        try {
            raw = await Promise.all(keys.map((key) => this.storage.read(key)));
        } catch (err) {
            throw new PersistenceError(`Could not read state from ${this.storage.name}`, undefined, err);
        }
        const [rawReputation, rawLog, rawDisabled, rawChannels] = raw;
        const missing: string[] = keys.filter((_, i) => raw[i] === undefined);

        const reputation = rawReputation === undefined ? {} : decode(STATE_KEYS.reputation, reputationSchema, rawReputation);
        const log = rawLog === undefined ? {} : decode(STATE_KEYS.log, voteMapSchema, rawLog);
        const disabled = rawDisabled === undefined ? [] : decode(STATE_KEYS.disabledVoters, disabledSchema, rawDisabled);
        const channels = rawChannels === undefined ? {} : decode(STATE_KEYS.logChannels, channelSchema, rawChannels);

        const active = await this.readActiveVoteIds();
        if (active.missing) missing.push(STATE_KEYS.activeVotes);

        const votes: VoteRecord[] = Object.values(log);
        const rebuiltIndex = this.reputation.replaceState({
            users: new Map(Object.entries(reputation).map(([userId, user]): [string, UserAggregate] => [userId, toUserAggregate(user)])),
            votes,
            activeVoteIds: active.ids,
            disabledVoters: disabled,
            logChannels: Object.entries(channels),
        });
        if (rebuiltIndex && active.ids !== undefined) {
            this.log.warn("Active-vote index disagreed with the vote log and was rebuilt");
        }
        // a fresh start has nothing to rewrite
        if (rebuiltIndex && !(active.missing && votes.length === 0)) this.requestFlush();

        const report: RestoreReport = {
            users: Object.keys(reputation).length,
            votes: votes.length,
            activeVotes: this.reputation.ledger.active().length,
            rebuiltIndex,
            missing,
        };
        this.log.info(
            `Restored ${report.users} users, ${report.votes} votes (${report.activeVotes} active) from ${this.storage.name}` +
                (missing.length ? `; missing: ${missing.join(", ")}` : ""),
        );
        return report;
    }

    private async readActiveVoteIds(): Promise<{ ids?: string[]; missing: boolean }> {
        let raw: unknown;
        try {
            raw = await this.storage.read(STATE_KEYS.activeVotes);
        } catch (err) {
            this.log.warn(`Stored active-vote index is unreadable, rebuilding from the log: ${describeError(err)}`);
            return { missing: false };
        }
        if (raw === undefined) return { missing: true };
        const result = voteMapSchema.validate(raw, { allowUnknown: true });
        if (result.error !== undefined) {
            this.log.warn(`Stored active-vote index is invalid, rebuilding from the log: ${result.error.message}`);
            return { missing: false };
        }
        return { ids: Object.keys(result.value), missing: false };
    }
}
