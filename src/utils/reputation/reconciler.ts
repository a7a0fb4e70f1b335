import { describeError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { notifyAudit, type AuditSink } from "./audit";
import type { ReputationService } from "./service";
import type { TrackedMessage, VoteRecord, VoteType } from "../../types";

export const VOTE_GLYPHS: Readonly<Record<string, VoteType>> = {
    "🟢": "good",
    "🔴": "bad",
};

export const SELF_VOTE_NOTICE = "❌ You cannot vote on your own reputation! Your reaction has been removed.";
const NOTICE_TTL_MS = 10_000;

export interface ReactionEvent {
    actorId: string;
    actorIsBot?: boolean;
    messageId: string;
    guildId?: string | null;
    glyph: string;
    messageUrl?: string;
}

/** What the reconciler may ask of the chat platform for a given reaction. */
export interface ReactionSource {
    removeActorReaction(): Promise<void>;
    notifyActorPrivately(text: string): Promise<void>;
    notifyChannel(text: string, ttlMs: number): Promise<void>;
}

export type IgnoreReason = "bot" | "disabled_voter" | "unrecognized_glyph" | "untracked_message" | "self_vote";

export type ReconcileOutcome =
    | { status: "ignored"; reason: IgnoreReason }
    | { status: "self_vote_rejected" }
    | { status: "added" | "switched"; vote: VoteRecord }
    | { status: "unchanged" }
    | { status: "removed"; vote: VoteRecord }
    | { status: "no_match" }
    | { status: "failed"; error: unknown };

interface Resolved {
    context: TrackedMessage;
    voteType: VoteType;
}

export interface ReconcilerOptions {
    audit?: AuditSink;
    logger?: Logger;
}

/**
 * Turns raw reaction add/remove events into ledger mutations. Never throws:
 * every event ends in a `ReconcileOutcome`, failures included.
 */
export class ReactionReconciler {
    private readonly audit?: AuditSink;
    private readonly log: Logger;

    constructor(private readonly reputation: ReputationService, options: ReconcilerOptions = {}) {
        this.audit = options.audit;
        this.log = options.logger ?? createLogger("reconciler");
    }

    private resolve(event: ReactionEvent): { status: "ignored"; reason: IgnoreReason } | Resolved {
        if (event.actorIsBot) return { status: "ignored", reason: "bot" };
        if (this.reputation.isDisabled(event.actorId)) return { status: "ignored", reason: "disabled_voter" };
        const voteType = VOTE_GLYPHS[event.glyph];
        if (!voteType) return { status: "ignored", reason: "unrecognized_glyph" };
        const context = this.reputation.getTrackedMessage(event.messageId);
        if (!context) return { status: "ignored", reason: "untracked_message" };
        return { context, voteType };
    }

    async reactionAdded(event: ReactionEvent, source: ReactionSource): Promise<ReconcileOutcome> {
        try {
            const resolved = this.resolve(event);
            if ("status" in resolved) return resolved;
            const { context, voteType } = resolved;

            if (event.actorId === context.authorId) {
                await this.rejectSelfVote(event, source);
                return { status: "self_vote_rejected" };
            }

            const result = this.reputation.castVote({ voterId: event.actorId, messageId: event.messageId, context, voteType });
            if (result.outcome === "unchanged") {
                this.log.debug(`Duplicate ${voteType} vote from ${event.actorId} on ${event.messageId} ignored`);
                return { status: "unchanged" };
            }

            this.log.info(`Vote ${result.outcome}: ${event.actorId} -> ${context.authorId} ${voteType} on ${context.tokenSymbol} (${result.vote.voteId})`);
            await notifyAudit(this.audit, event.guildId, {
                kind: result.outcome === "switched" ? "vote_switched" : "vote_added",
                vote: result.vote,
                tokenSymbol: context.tokenSymbol,
                messageUrl: event.messageUrl,
            });
            return { status: result.outcome, vote: result.vote };
        } catch (error) {
            this.log.error(`Failed to reconcile reaction add on ${event.messageId}: ${describeError(error)}`, error);
            return { status: "failed", error };
        }
    }

    async reactionRemoved(event: ReactionEvent): Promise<ReconcileOutcome> {
        try {
            const resolved = this.resolve(event);
            if ("status" in resolved) return resolved;
            const { context, voteType } = resolved;

            // self-votes never reach the ledger
            if (event.actorId === context.authorId) return { status: "ignored", reason: "self_vote" };

            const result = this.reputation.withdrawVote({ voterId: event.actorId, messageId: event.messageId, context, voteType });
            if (result.outcome === "no_match") return { status: "no_match" };
            if (result.match.ambiguous) {
                this.log.warn(
                    `AmbiguousVoteState: ${result.match.candidates} active ${voteType} votes from ${event.actorId} on ${event.messageId}; reversed newest ${result.vote.voteId}`,
                );
            }

            this.log.info(`Vote removed: ${event.actorId} -> ${context.authorId} ${voteType} (${result.vote.voteId})`);
            await notifyAudit(this.audit, event.guildId, { kind: "vote_removed", vote: result.vote, tokenSymbol: context.tokenSymbol });
            return { status: "removed", vote: result.vote };
        } catch (error) {
            this.log.error(`Failed to reconcile reaction remove on ${event.messageId}: ${describeError(error)}`, error);
            return { status: "failed", error };
        }
    }

    private async rejectSelfVote(event: ReactionEvent, source: ReactionSource) {
        try {
            await source.removeActorReaction();
        } catch (err) {
            this.log.warn(`Could not remove self-vote reaction from ${event.actorId}: ${describeError(err)}`);
        }
        try {
            await source.notifyActorPrivately(SELF_VOTE_NOTICE);
        } catch {
            try {
                await source.notifyChannel(`<@${event.actorId}> You cannot vote on your own reputation!`, NOTICE_TTL_MS);
            } catch (err) {
                this.log.warn(`Could not tell ${event.actorId} about their self-vote: ${describeError(err)}`);
            }
        }
    }
}
