import { NotificationError, describeError } from "../errors";
import { createLogger } from "../logger";
import type { VoteRecord, VoteType } from "../../types";

export type AuditEntry =
    | { kind: "vote_added" | "vote_switched"; vote: VoteRecord; tokenSymbol: string; messageUrl?: string }
    | { kind: "vote_removed"; vote: VoteRecord; tokenSymbol: string }
    | { kind: "admin_added"; adminId: string; authorId: string; voteType: VoteType; voteIds: string[] }
    | { kind: "admin_removed"; adminId: string; removed: string[] };

/** Human-readable log channel for ledger changes, configured per guild. */
export interface AuditSink {
    send(guildId: string, entry: AuditEntry): Promise<void>;
}

const log = createLogger("audit");

/**
 * Sends an entry and swallows the failure: the ledger change it describes has
 * already been committed. Returns whether the send went through.
 */
export async function notifyAudit(sink: AuditSink | undefined, guildId: string | null | undefined, entry: AuditEntry): Promise<boolean> {
    if (!sink || !guildId) return false;
    try {
        await sink.send(guildId, entry);
        return true;
    } catch (err) {
        const failure = new NotificationError("Audit sink unreachable", { guildId, kind: entry.kind }, err);
        log.warn(`[${failure.code}] ${failure.message} (guild ${guildId}): ${describeError(err)}`);
        return false;
    }
}
