import type { LeaderboardEntry } from "../types";

export interface MemberRanking {
    shown: LeaderboardEntry[];
    // present members found, plus every entry past the last looked-up batch
    total: number;
}

/** Looks up which of the given user ids are still members. At most `batchSize` ids per call. */
export type MembershipLookup = (userIds: string[]) => Promise<{ has(userId: string): boolean }>;

/**
 * Walks the ranked entries in batches, dropping users who left, until `limit`
 * present members are found. Entries beyond the last batch are counted
 * without a lookup.
 */
export async function rankPresentMembers(
    entries: readonly LeaderboardEntry[],
    lookup: MembershipLookup,
    limit = 10,
    batchSize = 100,
): Promise<MemberRanking> {
    const present: LeaderboardEntry[] = [];
    let offset = 0;
    while (offset < entries.length && present.length < limit) {
        const batch = entries.slice(offset, offset + batchSize);
        const members = await lookup(batch.map((e) => e.userId));
        for (const entry of batch) if (members.has(entry.userId)) present.push(entry);
        offset += batch.length;
    }
    return { shown: present.slice(0, limit), total: present.length + (entries.length - offset) };
}
