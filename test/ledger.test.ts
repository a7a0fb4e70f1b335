import { describe, it, expect, beforeEach } from "vitest";
import { VoteLedger } from "../src/utils/reputation/ledger";

function sequentialIds(ids?: string[]) {
    let n = 0;
    return () => (ids ? ids[n++] : `vote-${++n}`);
}

function steppingClock(start = Date.UTC(2024, 0, 1)) {
    let t = start;
    return () => {
        const d = new Date(t);
        t += 1000;
        return d;
    };
}

describe("VoteLedger", () => {
    let ledger: VoteLedger;

    beforeEach(() => {
        ledger = new VoteLedger({ now: steppingClock(), generateId: sequentialIds() });
    });

    it("records active votes with a timestamp", () => {
        const vote = ledger.record("v1", "author", "TOKEN", "good", "m1");
        expect(vote).toEqual({
            voteId: "vote-1",
            voterId: "v1",
            authorId: "author",
            tokenAddress: "TOKEN",
            voteType: "good",
            sourceMessageId: "m1",
            timestamp: "2024-01-01T00:00:00.000Z",
            reversed: false,
        });
        expect(ledger.isActive("vote-1")).toBe(true);
        expect(ledger.size).toBe(1);
    });

    it("reverses a vote exactly once and keeps it in the log", () => {
        ledger.record("v1", "author", "TOKEN", "good", "m1");
        expect(ledger.reverse("vote-1")).toBe("ok");
        expect(ledger.reverse("vote-1")).toBe("already_reversed");
        expect(ledger.reverse("vote-9")).toBe("not_found");
        expect(ledger.get("vote-1")?.reversed).toBe(true);
        expect(ledger.isActive("vote-1")).toBe(false);
        expect(ledger.size).toBe(1);
    });

    it("draws a fresh id when the generator repeats itself", () => {
        const dupes = new VoteLedger({ generateId: sequentialIds(["dup", "dup", "fresh"]) });
        dupes.record("v1", "author", "TOKEN", "good", "m1");
        expect(dupes.record("v2", "author", "TOKEN", "good", "m1").voteId).toBe("fresh");
    });

    it("matches on every field and the source message when given", () => {
        ledger.record("v1", "author", "TOKEN", "good", "m1");
        ledger.record("v1", "author", "TOKEN", "bad", "m1");
        ledger.record("v1", "author", "OTHER", "good", "m1");

        const query = { voterId: "v1", authorId: "author", tokenAddress: "TOKEN", voteType: "good" as const };
        expect(ledger.findActiveMatch({ ...query, sourceMessageId: "m1" })?.vote.voteId).toBe("vote-1");
        expect(ledger.findActiveMatch({ ...query, sourceMessageId: "m2" })).toBeUndefined();
        expect(ledger.activeMatches(query).map((v) => v.voteId)).toEqual(["vote-1"]);
    });

    it("picks the newest of several matches and flags the ambiguity", () => {
        ledger.record("v1", "author", "TOKEN", "good", "m1");
        ledger.record("v1", "author", "TOKEN", "good", "m1");
        const match = ledger.findActiveMatch({ voterId: "v1", authorId: "author", tokenAddress: "TOKEN", voteType: "good", sourceMessageId: "m1" });
        expect(match?.vote.voteId).toBe("vote-2");
        expect(match?.ambiguous).toBe(true);
        expect(match?.candidates).toBe(2);
    });

    it("lists recent active votes newest first", () => {
        ledger.record("v1", "author", "TOKEN", "good", "m1");
        ledger.record("v2", "author", "TOKEN", "good", "m1");
        ledger.record("v3", "author", "TOKEN", "bad", "m1");
        ledger.reverse("vote-3");
        expect(ledger.recentActive(10).map((v) => v.voteId)).toEqual(["vote-2", "vote-1"]);
        expect(ledger.recentActive(1).map((v) => v.voteId)).toEqual(["vote-2"]);
    });

    it("rebuilds the active index from reversal flags on load", () => {
        const records = [
            { voteId: "a", voterId: "v1", authorId: "author", tokenAddress: "T", voteType: "good" as const, sourceMessageId: "m1", timestamp: "2024-01-01T00:00:00.000Z", reversed: false },
            { voteId: "b", voterId: "v2", authorId: "author", tokenAddress: "T", voteType: "bad" as const, sourceMessageId: "m1", timestamp: "2024-01-01T00:00:01.000Z", reversed: true },
        ];
        expect(ledger.load(records, ["a"])).toBe(false);
        expect(ledger.active().map((v) => v.voteId)).toEqual(["a"]);

        expect(ledger.load(records, ["a", "b"])).toBe(true);
        expect(ledger.active().map((v) => v.voteId)).toEqual(["a"]);

        expect(ledger.load(records)).toBe(true);
        expect(ledger.size).toBe(2);
    });
});
