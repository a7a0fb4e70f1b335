import { describe, it, expect, beforeEach, vi } from "vitest";
import { ReputationService } from "../src/utils/reputation/service";
import { TrackedMessages } from "../src/utils/reputation/trackedMessages";
import type { TrackedMessage } from "../src/types";

const context: TrackedMessage = { authorId: "author", tokenAddress: "TOKEN", tokenSymbol: "TKN" };

function makeService() {
    let n = 0;
    return new ReputationService({ ledger: { generateId: () => `vote-${++n}`, now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, n)) } });
}

describe("ReputationService", () => {
    let service: ReputationService;

    beforeEach(() => {
        service = makeService();
    });

    it("records a new vote in the store and the ledger together", () => {
        const result = service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        expect(result.outcome).toBe("added");
        expect(service.store.getUser("author")?.good).toBe(1);
        expect(service.ledger.active().map((v) => v.voteId)).toEqual(["vote-1"]);
    });

    it("does not log duplicate reactions", () => {
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        expect(service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" })).toEqual({ outcome: "unchanged" });
        expect(service.ledger.size).toBe(1);
    });

    it("reverses the old record when a voter switches sides", () => {
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        const result = service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "bad" });
        if (result.outcome === "unchanged") throw new Error("expected a switch");

        expect(result.outcome).toBe("switched");
        expect(result.replaced.map((v) => v.voteId)).toEqual(["vote-1"]);
        expect(service.ledger.get("vote-1")?.reversed).toBe(true);
        expect(service.ledger.active().map((v) => v.voteId)).toEqual(["vote-2"]);
        expect(service.profile("author")).toMatchObject({ good: 0, bad: 1, score: -1 });
    });

    it("withdraws only a vote cast on the same message", () => {
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        expect(service.withdrawVote({ voterId: "v1", messageId: "m2", context, voteType: "good" })).toEqual({ outcome: "no_match" });
        expect(service.withdrawVote({ voterId: "v1", messageId: "m1", context, voteType: "bad" })).toEqual({ outcome: "no_match" });

        const result = service.withdrawVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        expect(result.outcome).toBe("removed");
        expect(service.store.getUser("author")?.good).toBe(0);
        expect(service.ledger.active()).toEqual([]);
    });

    it("lets a voter vote again after an admin reversed their vote", () => {
        const first = service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        if (first.outcome === "unchanged") throw new Error("expected a vote");
        expect(service.reverseVote(first.vote.voteId)).toBe("ok");
        expect(service.store.stanceOf("author", "v1", "TOKEN")).toBeUndefined();
        expect(service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" }).outcome).toBe("added");
    });

    it("reverses admin votes against the user totals", () => {
        const [vote] = service.addAdminVotes("author", "admin", "bad", 2);
        expect(service.store.getUser("author")?.bad).toBe(2);
        expect(service.reverseVote(vote.voteId)).toBe("ok");
        expect(service.store.getUser("author")?.bad).toBe(1);
        expect(service.reverseVote(vote.voteId)).toBe("already_reversed");
        expect(service.reverseVote("missing")).toBe("not_found");
    });

    it("notifies listeners after each committed mutation", () => {
        const listener = vi.fn();
        const unsubscribe = service.onChange(listener);
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        service.toggleVoter("v9");
        expect(listener).toHaveBeenCalledTimes(2);

        unsubscribe();
        service.setLogChannel("guild", "channel");
        expect(listener).toHaveBeenCalledTimes(2);
    });

    it("toggles disabled voters", () => {
        expect(service.toggleVoter("v1")).toBe(true);
        expect(service.isDisabled("v1")).toBe(true);
        expect(service.toggleVoter("v1")).toBe(false);
        expect(service.isDisabled("v1")).toBe(false);
    });

    it("ranks by score, then good votes, then fewest bad votes", () => {
        service.store.applyAdminVote("u1", "good", 3);
        service.store.applyAdminVote("u1", "bad", 1);
        service.store.applyAdminVote("u2", "good", 2);
        service.store.applyAdminVote("u3", "good", 4);
        service.store.applyAdminVote("u3", "bad", 2);
        service.store.applyAdminVote("u4", "bad", 1);
        service.store.getOrCreateUser("idle");

        expect(service.leaderboard().map((e) => e.userId)).toEqual(["u3", "u1", "u2", "u4"]);
        expect(service.leaderboard((id) => id !== "u3").map((e) => e.userId)).toEqual(["u1", "u2", "u4"]);
        expect(service.leaderboard()[3]).toEqual({ userId: "u4", score: -1, good: 0, bad: 1 });
    });

    it("builds profiles with the busiest tokens first", () => {
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        const other: TrackedMessage = { authorId: "author", tokenAddress: "OTHER", tokenSymbol: "OTH" };
        service.castVote({ voterId: "v1", messageId: "m2", context: other, voteType: "good" });
        service.castVote({ voterId: "v2", messageId: "m2", context: other, voteType: "bad" });
        service.castVote({ voterId: "v3", messageId: "m2", context: other, voteType: "good" });

        const profile = service.profile("author");
        expect(profile).toMatchObject({ userId: "author", good: 3, bad: 1, score: 2, percent: 75 });
        expect(profile.tokens.map((t) => t.symbol)).toEqual(["OTH", "TKN"]);
        expect(profile.tokens[0]).toEqual({ address: "OTHER", symbol: "OTH", good: 2, bad: 1, score: 1 });
        expect(service.profile("nobody")).toEqual({ userId: "nobody", good: 0, bad: 0, score: 0, percent: 0, tokens: [] });
    });

    it("labels recent votes with their token symbol", () => {
        service.castVote({ voterId: "v1", messageId: "m1", context, voteType: "good" });
        service.addAdminVotes("author", "admin", "good", 1);
        const recent = service.recentVotes();
        expect(recent.map((v) => [v.voteId, v.tokenSymbol])).toEqual([
            ["vote-2", "unknown"],
            ["vote-1", "TKN"],
        ]);
    });
});

describe("TrackedMessages", () => {
    it("evicts the oldest message past its limit", () => {
        const tracked = new TrackedMessages(2);
        tracked.track("m1", context);
        tracked.track("m2", context);
        tracked.track("m3", context);
        expect(tracked.get("m1")).toBeUndefined();
        expect(tracked.get("m3")).toEqual(context);
        expect(tracked.size).toBe(2);
    });

    it("keeps everything with no limit", () => {
        const tracked = new TrackedMessages();
        for (let i = 0; i < 50; i++) tracked.track(`m${i}`, context);
        expect(tracked.size).toBe(50);
    });
});
