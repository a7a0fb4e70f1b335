import { Colors, EmbedBuilder, escapeMarkdown } from "discord.js";
import { ADMIN_TOKEN, UNKNOWN_TOKEN, type LeaderboardEntry, type RemovalReport, type VoteType } from "../types";
import type { Profile, VoteSummary } from "./reputation/service";
import type { AuditEntry } from "./reputation/audit";

const BLACK = 0x000000;
const RANK_MEDALS = ["🥇", "🥈", "🥉", "4️⃣", "5️⃣", "6️⃣", "7️⃣", "8️⃣", "9️⃣", "🔟"];

function medal(index: number) {
    return RANK_MEDALS[index] ?? `${index + 1}.`;
}

function shortAddress(address: string) {
    return `${address.slice(0, 6)}...`;
}

function voteColor(voteType: VoteType) {
    return voteType === "good" ? Colors.Green : Colors.Red;
}

const BAR_WIDTH = 20;

/** Two-row up/down bar for a profile, e.g. `` `Up  ` ███████████████░░░░░ 3 ( 75%) ``. */
export function balanceBar(up: number, down: number) {
    const total = up + down;
    const row = (label: string, count: number) => {
        const share = total === 0 ? 0 : count / total;
        const filled = Math.round(share * BAR_WIDTH);
        const pct = `${Math.round(share * 100)}%`.padStart(4, " ");
        return `\`${label.padEnd(4)}\` ${"█".repeat(filled)}${"░".repeat(BAR_WIDTH - filled)} ${count} (${pct})`;
    };
    return [row("Up", up), row("Down", down)].join("\n");
}

/** Compact line posted under each token call; the message the 🟢/🔴 reactions go on. */
export function simpleRepEmbed(profile: Profile) {
    return new EmbedBuilder()
        .setDescription(
            `<@${profile.userId}> has ` +
                `\`${profile.good}\` 🟢 | \`${profile.bad}\` 🔴 | ` +
                `**Score:** \`${profile.score}\` 🪙 | ` +
                `**Reputation:** \`${profile.percent.toFixed(1)}%\``,
        )
        .setColor(BLACK);
}

export function profileEmbed(params: { displayName: string; avatarUrl?: string; profile: Profile }) {
    const { profile } = params;
    const e = new EmbedBuilder()
        .setTitle(`Reputation Profile of ${params.displayName}`)
        .setColor(BLACK)
        .addFields({
            name: "Total Reputation",
            value: `**Score:** \`${profile.score}\`\n**Upvotes:** \`${profile.good}\`\n**Downvotes:** \`${profile.bad}\``,
        });
    if (params.avatarUrl) e.setThumbnail(params.avatarUrl);

    if (profile.good + profile.bad > 0) {
        e.addFields({ name: "Balance", value: balanceBar(profile.good, profile.bad) });
    }

    if (profile.tokens.length) {
        const lines = profile.tokens.map((t, i) => {
            const label = escapeMarkdown(t.symbol);
            const display = t.address === UNKNOWN_TOKEN ? label : `${label} (\`${shortAddress(t.address)}\`)`;
            return `${medal(i)} ${display}\nUp: \`${t.good}\` Down: \`${t.bad}\` Score: \`${t.score}\``;
        });
        e.addFields({ name: "Top Tokens:", value: lines.join("\n") });
    }
    return e;
}

/** `total` counts every ranked participant when `entries` holds only the ones shown. */
export function leaderboardEmbed(entries: LeaderboardEntry[], thumbnailUrl?: string, total = entries.length) {
    const e = new EmbedBuilder().setTitle("🏆 Reputation Leaderboard").setColor(BLACK);
    if (!entries.length) return e.setDescription("No one has reputation points yet!");

    if (thumbnailUrl) e.setThumbnail(thumbnailUrl);
    const lines = entries
        .slice(0, 10)
        .map((entry, i) => `${medal(i)} <@${entry.userId}>\n - Score: ${entry.score} (↑${entry.good} ↓${entry.bad})`);
    lines.push(`\nTotal participants: ${total}`);
    return e.setDescription(lines.join("\n"));
}

export function voteManagerEmbed(votes: VoteSummary[]) {
    const e = new EmbedBuilder().setTitle("Vote Manager").setColor(BLACK).setDescription("Most recent votes:");
    for (const vote of votes) {
        const token = vote.tokenAddress === ADMIN_TOKEN ? "admin adjustment" : `\`${vote.tokenSymbol}\` (\`${shortAddress(vote.tokenAddress)}\`)`;
        e.addFields({
            name: `Vote ID: ${vote.voteId}`,
            value:
                `Type: \`${vote.voteType.toUpperCase()}\`\n` +
                `Author: <@${vote.authorId}>\n` +
                `Voter: <@${vote.voterId}>\n` +
                `Token: ${token}\n` +
                `Time: <t:${Math.floor(Date.parse(vote.timestamp) / 1000)}:f>\n` +
                `Reversed: \`${vote.reversed}\``,
        });
    }
    return e;
}

function idList(ids: string[], max = 5) {
    return `\`${ids.slice(0, max).join(", ")}\`` + (ids.length > max ? "..." : "");
}

export function auditEmbed(entry: AuditEntry) {
    switch (entry.kind) {
        case "vote_added":
        case "vote_switched": {
            const { vote } = entry;
            const lines = [
                `**Voter:** <@${vote.voterId}> (\`${vote.voterId}\`)`,
                `**Author:** <@${vote.authorId}>`,
                `**Type:** ${vote.voteType}`,
                `**Token:** \`${entry.tokenSymbol}\` (\`${shortAddress(vote.tokenAddress)}\`)`,
                `**Vote ID:** \`${vote.voteId}\``,
            ];
            if (entry.messageUrl) lines.push(`**Message:** [Jump](${entry.messageUrl})`);
            return new EmbedBuilder()
                .setTitle(entry.kind === "vote_switched" ? "Vote Switched" : "Vote Added")
                .setColor(voteColor(vote.voteType))
                .setDescription(lines.join("\n"));
        }
        case "vote_removed": {
            const { vote } = entry;
            return new EmbedBuilder()
                .setTitle("Vote Removed")
                .setColor(Colors.Orange)
                .setDescription(
                    [
                        `**Voter:** <@${vote.voterId}> (\`${vote.voterId}\`)`,
                        `**Author:** <@${vote.authorId}>`,
                        `**Type:** ${vote.voteType}`,
                        `**Token:** \`${entry.tokenSymbol}\` (\`${shortAddress(vote.tokenAddress)}\`)`,
                        `**Vote ID:** \`${vote.voteId}\``,
                    ].join("\n"),
                );
        }
        case "admin_added":
            return new EmbedBuilder()
                .setTitle("Votes Added by Admin")
                .setColor(voteColor(entry.voteType))
                .setDescription(
                    [
                        `**Admin:** <@${entry.adminId}>`,
                        `**Target:** <@${entry.authorId}>`,
                        `**Type:** ${entry.voteType === "good" ? "Good" : "Bad"}`,
                        `**Amount:** \`${entry.voteIds.length}\``,
                        `**Vote IDs:** ${idList(entry.voteIds)}`,
                    ].join("\n"),
                );
        case "admin_removed":
            return new EmbedBuilder()
                .setTitle("Votes Removed by Admin")
                .setColor(Colors.Orange)
                .setDescription([`**Admin:** <@${entry.adminId}>`, `**Amount:** \`${entry.removed.length}\``, `**Vote IDs:** ${idList(entry.removed)}`].join("\n"));
    }
}

/** Reply body for /repremove. */
export function removalReportText(report: RemovalReport) {
    const section = (title: string, ids: string[]) => `${title} (${ids.length})**:\n` + ids.map((id) => `- \`${id}\``).join("\n");
    const parts: string[] = [];
    if (report.removed.length) parts.push(section("✅ **Removed", report.removed));
    if (report.alreadyReversed.length) parts.push(section("⚠️ **Already Reversed", report.alreadyReversed));
    if (report.notFound.length) parts.push(section("❌ **Invalid IDs", report.notFound));
    return parts.join("\n\n") || "No vote IDs given.";
}
