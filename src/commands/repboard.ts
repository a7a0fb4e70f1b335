import { SlashCommandBuilder, type GuildMember } from "discord.js";
import { leaderboardEmbed } from "../utils/embeds";
import { describeError } from "../utils/errors";
import { rankPresentMembers } from "../utils/leaderboard";
import { createLogger } from "../utils/logger";
import type { Command } from "../bot";

const log = createLogger("repboard");

module.exports = {
    data: new SlashCommandBuilder().setName("repboard").setDescription("Show reputation leaderboard"),
    async execute(interaction, { reputation }) {
        await interaction.deferReply();
        const entries = reputation.leaderboard();
        const guild = interaction.guild;
        if (!guild || !entries.length) {
            await interaction.editReply({ embeds: [leaderboardEmbed(entries)] });
            return;
        }

        // members who left the guild drop off the board
        const members = new Map<string, GuildMember>();
        try {
            const ranking = await rankPresentMembers(entries, async (userIds) => {
                const found = await guild.members.fetch({ user: userIds });
                for (const [id, member] of found) members.set(id, member);
                return found;
            });
            const top = ranking.shown[0];
            const thumbnailUrl = top ? members.get(top.userId)?.displayAvatarURL() : undefined;
            await interaction.editReply({ embeds: [leaderboardEmbed(ranking.shown, thumbnailUrl, ranking.total)] });
        } catch (err) {
            log.warn(`Could not resolve leaderboard members, showing everyone: ${describeError(err)}`);
            await interaction.editReply({ embeds: [leaderboardEmbed(entries)] });
        }
    },
} satisfies Command;
