import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { requireAdmin } from "../utils/permissions";
import { voteManagerEmbed } from "../utils/embeds";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("repmanager")
        .setDescription("Manage and review reputation votes")
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
    async execute(interaction, { reputation }) {
        requireAdmin(interaction);
        const votes = reputation.recentVotes(10);
        if (!votes.length) {
            await interaction.reply({ content: "❌ No votes found", ephemeral: true });
            return;
        }
        await interaction.reply({ embeds: [voteManagerEmbed(votes)] });
    },
} satisfies Command;
