import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { requireAdmin } from "../utils/permissions";
import { ValidationError } from "../utils/errors";
import { MAX_ADMIN_VOTES } from "../utils/reputation/admin";
import { notifyAudit } from "../utils/reputation/audit";
import { isVoteType } from "../types";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("repadd")
        .setDescription("Add reputation votes to a user (Admin only)")
        .addUserOption((o) => o.setName("user").setDescription("The user to add votes to").setRequired(true))
        .addIntegerOption((o) =>
            o.setName("amount").setDescription("The number of votes to add").setMaxValue(MAX_ADMIN_VOTES).setRequired(true),
        )
        .addStringOption((o) =>
            o
                .setName("vote_type")
                .setDescription("Type of votes to add")
                .setRequired(true)
                .addChoices({ name: "Good", value: "good" }, { name: "Bad", value: "bad" }),
        )
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
    async execute(interaction, { admin, audit }) {
        requireAdmin(interaction);
        const user = interaction.options.getUser("user", true);
        const amount = interaction.options.getInteger("amount", true);
        const voteType = interaction.options.getString("vote_type", true);
        if (!isVoteType(voteType)) throw new ValidationError("❌ Vote type must be good or bad");

        const votes = admin.addVotes(user.id, interaction.user.id, voteType, amount);
        await notifyAudit(audit, interaction.guildId, {
            kind: "admin_added",
            adminId: interaction.user.id,
            authorId: user.id,
            voteType,
            voteIds: votes.map((v) => v.voteId),
        });
        await interaction.reply({ content: `✅ Added \`${amount}\` ${voteType} votes to ${user}.`, ephemeral: true });
    },
} satisfies Command;
