import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { requireAdmin } from "../utils/permissions";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("repdisable")
        .setDescription("Disable a user's ability to vote on reputation")
        .addUserOption((o) => o.setName("user").setDescription("The user to disable/enable").setRequired(true))
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
    async execute(interaction, { reputation }) {
        requireAdmin(interaction);
        const user = interaction.options.getUser("user", true);
        const disabled = reputation.toggleVoter(user.id);
        await interaction.reply({ content: `✅ ${user} has been ${disabled ? "disabled" : "enabled"} from voting.`, ephemeral: true });
    },
} satisfies Command;
