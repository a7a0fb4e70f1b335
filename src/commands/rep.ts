import { SlashCommandBuilder } from "discord.js";
import { profileEmbed } from "../utils/embeds";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("rep")
        .setDescription("Check a user's reputation")
        .addUserOption((o) => o.setName("user").setDescription("User to look up (defaults to you)")),
    async execute(interaction, { reputation }) {
        const target = interaction.options.getUser("user") ?? interaction.user;
        const embed = profileEmbed({
            displayName: target.displayName,
            avatarUrl: target.displayAvatarURL(),
            profile: reputation.profile(target.id),
        });
        await interaction.reply({ embeds: [embed] });
    },
} satisfies Command;
