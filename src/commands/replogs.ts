import { ChannelType, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { requireAdmin } from "../utils/permissions";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("replogs")
        .setDescription("Set the channel for reputation logs")
        .addChannelOption((o) =>
            o
                .setName("channel")
                .setDescription("The channel to send reputation logs to")
                .addChannelTypes(ChannelType.GuildText)
                .setRequired(true),
        )
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
    async execute(interaction, { reputation }) {
        requireAdmin(interaction);
        const channel = interaction.options.getChannel("channel", true);
        if (!interaction.guildId) return;
        reputation.setLogChannel(interaction.guildId, channel.id);
        await interaction.reply({ content: `✅ Reputation logs will be sent to <#${channel.id}>`, ephemeral: true });
    },
} satisfies Command;
