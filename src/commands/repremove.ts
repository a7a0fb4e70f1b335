import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { requireAdmin } from "../utils/permissions";
import { ValidationError } from "../utils/errors";
import { removalReportText } from "../utils/embeds";
import { parseVoteIds } from "../utils/reputation/admin";
import { notifyAudit } from "../utils/reputation/audit";
import type { Command } from "../bot";

module.exports = {
    data: new SlashCommandBuilder()
        .setName("repremove")
        .setDescription("Remove reputation votes by IDs (Admin only)")
        .addStringOption((o) => o.setName("vote_ids").setDescription("Comma-separated list of vote IDs to remove").setRequired(true))
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
    async execute(interaction, { admin, audit }) {
        requireAdmin(interaction);
        const ids = parseVoteIds(interaction.options.getString("vote_ids", true));
        if (!ids.length) throw new ValidationError("❌ Give at least one vote ID");

        const report = admin.removeVotesByIds(ids);
        if (report.removed.length) {
            await notifyAudit(audit, interaction.guildId, { kind: "admin_removed", adminId: interaction.user.id, removed: report.removed });
        }
        await interaction.reply({ content: removalReportText(report), ephemeral: true });
    },
} satisfies Command;
