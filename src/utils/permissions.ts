import { PermissionFlagsBits, type ChatInputCommandInteraction } from "discord.js";
import { PermissionDeniedError } from "./errors";

/**
 * Default member permissions only hide a command; guild overrides can expose it
 * again, so admin commands check the caller too.
 */
export function requireAdmin(interaction: ChatInputCommandInteraction) {
    if (!interaction.inGuild() || !interaction.memberPermissions?.has(PermissionFlagsBits.Administrator)) {
        throw new PermissionDeniedError("❌ Administrator permissions required", { userId: interaction.user.id });
    }
}
