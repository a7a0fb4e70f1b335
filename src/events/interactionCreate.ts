import { isAppError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import type { BotEvent } from "../bot";

const log = createLogger("interactions");

module.exports = {
    name: "interactionCreate",
    async execute(ctx, interaction) {
        if (!interaction.isChatInputCommand()) return;

        const command = ctx.commands.get(interaction.commandName);
        if (!command) {
            await interaction.reply({ content: "Command not found.", ephemeral: true });
            return;
        }
        try {
            await command.execute(interaction, ctx);
        } catch (err) {
            const content = isAppError(err) ? err.message : "There was an error executing that command.";
            if (isAppError(err)) log.info(`/${interaction.commandName} rejected (${err.code}): ${err.message}`);
            else log.error(`/${interaction.commandName} failed`, err);
            try {
                if (interaction.deferred || interaction.replied) await interaction.followUp({ content, ephemeral: true });
                else await interaction.reply({ content, ephemeral: true });
            } catch (replyErr) {
                log.warn("Could not report the failure to the user", replyErr);
            }
        }
    },
} satisfies BotEvent<"interactionCreate">;
