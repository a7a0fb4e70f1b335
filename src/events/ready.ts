import { createLogger } from "../utils/logger";
import type { BotEvent } from "../bot";

const log = createLogger("ready");

module.exports = {
    name: "ready",
    once: true,
    async execute({ reputation, config }, client) {
        log.info(`Logged in as ${client.user.tag}`);
        const users = [...reputation.store.users()].length;
        log.info(`Serving ${users} users and ${reputation.ledger.active().length} active votes`);
        if (!config.sourceBotId) log.warn("SOURCE_BOT_ID not set; no voting messages will be posted");
    },
} satisfies BotEvent<"ready">;
