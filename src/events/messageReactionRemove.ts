import { createLogger } from "../utils/logger";
import { toReactionEvent } from "../utils/reactions";
import type { BotEvent } from "../bot";

const log = createLogger("reactions");

module.exports = {
    name: "messageReactionRemove",
    async execute({ reconciler }, reaction, user) {
        const outcome = await reconciler.reactionRemoved(toReactionEvent(reaction, user));
        log.debug(`remove ${reaction.emoji.name} by ${user.id} on ${reaction.message.id}: ${outcome.status}`);
    },
} satisfies BotEvent<"messageReactionRemove">;
