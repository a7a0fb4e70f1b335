import { createLogger } from "../utils/logger";
import { sourceFor, toReactionEvent } from "../utils/reactions";
import type { BotEvent } from "../bot";

const log = createLogger("reactions");

module.exports = {
    name: "messageReactionAdd",
    async execute({ reconciler }, reaction, user) {
        const outcome = await reconciler.reactionAdded(toReactionEvent(reaction, user), sourceFor(reaction, user));
        log.debug(`add ${reaction.emoji.name} by ${user.id} on ${reaction.message.id}: ${outcome.status}`);
    },
} satisfies BotEvent<"messageReactionAdd">;
