import type { MessageReaction, PartialMessageReaction, PartialUser, User } from "discord.js";
import { describeError } from "./errors";
import { createLogger } from "./logger";
import type { ReactionEvent, ReactionSource } from "./reputation/reconciler";

const log = createLogger("reactions");

type AnyReaction = MessageReaction | PartialMessageReaction;

/**
 * Reactions arrive partial when the message is not cached; id, emoji and the
 * message reference are still present, which is all a vote needs.
 */
export function toReactionEvent(reaction: AnyReaction, user: User | PartialUser): ReactionEvent {
    return {
        actorId: user.id,
        actorIsBot: user.bot === true,
        messageId: reaction.message.id,
        guildId: reaction.message.guildId,
        glyph: reaction.emoji.name ?? "",
        messageUrl: reaction.message.url,
    };
}

export function sourceFor(reaction: AnyReaction, user: User | PartialUser): ReactionSource {
    return {
        async removeActorReaction() {
            await reaction.users.remove(user.id);
        },
        async notifyActorPrivately(text) {
            await user.send(text);
        },
        async notifyChannel(text, ttlMs) {
            const channel = reaction.message.channel;
            if (!("send" in channel)) throw new Error("Channel does not accept messages");
            const notice = await channel.send(text);
            setTimeout(() => {
                notice.delete().catch((err) => log.debug(`Could not delete notice: ${describeError(err)}`));
            }, ttlMs).unref();
        },
    };
}
