import type { Guild, GuildMember } from "discord.js";
import { simpleRepEmbed } from "../utils/embeds";
import { describeError } from "../utils/errors";
import { createLogger } from "../utils/logger";
import { parseFooterUsername, resolveTokenContext } from "../utils/reputation/tokenContext";
import { VOTE_GLYPHS } from "../utils/reputation/reconciler";
import type { BotEvent } from "../bot";

const log = createLogger("feed");

async function findMemberByUsername(guild: Guild, username: string): Promise<GuildMember | undefined> {
    const cached = guild.members.cache.find((m) => m.user.username === username);
    if (cached) return cached;
    const found = await guild.members.fetch({ query: username, limit: 10 });
    return found.find((m) => m.user.username === username);
}

/**
 * Watches the feed bot. For the first embed whose footer names a member, posts
 * that member's reputation line and turns it into a voting message.
 */
module.exports = {
    name: "messageCreate",
    async execute({ config, reputation }, message) {
        if (!config.sourceBotId || message.author.id !== config.sourceBotId) return;
        if (!message.inGuild() || !message.embeds.length) return;

        for (const embed of message.embeds) {
            const username = parseFooterUsername(embed.footer?.text);
            if (!username) continue;
            try {
                const member = await findMemberByUsername(message.guild, username);
                if (!member) continue;

                const { tokenAddress, tokenSymbol } = resolveTokenContext(embed, message.content);
                const posted = await message.channel.send({ embeds: [simpleRepEmbed(reputation.profile(member.id))] });
                reputation.trackMessage(posted.id, { authorId: member.id, tokenAddress, tokenSymbol });
                log.info(`Tracking ${posted.id} for ${member.user.username} on ${tokenSymbol} (${tokenAddress})`);

                for (const glyph of Object.keys(VOTE_GLYPHS)) await posted.react(glyph);
                return;
            } catch (err) {
                log.error(`Error processing feed message ${message.id}: ${describeError(err)}`, err);
            }
        }
    },
} satisfies BotEvent<"messageCreate">;
