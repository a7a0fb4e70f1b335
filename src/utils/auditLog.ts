import type { Client } from "discord.js";
import { auditEmbed } from "./embeds";
import type { AuditEntry, AuditSink } from "./reputation/audit";
import type { ReputationService } from "./reputation/service";

/** Posts audit entries to the channel set with /replogs, when one is set. */
export class ChannelAuditSink implements AuditSink {
    constructor(
        private readonly client: Client,
        private readonly reputation: ReputationService,
    ) {}

    async send(guildId: string, entry: AuditEntry): Promise<void> {
        const channelId = this.reputation.getLogChannel(guildId);
        if (!channelId) return;
        const channel = await this.client.channels.fetch(channelId);
        if (!channel || !channel.isTextBased() || !("send" in channel)) {
            throw new Error(`Log channel ${channelId} is not a text channel`);
        }
        await channel.send({ embeds: [auditEmbed(entry)] });
    }
}
