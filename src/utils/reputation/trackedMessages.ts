import type { TrackedMessage } from "../../types";

/**
 * Voting messages the bot has posted, keyed by message id. The oldest entry is
 * evicted once `limit` is reached; a limit of 0 keeps everything.
 */
export class TrackedMessages {
    private readonly messages = new Map<string, TrackedMessage>();

    constructor(private readonly limit = 0) {}

    track(messageId: string, context: TrackedMessage) {
        this.messages.delete(messageId);
        this.messages.set(messageId, { ...context });
        if (this.limit > 0) {
            while (this.messages.size > this.limit) {
                const oldest = this.messages.keys().next();
                if (oldest.done) break;
                this.messages.delete(oldest.value);
            }
        }
    }

    get(messageId: string): TrackedMessage | undefined {
        return this.messages.get(messageId);
    }

    get size() {
        return this.messages.size;
    }
}
