import type {
    ChatInputCommandInteraction,
    ClientEvents,
    RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { BotConfig } from "./config";
import type { AdminAdjustments } from "./utils/reputation/admin";
import type { AuditSink } from "./utils/reputation/audit";
import type { ReputationPersistence } from "./utils/reputation/persistence";
import type { ReactionReconciler } from "./utils/reputation/reconciler";
import type { ReputationService } from "./utils/reputation/service";

/** Everything commands and event handlers share. Built once in index.ts. */
export interface BotContext {
    config: BotConfig;
    reputation: ReputationService;
    admin: AdminAdjustments;
    reconciler: ReactionReconciler;
    persistence: ReputationPersistence;
    audit: AuditSink;
    commands: Map<string, Command>;
}

export interface Command {
    data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
    execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<unknown>;
}

export interface BotEvent<K extends keyof ClientEvents> {
    name: K;
    once?: boolean;
    execute(ctx: BotContext, ...args: ClientEvents[K]): Promise<void>;
}
