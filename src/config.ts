import path from "path";
import Joi from "joi";
import { ValidationError } from "./utils/errors";
import type { LogLevel } from "./utils/logger";

export interface BotConfig {
    discordToken: string;
    clientId?: string;
    // the feed bot whose token embeds start a voting message
    sourceBotId?: string;
    dataDir: string;
    supabaseUrl?: string;
    supabaseServiceKey?: string;
    trackedMessageLimit: number;
    flushDebounceMs: number;
    logLevel: LogLevel;
    port: number;
    shutdownGraceMs: number;
}

const schema = Joi.object<BotConfig>({
    discordToken: Joi.string().required().messages({ "any.required": "DISCORD_TOKEN is required in .env" }),
    clientId: Joi.string(),
    sourceBotId: Joi.string().pattern(/^\d+$/),
    dataDir: Joi.string().required(),
    supabaseUrl: Joi.string().uri(),
    supabaseServiceKey: Joi.string(),
    trackedMessageLimit: Joi.number().integer().min(0).default(5000),
    flushDebounceMs: Joi.number().integer().min(0).default(250),
    logLevel: Joi.string().valid("error", "warn", "info", "debug").default("info"),
    port: Joi.number().port().default(3000),
    shutdownGraceMs: Joi.number().integer().min(0).default(10000),
});

// empty strings in .env mean "not set"
function env(source: NodeJS.ProcessEnv, key: string) {
    const value = source[key]?.trim();
    return value ? value : undefined;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
    const result = schema.validate(
        {
            discordToken: env(source, "DISCORD_TOKEN"),
            clientId: env(source, "CLIENT_ID"),
            sourceBotId: env(source, "SOURCE_BOT_ID"),
            dataDir: path.resolve(env(source, "DATA_DIR") ?? "./data"),
            supabaseUrl: env(source, "SUPABASE_URL"),
            supabaseServiceKey: env(source, "SUPABASE_SERVICE_KEY"),
            trackedMessageLimit: env(source, "TRACKED_MESSAGE_LIMIT"),
            flushDebounceMs: env(source, "FLUSH_DEBOUNCE_MS"),
            logLevel: env(source, "LOG_LEVEL"),
            port: env(source, "PORT"),
            shutdownGraceMs: env(source, "SHUTDOWN_GRACE_MS"),
        },
        { abortEarly: false },
    );
    if (result.error !== undefined) {
        throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }
    return result.value;
}
