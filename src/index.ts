import http from "http";
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { Client, GatewayIntentBits, Partials, REST, Routes } from "discord.js";
import { loadConfig } from "./config";
import { ChannelAuditSink } from "./utils/auditLog";
import { createStateStorage } from "./utils/db";
import { describeError } from "./utils/errors";
import { createLogger, setLogLevel } from "./utils/logger";
import { AdminAdjustments } from "./utils/reputation/admin";
import { ReputationPersistence } from "./utils/reputation/persistence";
import { ReactionReconciler } from "./utils/reputation/reconciler";
import { ReputationService } from "./utils/reputation/service";
import type { BotContext, Command } from "./bot";
dotenv.config();

const log = createLogger("main");

function loadConfigOrExit() {
    try {
        return loadConfig();
    } catch (err) {
        log.error(describeError(err));
        process.exit(1);
    }
}

const config = loadConfigOrExit();
setLogLevel(config.logLevel);

const client = new Client({
    intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMembers,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.GuildMessageReactions,
        GatewayIntentBits.MessageContent,
    ],
    // reactions on messages sent before a restart arrive uncached
    partials: [Partials.Message, Partials.Channel, Partials.Reaction, Partials.User],
});

const reputation = new ReputationService({ trackedMessageLimit: config.trackedMessageLimit });
const storage = createStateStorage(config);
const persistence = new ReputationPersistence(reputation, storage, { debounceMs: config.flushDebounceMs });
const audit = new ChannelAuditSink(client, reputation);
const ctx: BotContext = {
    config,
    reputation,
    admin: new AdminAdjustments(reputation),
    reconciler: new ReactionReconciler(reputation, { audit }),
    persistence,
    audit,
    commands: new Map<string, Command>(),
};

interface LoadedEvent {
    name: string;
    once?: boolean;
    execute(ctx: BotContext, ...args: unknown[]): Promise<void>;
}

function isCommand(value: unknown): value is Command {
    return typeof value === "object" && value !== null && "data" in value && "execute" in value && typeof value.execute === "function";
}

function isEvent(value: unknown): value is LoadedEvent {
    return typeof value === "object" && value !== null && "name" in value && typeof value.name === "string" && "execute" in value && typeof value.execute === "function";
}

function moduleFiles(dir: string) {
    if (!fs.existsSync(dir)) return [];
    return fs
        .readdirSync(dir)
        .filter((f) => (f.endsWith(".js") || f.endsWith(".ts")) && !f.endsWith(".d.ts"))
        .map((f) => path.join(dir, f));
}

// load commands dynamically from src/commands
for (const file of moduleFiles(path.join(__dirname, "commands"))) {
    const cmd: unknown = require(file);
    if (isCommand(cmd)) ctx.commands.set(cmd.data.name, cmd);
}

// register events
for (const file of moduleFiles(path.join(__dirname, "events"))) {
    const e: unknown = require(file);
    if (!isEvent(e)) continue;
    const handler = (...args: unknown[]) => {
        e.execute(ctx, ...args).catch((err) => log.error(`Unhandled error in ${e.name} handler`, err));
    };
    if (e.once) client.once(e.name, handler);
    else client.on(e.name, handler);
}

async function registerCommands(token: string) {
    // register commands only if CLIENT_ID is set; otherwise warn but continue
    if (!config.clientId) {
        log.warn("CLIENT_ID not set, skipping global command registration.");
        return;
    }
    const rest = new REST({ version: "10" }).setToken(token);
    const body = [...ctx.commands.values()].map((command) => command.data.toJSON());
    try {
        log.info(`Registering ${body.length} application commands...`);
        await rest.put(Routes.applicationCommands(config.clientId), { body });
        log.info("Commands registered.");
    } catch (err) {
        log.error("Failed to register commands:", err);
    }
}

async function start() {
    // state must be in memory before the first reaction arrives
    await persistence.restore();
    persistence.attach();
    await client.login(config.discordToken);
    await registerCommands(config.discordToken);
}

start().catch((err) => {
    log.error(`Startup failed: ${describeError(err)}`, err);
    process.exit(1);
});

// Small HTTP health + readiness server so hosts that expect a bound port succeed
let shuttingDown = false;

const server = http.createServer((req, res) => {
    // readiness endpoint: return 200 only if bot is logged in and not shutting down
    if (req.url === "/healthz") {
        const ready = client.isReady() && !shuttingDown;
        res.writeHead(ready ? 200 : 503, { "Content-Type": "application/json" });
        res.end(
            JSON.stringify({
                status: ready ? "ok" : "starting",
                uptime: process.uptime(),
                ts: new Date().toISOString(),
                botUser: client.user ? client.user.tag : null,
                pendingFlush: persistence.pending,
                lastPersistenceError: persistence.error?.message ?? null,
            }) + "\n",
        );
        return;
    }

    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(shuttingDown ? "Shutting down\n" : "OK\n");
});

server.listen(config.port, () => {
    log.info(`HTTP health server listening on port ${config.port}`);
});

// graceful shutdown: stop accepting requests, let in-flight events finish, write state, then destroy client
const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");

    server.close(() => log.info("HTTP server closed"));

    log.info(`Waiting ${config.shutdownGraceMs}ms for in-flight work to finish...`);
    await new Promise((resolve) => setTimeout(resolve, config.shutdownGraceMs));

    if (!(await persistence.snapshot())) log.error("Final state snapshot failed; last good one is kept");

    try {
        await client.destroy();
        log.info("Discord client destroyed");
    } catch (e) {
        log.error("Error destroying Discord client:", e);
    }

    setTimeout(() => process.exit(0), 1000);
};

const onSignal = () => {
    shutdown().catch((err) => {
        log.error("Shutdown failed", err);
        process.exit(1);
    });
};
process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

// log unhandled errors so host logs show cause
process.on("uncaughtException", (err) => {
    log.error("uncaughtException:", err);
});
process.on("unhandledRejection", (reason) => {
    log.error("unhandledRejection:", reason);
});
