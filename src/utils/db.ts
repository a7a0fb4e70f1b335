import fs from "fs/promises";
import path from "path";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/**
 * Opaque key -> JSON blob storage. Each key holds one complete record and is
 * overwritten as a whole on every write.
 */
export interface StateStorage {
    readonly name: string;
    /** `undefined` when nothing has been stored under `key` yet. */
    read(key: string): Promise<unknown>;
    write(key: string, data: unknown): Promise<void>;
}

/* ---------- File storage (default, local) ---------- */

function isMissingFile(err: unknown) {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileStateStorage implements StateStorage {
    readonly name: string;

    constructor(private readonly dir: string) {
        this.name = `file:${dir}`;
    }

    private fileFor(key: string) {
        return path.join(this.dir, `${key}.json`);
    }

    async read(key: string): Promise<unknown> {
        let raw: string;
        try {
            raw = await fs.readFile(this.fileFor(key), "utf8");
        } catch (err) {
            if (isMissingFile(err)) return undefined;
            throw err;
        }
        return JSON.parse(raw);
    }

    /** Writes beside the target and renames over it, so readers never see half a file. */
    async write(key: string, data: unknown): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        const target = this.fileFor(key);
        const temp = `${target}.${process.pid}.tmp`;
        await fs.writeFile(temp, JSON.stringify(data, null, 2), "utf8");
        await fs.rename(temp, target);
    }
}

/* ---------- Supabase storage (hosted) ---------- */

const STATE_TABLE = "reputation_state";

/**
 * Expects a table:
 *   create table reputation_state (key text primary key, data jsonb not null, updated_at timestamptz not null);
 */
export class SupabaseStateStorage implements StateStorage {
    readonly name = "supabase";

    constructor(private readonly supabase: SupabaseClient) {}

    async read(key: string): Promise<unknown> {
        const { data, error } = await this.supabase.from(STATE_TABLE).select("data").eq("key", key).maybeSingle();
        if (error) throw error;
        if (!data) return undefined;
        const row: { data: unknown } = data;
        return row.data;
    }

    async write(key: string, data: unknown): Promise<void> {
        const { error } = await this.supabase.from(STATE_TABLE).upsert({ key, data, updated_at: new Date().toISOString() });
        if (error) throw error;
    }
}

/* ---------- In-memory storage (tests, dry runs) ---------- */

export class MemoryStateStorage implements StateStorage {
    readonly name = "memory";
    readonly records = new Map<string, string>();
    writes = 0;

    async read(key: string): Promise<unknown> {
        const raw = this.records.get(key);
        return raw === undefined ? undefined : JSON.parse(raw);
    }

    async write(key: string, data: unknown): Promise<void> {
        this.writes++;
        this.records.set(key, JSON.stringify(data));
    }
}

export interface StorageSettings {
    dataDir: string;
    supabaseUrl?: string;
    supabaseServiceKey?: string;
}

/** Supabase when both credentials are present, JSON files otherwise. */
export function createStateStorage(settings: StorageSettings): StateStorage {
    if (settings.supabaseUrl && settings.supabaseServiceKey) {
        const supabase = createClient(settings.supabaseUrl, settings.supabaseServiceKey, {
            auth: { persistSession: false, autoRefreshToken: false },
            global: { headers: { "x-client-info": "token-rep-bot" } },
        });
        return new SupabaseStateStorage(supabase);
    }
    return new FileStateStorage(settings.dataDir);
}
