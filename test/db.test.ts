import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileStateStorage, createStateStorage } from "../src/utils/db";

describe("FileStateStorage", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "rep-state-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("returns undefined for records never written", async () => {
        expect(await new FileStateStorage(path.join(dir, "nested")).read("reputation")).toBeUndefined();
    });

    it("overwrites a record as a whole and leaves no temp files", async () => {
        const storage = new FileStateStorage(path.join(dir, "nested"));
        await storage.write("disabled_voters", ["v1", "v2"]);
        await storage.write("disabled_voters", ["v3"]);
        expect(await storage.read("disabled_voters")).toEqual(["v3"]);
        expect(await fs.readdir(path.join(dir, "nested"))).toEqual(["disabled_voters.json"]);
    });
});

describe("createStateStorage", () => {
    it("uses local files unless both Supabase settings are present", () => {
        expect(createStateStorage({ dataDir: "/tmp/rep", supabaseUrl: "https://example.test" }).name).toBe("file:/tmp/rep");
        expect(createStateStorage({ dataDir: "/tmp/rep", supabaseUrl: "https://example.test", supabaseServiceKey: "test-secret" }).name).toBe("supabase");
    });
});
