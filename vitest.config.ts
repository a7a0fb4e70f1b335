import { defineConfig } from "vitest/config";
import path from "node:path";

const ROOT = process.cwd();

export default defineConfig({
    test: {
        root: ROOT,
        dir: path.resolve(ROOT, "test"),
        include: ["**/*.test.ts"],
        exclude: ["**/node_modules/**", "**/dist/**"],
        watch: false,
        environment: "node",
        pool: "forks",
    },
});
