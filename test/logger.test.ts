import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, parseLevel, setLogLevel } from "../src/utils/logger";
import { AppError, NotificationError, PermissionDeniedError, describeError, isAppError } from "../src/utils/errors";

describe("logger", () => {
    afterEach(() => {
        setLogLevel("info");
        vi.restoreAllMocks();
    });

    it("tags lines with level and source and honours the threshold", () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        setLogLevel("warn");

        const log = createLogger("ledger");
        log.info("hidden");
        log.warn("shown", 42);

        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[\S+\] \[WARN\] \[ledger\] shown$/), 42);
    });

    it("parses level names", () => {
        expect(parseLevel("debug")).toBe("debug");
        expect(parseLevel("verbose")).toBeUndefined();
        expect(parseLevel(undefined)).toBeUndefined();
    });
});

describe("errors", () => {
    it("carries a code and keeps subclass identity", () => {
        const cause = new Error("socket hang up");
        const err = new NotificationError("Audit sink unreachable", { guildId: "g1" }, cause);
        expect(err).toBeInstanceOf(AppError);
        expect(err.name).toBe("NotificationError");
        expect(err.code).toBe("NOTIFICATION_FAILURE");
        expect(err.cause).toBe(cause);
        expect(isAppError(err)).toBe(true);
        expect(isAppError(cause)).toBe(false);
        expect(new PermissionDeniedError().message).toBe("Administrator permissions required");
    });

    it("describes any thrown value", () => {
        expect(describeError(new Error("boom"))).toBe("boom");
        expect(describeError("plain")).toBe("plain");
    });
});
