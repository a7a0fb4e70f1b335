import { describe, it, expect } from "vitest";
import {
    defaultSymbol,
    extractTokenAddress,
    extractTokenSymbol,
    parseFooterUsername,
    resolveTokenContext,
} from "../src/utils/reputation/tokenContext";

const SOL_ADDRESS = "So1anaTestAddre55" + "x".repeat(27);
const HEX_ADDRESS = "0x" + "a0".repeat(20);

describe("extractTokenSymbol", () => {
    it("prefers the bold dollar form", () => {
        expect(extractTokenSymbol("**$FOO**")).toBe("FOO");
        expect(extractTokenSymbol("$BAR and **$FOO**")).toBe("FOO");
    });

    it("keeps inner spaces inside bold markers", () => {
        expect(extractTokenSymbol("new call **$pepe coin** just launched")).toBe("PEPE COIN");
    });

    it("stops a bare dollar symbol at the first space", () => {
        expect(extractTokenSymbol("$BAR baz")).toBe("BAR");
        expect(extractTokenSymbol("buy $wif now")).toBe("WIF");
    });

    it("reads markdown link labels", () => {
        expect(extractTokenSymbol("[BAZ](http://x)")).toBe("BAZ");
    });

    it("reads parenthesized labels", () => {
        expect(extractTokenSymbol("Some Token (pepe) launched")).toBe("PEPE");
    });

    it("falls back to the first word", () => {
        expect(extractTokenSymbol("Hello World - rest")).toBe("HELLO");
        expect(extractTokenSymbol("🚀 moon-shot!")).toBe("MOON");
        expect(extractTokenSymbol("wow, such token")).toBe("WOW");
    });

    it("caps the fallback at 20 characters", () => {
        expect(extractTokenSymbol("abcdefghijklmnopqrstuvwxyz")).toBe("ABCDEFGHIJKLMNOPQRST");
    });

    it("returns an empty string when nothing is usable", () => {
        expect(extractTokenSymbol("")).toBe("");
        expect(extractTokenSymbol(null)).toBe("");
        expect(extractTokenSymbol("***")).toBe("");
    });
});

describe("extractTokenAddress", () => {
    it("finds a base58 address", () => {
        expect(extractTokenAddress({ description: `CA: ${SOL_ADDRESS}` })).toBe(SOL_ADDRESS);
    });

    it("finds a hex address when no base58 one is present", () => {
        expect(extractTokenAddress({ title: "Token", fields: [{ name: "Contract", value: HEX_ADDRESS }] })).toBe(HEX_ADDRESS);
    });

    it("prefers base58 over hex", () => {
        expect(extractTokenAddress({ description: HEX_ADDRESS, footer: { text: ` ${SOL_ADDRESS}` } })).toBe(SOL_ADDRESS);
    });

    it("returns the unknown sentinel", () => {
        expect(extractTokenAddress({ title: "gm", description: null, footer: null })).toBe("unknown");
    });
});

describe("defaultSymbol", () => {
    it("shortens addresses and keeps the sentinel", () => {
        expect(defaultSymbol("abcdefghij")).toBe("abcdef...");
        expect(defaultSymbol("unknown")).toBe("unknown");
    });
});

describe("resolveTokenContext", () => {
    it("combines address and symbol", () => {
        expect(resolveTokenContext({ description: SOL_ADDRESS }, "**$MOON**")).toEqual({
            tokenAddress: SOL_ADDRESS,
            tokenSymbol: "MOON",
        });
    });

    it("derives the symbol when the text has none", () => {
        expect(resolveTokenContext({ description: SOL_ADDRESS }, "")).toEqual({
            tokenAddress: SOL_ADDRESS,
            tokenSymbol: "So1ana...",
        });
    });

    it("labels unknown tokens as unknown", () => {
        expect(resolveTokenContext({ title: "gm" }, "$PEPE")).toEqual({ tokenAddress: "unknown", tokenSymbol: "unknown" });
    });
});

describe("parseFooterUsername", () => {
    it("takes the first word of the footer", () => {
        expect(parseFooterUsername("alice • today at 12:00")).toBe("alice");
        expect(parseFooterUsername("  bob")).toBe("bob");
    });

    it("is undefined for empty footers", () => {
        expect(parseFooterUsername("")).toBeUndefined();
        expect(parseFooterUsername(null)).toBeUndefined();
    });
});
