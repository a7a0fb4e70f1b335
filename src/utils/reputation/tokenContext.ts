import { UNKNOWN_TOKEN } from "../../types";

const BASE58_ADDRESS = /[1-9A-HJ-NP-Za-km-z]{32,44}/;
const HEX_ADDRESS = /0x[a-fA-F0-9]{40}/;

const BOLD_DOLLAR = /\*\*\$([A-Za-z0-9 ]{2,20})\*\*/;
// unlike the delimited forms, a bare $SYMBOL ends at the first space
const BARE_DOLLAR = /\$([A-Za-z0-9]{2,20})/;
const MARKDOWN_LINK = /\[([A-Za-z0-9 ]{2,20})\]\(/;
const PARENTHESIZED = /\(([A-Za-z0-9 ]{2,20})\)/;

const LEADING_GLYPHS = /^[\s\p{Extended_Pictographic}\u{10000}-\u{10FFFF}\u{FE0F}\u{200D}]+/u;
const WORD_BREAK = /[\s\-–—]+/;
const EDGE_PUNCTUATION = /^[.,:;!?*$]+|[.,:;!?*$]+$/g;

/** The parts of a rich embed that may carry a token address. Shaped after discord.js `Embed`. */
export interface TokenPostContent {
    title?: string | null;
    description?: string | null;
    fields?: ReadonlyArray<{ name: string; value: string }>;
    footer?: { text?: string | null } | null;
}

function flatten(content: TokenPostContent) {
    let text = "";
    if (content.title) text += content.title;
    if (content.description) text += content.description;
    for (const field of content.fields ?? []) text += field.name + field.value;
    if (content.footer?.text) text += content.footer.text;
    return text;
}

/**
 * Finds the token address in an embed. Base58 (Solana-style) addresses win over
 * 0x-prefixed hex ones; `"unknown"` when neither appears.
 */
export function extractTokenAddress(content: TokenPostContent): string {
    const text = flatten(content);
    const base58 = BASE58_ADDRESS.exec(text);
    if (base58) return base58[0];
    const hex = HEX_ADDRESS.exec(text);
    if (hex) return hex[0];
    return UNKNOWN_TOKEN;
}

/**
 * Pulls a ticker out of free text. Tried in order: `**$SYM**`, `$SYM`, `[SYM](`,
 * `(SYM)`, then the first word of the text with leading emoji removed.
 */
export function extractTokenSymbol(text: string | null | undefined): string {
    if (!text) return "";

    const bold = BOLD_DOLLAR.exec(text);
    if (bold) return bold[1].trim().toUpperCase();

    const bare = BARE_DOLLAR.exec(text);
    if (bare) return bare[1].toUpperCase();

    const link = MARKDOWN_LINK.exec(text);
    if (link) return link[1].trim().toUpperCase();

    const paren = PARENTHESIZED.exec(text);
    if (paren) return paren[1].trim().toUpperCase();

    const cleaned = text.replace(LEADING_GLYPHS, "");
    const first = cleaned.split(WORD_BREAK)[0] ?? "";
    const symbol = first.replace(EDGE_PUNCTUATION, "");
    return symbol ? symbol.slice(0, 20).toUpperCase() : "";
}

/** Label shown for a token we have no symbol for. */
export function defaultSymbol(address: string) {
    return address === UNKNOWN_TOKEN ? UNKNOWN_TOKEN : `${address.slice(0, 6)}...`;
}

export interface TokenContext {
    tokenAddress: string;
    tokenSymbol: string;
}

export function resolveTokenContext(content: TokenPostContent, messageText: string | null | undefined): TokenContext {
    const tokenAddress = extractTokenAddress(content);
    let tokenSymbol = extractTokenSymbol(messageText);
    if (tokenAddress === UNKNOWN_TOKEN || !tokenSymbol) tokenSymbol = defaultSymbol(tokenAddress);
    return { tokenAddress, tokenSymbol };
}

/** The feed bot signs each post with the poster's username as the first footer word. */
export function parseFooterUsername(footerText: string | null | undefined): string | undefined {
    const first = footerText?.trim().split(/\s+/)[0];
    return first ? first : undefined;
}
