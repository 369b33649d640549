import type { TallyEntry, TokenizedLine } from './constants.js';

const MAX_UNSIGNED_INT = 0xFFFFFFFF;

export default class ParserUtils {
    // e.g. " 20:34 ClientConnect: 2" => { timestamp: "20:34", content: "ClientConnect: 2" }
    public static tokenizeLine(line: string): TokenizedLine | undefined {
        const trimmed = line.trim();
        if (trimmed.length === 0)
            return undefined;

        const match = trimmed.match(/^(\d{1,2}:\d{2})\s+(.+)$/s);
        if (!match)
            return undefined;

        return { timestamp: match[1], content: match[2] };
    }

    /** Parses a 32-bit unsigned integer; anything but (optionally '+'-prefixed) decimal digits is rejected. */
    public static parseUnsignedInt(value: string): number | undefined {
        if (!/^\+?[0-9]+$/.test(value))
            return undefined;

        const parsed = Number(value);
        if (!Number.isSafeInteger(parsed) || parsed > MAX_UNSIGNED_INT)
            return undefined;

        return parsed;
    }

    // Splits on the first occurrence only; the separator must be present.
    public static splitOnFirst(value: string, separator: string): [string, string] | undefined {
        const index = value.indexOf(separator);
        if (index === -1)
            return undefined;

        return [value.slice(0, index), value.slice(index + separator.length)];
    }

    /**
     * Pulls the display name out of a userinfo blob such as `n\Isgalamido\t\0\model\xian/default`.
     * The name is everything after the first `n\` up to the next backslash.
     */
    public static extractPlayerName(userinfo: string): string | undefined {
        const match = userinfo.match(/n\\([^\\]+)/);
        return match ? match[1] : undefined;
    }

    // count descending; ties broken by key so output is stable
    public static sortTally(tally: Iterable<[string, number]>): TallyEntry[] {
        return Array.from(tally, ([key, count]) => ({ key, count }))
            .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    }
}
