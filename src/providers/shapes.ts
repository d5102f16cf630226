// Response envelopes seen across aggregator mirrors. Each matcher only selects; item
// validation happens in the adapter's parser so the same parser serves every envelope.

export type JsonRecord = Record<string, unknown>;

export interface ShapeMatcher {
    readonly name: string;
    /** The candidate list when this envelope is present, otherwise `null`. */
    select(payload: unknown): unknown[] | null;
}

export interface RecordMatcher {
    readonly name: string;
    select(payload: unknown): unknown;
}

export interface ShapeMatch<T> {
    shape: string;
    items: T[];
}

export const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === "object" && value !== null && !Array.isArray(value);

export const readPath = (value: unknown, path: readonly string[]): unknown => {
    let current = value;
    for (const key of path) {
        if (!isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
};

export const readString = (value: unknown): string | undefined => {
    if (typeof value === "string") {
        const trimmed = value.trim();
        return trimmed.length > 0 ? trimmed : undefined;
    }
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return undefined;
};

export const readNumber = (value: unknown): number | undefined => {
    if (typeof value === "number" && Number.isFinite(value)) return value;
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
};

export const arrayAt = (...path: string[]): ShapeMatcher => ({
    name: path.join("."),
    select(payload) {
        const value = readPath(payload, path);
        return Array.isArray(value) ? value : null;
    },
});

export const recordAt = (...path: string[]): RecordMatcher => ({
    name: path.length > 0 ? path.join(".") : "record",
    select: (payload) => readPath(payload, path),
});

/** Fixed priority order; adapters may append their own envelopes after these. */
export const LIST_ENVELOPES: readonly ShapeMatcher[] = [
    { name: "list", select: (payload) => (Array.isArray(payload) ? payload : null) },
    arrayAt("results"),
    arrayAt("data"),
    arrayAt("data", "episodes"),
    arrayAt("episodesList"),
];

export const RECORD_ENVELOPES: readonly RecordMatcher[] = [
    recordAt(),
    recordAt("data"),
    recordAt("results"),
];

const DOCUMENTATION_SENTINELS = ["intro", "routes", "documentation", "endpoints"] as const;

/** API index pages answer 200 with a description of the routes instead of data. */
export const looksLikeDocumentation = (payload: unknown): boolean =>
    isRecord(payload) && DOCUMENTATION_SENTINELS.some((key) => key in payload);

/**
 * Applies the envelopes in order and returns the first that fits. A present but empty
 * container is a well-formed empty answer; a container whose items all fail to parse is
 * skipped in favour of the next envelope.
 */
export function matchList<T>(
    payload: unknown,
    parseItem: (raw: unknown) => T | null,
    extra: readonly ShapeMatcher[] = []
): ShapeMatch<T> | null {
    for (const matcher of [...LIST_ENVELOPES, ...extra]) {
        const candidates = matcher.select(payload);
        if (candidates === null) continue;
        if (candidates.length === 0) return { shape: matcher.name, items: [] };

        const items: T[] = [];
        for (const candidate of candidates) {
            const item = parseItem(candidate);
            if (item !== null) items.push(item);
        }
        if (items.length > 0) return { shape: matcher.name, items };
    }
    return null;
}

export function matchRecord<T>(
    payload: unknown,
    parse: (raw: unknown) => T | null,
    envelopes: readonly RecordMatcher[] = RECORD_ENVELOPES
): T | null {
    for (const matcher of envelopes) {
        const parsed = parse(matcher.select(payload));
        if (parsed !== null) return parsed;
    }
    return null;
}

/** Titles arrive either as a plain string or as an AniList-style `{ english, romaji }` record. */
export const readTitle = (value: unknown): string | undefined => {
    if (isRecord(value)) {
        return (
            readString(value.english) ??
            readString(value.romaji) ??
            readString(value.userPreferred) ??
            readString(value.native)
        );
    }
    return readString(value);
};
