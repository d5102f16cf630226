// Button callback payloads carry the whole navigation context; nothing is stored
// server-side between presses.
//
//   select:<provider>:<seriesId>
//   series:<provider>:<seriesId>
//   info:<provider>:<seriesId>
//   watch:<provider>:<seriesId>
//   season:<provider>:<seriesId>:<seasonNumber>:<postId>[:<page>]
//   episode:<provider>:<seriesId>:<seasonNumber>:<postId>:<episodeNumber>
//
// An empty <postId> means "the season the series detail lists under <seasonNumber>" and is
// written whenever the post id equals the series id.

export const NAVIGATION_ACTIONS = ["series", "season", "episode", "select", "watch", "info"] as const;

export type NavigationAction = (typeof NAVIGATION_ACTIONS)[number];

/** Telegram rejects callback data longer than this. */
export const MAX_PAYLOAD_BYTES = 64;

const SEPARATOR = ":";

interface SeriesTarget {
    provider: string;
    seriesId: string;
}

export interface SeriesNavigation extends SeriesTarget {
    action: "series" | "select" | "watch" | "info";
}

interface SeasonTarget extends SeriesTarget {
    seasonNumber: number;
    /** Omitted when the series detail can supply it. */
    postId?: string;
}

export interface SeasonNavigation extends SeasonTarget {
    action: "season";
    page: number;
}

export interface EpisodeNavigation extends SeasonTarget {
    action: "episode";
    episodeNumber: number;
}

export type NavigationState = SeriesNavigation | SeasonNavigation | EpisodeNavigation;

export class NavigationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "NavigationError";
    }
}

const isAction = (value: string): value is NavigationAction =>
    NAVIGATION_ACTIONS.some((action) => action === value);

const checkToken = (name: string, value: string): string => {
    if (value.length === 0) {
        throw new NavigationError(`Empty ${name} in navigation payload`);
    }
    if (value.includes(SEPARATOR)) {
        throw new NavigationError(`${name} "${value}" contains "${SEPARATOR}"`);
    }
    return value;
};

const parseCount = (value: string | undefined): number | null =>
    value !== undefined && /^\d+$/.test(value) ? parseInt(value, 10) : null;

// Specials are numbered 12.5 and the like.
const parseEpisodeNumber = (value: string | undefined): number | null =>
    value !== undefined && /^\d+(\.\d+)?$/.test(value) ? parseFloat(value) : null;

const postToken = (state: SeasonTarget): string =>
    state.postId === undefined || state.postId === state.seriesId ? "" : checkToken("postId", state.postId);

export function encodeNavigation(state: NavigationState): string {
    const tokens = [
        state.action,
        checkToken("provider", state.provider),
        checkToken("seriesId", state.seriesId),
    ];

    switch (state.action) {
        case "season":
            tokens.push(String(state.seasonNumber), postToken(state));
            if (state.page > 1) tokens.push(String(state.page));
            break;
        case "episode":
            tokens.push(String(state.seasonNumber), postToken(state), String(state.episodeNumber));
            break;
        default:
            break;
    }

    return tokens.join(SEPARATOR);
}

/** Returns `null` for anything this bot did not encode (stale or foreign buttons). */
export function decodeNavigation(payload: string): NavigationState | null {
    const [action, provider, seriesId, ...rest] = payload.split(SEPARATOR);
    if (action === undefined || !isAction(action) || !provider || !seriesId) return null;

    switch (action) {
        case "season": {
            const seasonNumber = parseCount(rest[0]);
            const post = rest[1];
            if (seasonNumber === null || post === undefined || rest.length > 3) return null;

            const page = rest.length === 3 ? parseCount(rest[2]) : 1;
            if (page === null) return null;

            return { action, provider, seriesId, seasonNumber, postId: post || undefined, page };
        }
        case "episode": {
            const seasonNumber = parseCount(rest[0]);
            const post = rest[1];
            const episodeNumber = parseEpisodeNumber(rest[2]);
            if (seasonNumber === null || post === undefined || episodeNumber === null || rest.length !== 3) {
                return null;
            }

            return { action, provider, seriesId, seasonNumber, postId: post || undefined, episodeNumber };
        }
        default:
            return rest.length === 0 ? { action, provider, seriesId } : null;
    }
}

export const payloadFits = (payload: string): boolean =>
    Buffer.byteLength(payload, "utf8") <= MAX_PAYLOAD_BYTES;
