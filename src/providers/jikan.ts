import { NotFound } from "./errors.js";
import { ProviderClient } from "./http.js";
import {
    isRecord,
    matchList,
    matchRecord,
    readNumber,
    readString,
    recordAt,
} from "./shapes.js";
import type {
    AdapterOptions,
    EpisodeRef,
    ProviderAdapter,
    SearchResult,
    SeasonRef,
    SeriesAttribute,
    SeriesDetail,
    StreamSource,
} from "./types.js";

export interface JikanOptions extends AdapterOptions {
    baseUrl: string;
    limit?: number;
}

function parseSearchItem(raw: unknown): SearchResult | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.mal_id);
    const title = readString(raw.title_english) ?? readString(raw.title);
    if (!id || !title) return null;

    const sourceUrl = readString(raw.url);
    return sourceUrl ? { id, title, sourceUrl } : { id, title };
}

function parseEpisode(raw: unknown): EpisodeRef | null {
    if (!isRecord(raw)) return null;

    const number = readNumber(raw.mal_id);
    if (number === undefined) return null;

    const episode: EpisodeRef = {
        number,
        name: readString(raw.title) ?? `Episode ${number}`,
        id: String(number),
    };
    const url = readString(raw.url);
    if (url) episode.url = url;
    return episode;
}

function parseDetail(raw: unknown): SeriesDetail | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.mal_id);
    const title = readString(raw.title_english) ?? readString(raw.title);
    if (!id || !title) return null;

    const attributes: SeriesAttribute[] = [];
    const push = (label: string, value: string | undefined) => {
        if (value) attributes.push({ label, value });
    };
    push("Type", readString(raw.type));
    push("Status", readString(raw.status));
    push("Episodes", readString(raw.episodes));
    push("Duration", readString(raw.duration));
    push("Score", readString(raw.score));
    push("Year", readString(raw.year));
    if (Array.isArray(raw.genres)) {
        const genres = raw.genres
            .map((genre) => (isRecord(genre) ? readString(genre.name) : undefined))
            .filter((genre): genre is string => Boolean(genre));
        push("Genres", genres.join(", ") || undefined);
    }

    // MAL lists every entry (sequels included) separately, so each entry is a single season.
    const season: SeasonRef = { seasonNumber: 1, label: "Episodes", postId: id };

    return {
        id,
        title,
        overview: readString(raw.synopsis),
        attributes,
        seasons: [season],
    };
}

/** Metadata from the Jikan MAL mirror. Episode titles are available, streams are not. */
export class JikanProvider implements ProviderAdapter {
    readonly key = "jikan";
    readonly name = "Jikan";

    private readonly client: ProviderClient;
    private readonly baseUrl: string;
    private readonly limit: number;

    constructor(options: JikanOptions) {
        this.client = new ProviderClient(this.name, options);
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.limit = options.limit ?? 10;
    }

    async search(query: string): Promise<SearchResult[]> {
        return this.client.guard<SearchResult[]>("search", [], async () => {
            const url = new URL(`${this.baseUrl}/anime`);
            url.searchParams.set("q", query);
            url.searchParams.set("limit", String(this.limit));
            url.searchParams.set("sfw", "true");

            const matched = await this.client.firstMatch("search", [url.toString()], (payload) =>
                matchList(payload, parseSearchItem)
            );
            return this.client.unwrap("search", matched, `No results for "${query}"`);
        });
    }

    async detail(id: string): Promise<SeriesDetail | null> {
        return this.client.guard<SeriesDetail | null>("detail", null, async () => {
            const url = `${this.baseUrl}/anime/${encodeURIComponent(id)}/full`;
            return this.client.firstMatch("detail", [url], (payload) =>
                matchRecord(payload, parseDetail, [recordAt("data")])
            );
        });
    }

    async episodes(season: SeasonRef): Promise<EpisodeRef[]> {
        return this.client.guard<EpisodeRef[]>("episodes", [], async () => {
            const url = `${this.baseUrl}/anime/${encodeURIComponent(season.postId)}/episodes`;
            const matched = await this.client.firstMatch("episodes", [url], (payload) =>
                matchList(payload, parseEpisode)
            );
            return this.client.unwrap("episodes", matched, `No episodes for ${season.postId}`);
        });
    }

    async streams(episode: EpisodeRef): Promise<StreamSource[]> {
        this.client.report("streams", new NotFound(this.name, `No stream sources offered for ${episode.id}`));
        return [];
    }
}
