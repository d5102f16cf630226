import { ProviderClient } from "./http.js";
import { parseEpisode, parseSearchItem, parseSource } from "./items.js";
import {
    arrayAt,
    isRecord,
    matchList,
    matchRecord,
    readString,
    readTitle,
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

export interface GogoanimeOptions extends AdapterOptions {
    /** Mirrors of the same aggregator API, tried in order. */
    baseUrls: string[];
}

const EPISODE_ENVELOPES = [arrayAt("episodes")];
const SOURCE_ENVELOPES = [arrayAt("sources"), arrayAt("data", "sources")];

function parseInfo(raw: unknown): SeriesDetail | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.id);
    const title = readTitle(raw.title);
    if (!id || !title) return null;

    const attributes: SeriesAttribute[] = [];
    const push = (label: string, value: string | undefined) => {
        if (value) attributes.push({ label, value });
    };
    push("Type", readString(raw.type));
    push("Status", readString(raw.status));
    push("Released", readString(raw.releaseDate));
    push("Episodes", readString(raw.totalEpisodes));
    push("Audio", readString(raw.subOrDub));
    if (Array.isArray(raw.genres)) {
        const genres = raw.genres.map(readString).filter((genre): genre is string => Boolean(genre));
        push("Genres", genres.join(", ") || undefined);
    }

    // The aggregator has no season split: the whole series is one season keyed by its id.
    const season: SeasonRef = { seasonNumber: 1, label: "Season 1", postId: id };

    return {
        id,
        title,
        overview: readString(raw.description),
        attributes,
        seasons: [season],
    };
}

export class GogoanimeProvider implements ProviderAdapter {
    readonly key = "gogo";
    readonly name = "Gogoanime";

    private readonly client: ProviderClient;
    private readonly baseUrls: string[];

    constructor(options: GogoanimeOptions) {
        this.client = new ProviderClient(this.name, options);
        this.baseUrls = options.baseUrls.map((base) => base.replace(/\/+$/, ""));
    }

    async search(query: string): Promise<SearchResult[]> {
        return this.client.guard<SearchResult[]>("search", [], async () => {
            const path = `/anime/gogoanime/${encodeURIComponent(query)}`;
            const matched = await this.client.firstMatch("search", this.variants(path), (payload) =>
                matchList(payload, parseSearchItem)
            );
            return this.client.unwrap("search", matched, `No results for "${query}"`);
        });
    }

    async detail(id: string): Promise<SeriesDetail | null> {
        return this.client.guard<SeriesDetail | null>("detail", null, async () => {
            const path = `/anime/gogoanime/info/${encodeURIComponent(id)}`;
            return this.client.firstMatch("detail", this.variants(path), (payload) =>
                matchRecord(payload, parseInfo)
            );
        });
    }

    async episodes(season: SeasonRef): Promise<EpisodeRef[]> {
        return this.client.guard<EpisodeRef[]>("episodes", [], async () => {
            const path = `/anime/gogoanime/info/${encodeURIComponent(season.postId)}`;
            const matched = await this.client.firstMatch("episodes", this.variants(path), (payload) =>
                matchList(payload, parseEpisode, EPISODE_ENVELOPES)
            );
            const episodes = this.client.unwrap("episodes", matched, `No episodes for ${season.postId}`);
            return [...episodes].sort((a, b) => a.number - b.number);
        });
    }

    async streams(episode: EpisodeRef): Promise<StreamSource[]> {
        return this.client.guard<StreamSource[]>("streams", [], async () => {
            const path = `/anime/gogoanime/watch/${encodeURIComponent(episode.id)}`;
            const matched = await this.client.firstMatch("streams", this.variants(path), (payload) =>
                matchList(payload, parseSource, SOURCE_ENVELOPES)
            );
            return this.client.unwrap("streams", matched, `No sources for ${episode.id}`);
        });
    }

    private variants(path: string): string[] {
        return this.baseUrls.map((base) => `${base}${path}`);
    }
}
