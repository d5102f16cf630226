import { ProviderClient } from "./http.js";
import { parseEpisode, parseSearchItem, parseSource } from "./items.js";
import {
    arrayAt,
    isRecord,
    matchList,
    matchRecord,
    readPath,
    readString,
    recordAt,
    type JsonRecord,
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

export interface ZoroOptions extends AdapterOptions {
    baseUrl: string;
    server?: string;
    category?: "sub" | "dub" | "raw";
}

const SEARCH_ENVELOPES = [arrayAt("data", "animes"), arrayAt("animes")];
const SOURCE_ENVELOPES = [arrayAt("data", "sources"), arrayAt("sources")];
const DETAIL_ENVELOPES = [recordAt("data"), recordAt()];

function parseSeasons(id: string, raw: unknown): SeasonRef[] {
    const seasons: SeasonRef[] = [];
    if (Array.isArray(raw)) {
        for (const entry of raw) {
            if (!isRecord(entry)) continue;
            const postId = readString(entry.id);
            if (!postId) continue;
            seasons.push({
                seasonNumber: seasons.length + 1,
                label: readString(entry.title) ?? readString(entry.name) ?? `Season ${seasons.length + 1}`,
                postId,
            });
        }
    }

    return seasons.length > 0 ? seasons : [{ seasonNumber: 1, label: "Season 1", postId: id }];
}

// `{ anime: { info, moreInfo }, seasons }` as served by the aniwatch API.
function parseDetail(raw: unknown): SeriesDetail | null {
    const info = readPath(raw, ["anime", "info"]);
    if (!isRecord(info)) return null;

    const id = readString(info.id);
    const title = readString(info.name);
    if (!id || !title) return null;

    const stats: JsonRecord = isRecord(info.stats) ? info.stats : {};
    const moreInfoRaw = readPath(raw, ["anime", "moreInfo"]);
    const moreInfo: JsonRecord = isRecord(moreInfoRaw) ? moreInfoRaw : {};

    const attributes: SeriesAttribute[] = [];
    const push = (label: string, value: string | undefined) => {
        if (value) attributes.push({ label, value });
    };
    push("Type", readString(stats.type));
    push("Status", readString(moreInfo.status));
    push("Aired", readString(moreInfo.aired));
    push("Duration", readString(stats.duration));
    push("Rating", readString(stats.rating));
    push("Quality", readString(stats.quality));
    if (Array.isArray(moreInfo.genres)) {
        const genres = moreInfo.genres.map(readString).filter((genre): genre is string => Boolean(genre));
        push("Genres", genres.join(", ") || undefined);
    }

    return {
        id,
        title,
        overview: readString(info.description),
        attributes,
        seasons: parseSeasons(id, isRecord(raw) ? raw.seasons : undefined),
    };
}

export class ZoroProvider implements ProviderAdapter {
    readonly key = "zoro";
    readonly name = "Zoro";

    private readonly client: ProviderClient;
    private readonly baseUrl: string;
    private readonly server: string;
    private readonly category: string;

    constructor(options: ZoroOptions) {
        this.client = new ProviderClient(this.name, options);
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
        this.server = options.server ?? "hd-1";
        this.category = options.category ?? "sub";
    }

    async search(query: string): Promise<SearchResult[]> {
        return this.client.guard<SearchResult[]>("search", [], async () => {
            const url = `${this.baseUrl}/search?q=${encodeURIComponent(query)}&page=1`;
            const matched = await this.client.firstMatch("search", [url], (payload) =>
                matchList(payload, parseSearchItem, SEARCH_ENVELOPES)
            );
            return this.client.unwrap("search", matched, `No results for "${query}"`);
        });
    }

    async detail(id: string): Promise<SeriesDetail | null> {
        return this.client.guard<SeriesDetail | null>("detail", null, async () => {
            const url = `${this.baseUrl}/anime/${encodeURIComponent(id)}`;
            return this.client.firstMatch("detail", [url], (payload) =>
                matchRecord(payload, parseDetail, DETAIL_ENVELOPES)
            );
        });
    }

    async episodes(season: SeasonRef): Promise<EpisodeRef[]> {
        return this.client.guard<EpisodeRef[]>("episodes", [], async () => {
            const url = `${this.baseUrl}/anime/${encodeURIComponent(season.postId)}/episodes`;
            const matched = await this.client.firstMatch("episodes", [url], (payload) =>
                matchList(payload, parseEpisode)
            );
            const episodes = this.client.unwrap("episodes", matched, `No episodes for ${season.postId}`);
            return [...episodes].sort((a, b) => a.number - b.number);
        });
    }

    async streams(episode: EpisodeRef): Promise<StreamSource[]> {
        return this.client.guard<StreamSource[]>("streams", [], async () => {
            const params = new URLSearchParams({
                animeEpisodeId: episode.id,
                server: this.server,
                category: this.category,
            });
            const url = `${this.baseUrl}/episode/sources?${params.toString()}`;
            const matched = await this.client.firstMatch("streams", [url], (payload) =>
                matchList(payload, parseSource, SOURCE_ENVELOPES)
            );
            return this.client.unwrap("streams", matched, `No sources for ${episode.id}`);
        });
    }
}
