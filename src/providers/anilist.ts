import * as cheerio from "cheerio";
import { NotFound, ShapeMismatch } from "./errors.js";
import { ProviderClient } from "./http.js";
import {
    arrayAt,
    isRecord,
    matchList,
    readPath,
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

export interface AniListOptions extends AdapterOptions {
    endpoint: string;
    perPage?: number;
}

const SEARCH_QUERY = `
query ($search: String, $perPage: Int) {
  Page(perPage: $perPage) {
    media(search: $search, type: ANIME) {
      id
      title { romaji english }
      siteUrl
    }
  }
}`;

const DETAIL_QUERY = `
query ($id: Int) {
  Media(id: $id, type: ANIME) {
    id
    title { romaji english }
    description
    status
    format
    episodes
    duration
    averageScore
    seasonYear
    genres
  }
}`;

const SEARCH_ENVELOPES = [arrayAt("data", "Page", "media")];

function parseSearchItem(raw: unknown): SearchResult | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.id);
    const title = readTitle(raw.title);
    if (!id || !title) return null;

    const sourceUrl = readString(raw.siteUrl);
    return sourceUrl ? { id, title, sourceUrl } : { id, title };
}

/** AniList descriptions are HTML fragments with `<br>` line breaks. */
export function stripDescription(description: string): string {
    const $ = cheerio.load(description.replace(/<br\s*\/?>/gi, "\n"));
    return $.root().text().replace(/\n{3,}/g, "\n\n").trim();
}

function parseDetail(raw: unknown): SeriesDetail | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.id);
    const title = readTitle(raw.title);
    if (!id || !title) return null;

    const attributes: SeriesAttribute[] = [];
    const push = (label: string, value: string | undefined) => {
        if (value) attributes.push({ label, value });
    };
    push("Format", readString(raw.format));
    push("Status", readString(raw.status));
    push("Episodes", readString(raw.episodes));
    const duration = readString(raw.duration);
    push("Duration", duration ? `${duration} min` : undefined);
    const score = readString(raw.averageScore);
    push("Score", score ? `${score}%` : undefined);
    push("Year", readString(raw.seasonYear));
    if (Array.isArray(raw.genres)) {
        const genres = raw.genres.map(readString).filter((genre): genre is string => Boolean(genre));
        push("Genres", genres.join(", ") || undefined);
    }

    const description = readString(raw.description);

    return {
        id,
        title,
        overview: description ? stripDescription(description) : undefined,
        attributes,
        // Metadata only: nothing to list or stream.
        seasons: [],
    };
}

export class AniListProvider implements ProviderAdapter {
    readonly key = "anilist";
    readonly name = "AniList";

    private readonly client: ProviderClient;
    private readonly endpoint: string;
    private readonly perPage: number;

    constructor(options: AniListOptions) {
        this.client = new ProviderClient(this.name, options);
        this.endpoint = options.endpoint;
        this.perPage = options.perPage ?? 10;
    }

    async search(query: string): Promise<SearchResult[]> {
        return this.client.guard<SearchResult[]>("search", [], async () => {
            const response = await this.client.postJson(this.endpoint, {
                query: SEARCH_QUERY,
                variables: { search: query, perPage: this.perPage },
            });
            if (!response.ok) {
                this.client.report("search", response.error);
                return [];
            }

            const matched = matchList(response.data, parseSearchItem, SEARCH_ENVELOPES);
            if (matched === null) {
                this.client.report("search", new ShapeMismatch(this.name, "Page.media missing from response"));
                return [];
            }
            return this.client.unwrap("search", matched, `No results for "${query}"`);
        });
    }

    async detail(id: string): Promise<SeriesDetail | null> {
        return this.client.guard<SeriesDetail | null>("detail", null, async () => {
            const mediaId = Number(id);
            if (!Number.isInteger(mediaId)) {
                this.client.report("detail", new NotFound(this.name, `"${id}" is not an AniList id`));
                return null;
            }

            const response = await this.client.postJson(this.endpoint, {
                query: DETAIL_QUERY,
                variables: { id: mediaId },
            });
            if (!response.ok) {
                this.client.report("detail", response.error);
                return null;
            }

            const detail = parseDetail(readPath(response.data, ["data", "Media"]));
            if (detail === null) {
                this.client.report("detail", new ShapeMismatch(this.name, `Media ${id} missing from response`));
            }
            return detail;
        });
    }

    async episodes(season: SeasonRef): Promise<EpisodeRef[]> {
        this.client.report("episodes", new NotFound(this.name, `No episode listing offered for ${season.postId}`));
        return [];
    }

    async streams(episode: EpisodeRef): Promise<StreamSource[]> {
        this.client.report("streams", new NotFound(this.name, `No stream sources offered for ${episode.id}`));
        return [];
    }
}
