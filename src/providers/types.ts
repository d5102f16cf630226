export interface SearchResult {
    id: string;
    title: string;
    sourceUrl?: string;
}

export interface SeriesAttribute {
    label: string;
    value: string;
}

export interface SeasonRef {
    seasonNumber: number;
    label: string;
    // Key into the episode listing: a WordPress post id, a season's anime id, or the series id itself.
    postId: string;
}

export interface SeriesDetail {
    id: string;
    title: string;
    overview?: string;
    attributes: SeriesAttribute[];
    seasons: SeasonRef[];
}

export interface EpisodeRef {
    number: number;
    name: string;
    id: string;
    url?: string;
}

export interface StreamSource {
    url: string;
    label?: string;
}

/**
 * Uniform lookup contract over one external source. Implementations never throw:
 * failures come back as an empty list or `null` and are logged at the adapter.
 */
export interface ProviderAdapter {
    /** Short token used in callback payloads; must not contain ":". */
    readonly key: string;
    readonly name: string;

    search(query: string): Promise<SearchResult[]>;
    detail(id: string): Promise<SeriesDetail | null>;
    episodes(season: SeasonRef): Promise<EpisodeRef[]>;
    streams(episode: EpisodeRef): Promise<StreamSource[]>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface AdapterOptions {
    timeoutMs: number;
    fetchImpl?: FetchLike;
}
