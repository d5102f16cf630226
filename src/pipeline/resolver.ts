import { log } from "../config/logger.js";
import type { ProviderRegistry } from "../providers/index.js";
import type {
    EpisodeRef,
    ProviderAdapter,
    SeasonRef,
    SeriesDetail,
} from "../providers/types.js";
import type { NavigationState } from "./navigation.js";
import type { PipelineOutcome } from "./outcomes.js";
import { EPISODE_PAGE_SIZE, paginate } from "./pagination.js";
import { pickDefault } from "./policy.js";

export interface PipelineOptions {
    /** Provider keys tried in order by `search`. */
    searchOrder: string[];
    /** How many candidates a search surfaces. */
    searchLimit?: number;
    pageSize?: number;
    /** Web player prefix; the stream URL is appended URI-encoded. Empty means link directly. */
    playerUrl?: string;
}

export const DEFAULT_SEARCH_LIMIT = 8;

type SeriesLookup =
    | { ok: true; adapter: ProviderAdapter; detail: SeriesDetail }
    | { ok: false; outcome: PipelineOutcome };

type EpisodesLookup =
    | { ok: true; adapter: ProviderAdapter; detail: SeriesDetail; season: SeasonRef; episodes: EpisodeRef[] }
    | { ok: false; outcome: PipelineOutcome };

/**
 * Walks search → detail → season → episodes → stream one adapter call at a time. The
 * first empty answer ends the walk with that stage's failure outcome.
 */
export class ResolutionPipeline {
    private readonly searchLimit: number;
    private readonly pageSize: number;
    private readonly playerUrl: string;

    constructor(
        private readonly registry: ProviderRegistry,
        private readonly options: PipelineOptions
    ) {
        this.searchLimit = options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
        this.pageSize = options.pageSize ?? EPISODE_PAGE_SIZE;
        this.playerUrl = options.playerUrl ?? "";
    }

    async search(query: string): Promise<PipelineOutcome> {
        for (const adapter of this.registry.ordered(this.options.searchOrder)) {
            const results = await adapter.search(query);
            if (results.length > 0) {
                log.debug(`[Pipeline] "${query}" found ${results.length} result(s) on ${adapter.name}`);
                return {
                    stage: "found",
                    query,
                    provider: adapter.key,
                    results: results.slice(0, this.searchLimit),
                };
            }
        }

        log.info(`[Pipeline] "${query}" not found on any provider`);
        return { stage: "not_found", query };
    }

    async openSeries(provider: string, seriesId: string): Promise<PipelineOutcome> {
        const lookup = await this.lookupSeries(provider, seriesId);
        if (!lookup.ok) return lookup.outcome;

        const { detail } = lookup;
        return detail.seasons.length > 0
            ? { stage: "has_seasons", provider, seriesId, detail }
            : { stage: "no_seasons", provider, seriesId, detail };
    }

    async seriesInfo(provider: string, seriesId: string): Promise<PipelineOutcome> {
        const lookup = await this.lookupSeries(provider, seriesId);
        if (!lookup.ok) return lookup.outcome;

        return { stage: "series_info", provider, seriesId, detail: lookup.detail };
    }

    async listEpisodes(
        provider: string,
        seriesId: string,
        seasonNumber: number,
        postId: string | undefined,
        page: number
    ): Promise<PipelineOutcome> {
        const lookup = await this.lookupEpisodes(provider, seriesId, seasonNumber, postId);
        if (!lookup.ok) return lookup.outcome;

        return {
            stage: "episode_listing",
            provider,
            seriesId,
            season: lookup.season,
            title: lookup.detail.title,
            page: paginate(lookup.episodes, page, this.pageSize),
        };
    }

    async resolveStream(
        provider: string,
        seriesId: string,
        seasonNumber: number,
        postId: string | undefined,
        episodeNumber: number
    ): Promise<PipelineOutcome> {
        const lookup = await this.lookupEpisodes(provider, seriesId, seasonNumber, postId);
        if (!lookup.ok) return lookup.outcome;

        const episode = lookup.episodes.find((candidate) => candidate.number === episodeNumber);
        if (!episode) {
            log.info(`[Pipeline] Episode ${episodeNumber} is no longer listed for ${provider}:${seriesId}`);
            return {
                stage: "no_episodes",
                provider,
                seriesId,
                season: lookup.season,
                title: lookup.detail.title,
            };
        }

        return this.resolveEpisode(lookup.adapter, seriesId, lookup.detail, lookup.season, episode);
    }

    /** Auto-chains to the first stream of the first episode of the first season. */
    async quickPlay(provider: string, seriesId: string): Promise<PipelineOutcome> {
        const lookup = await this.lookupSeries(provider, seriesId);
        if (!lookup.ok) return lookup.outcome;

        const { adapter, detail } = lookup;
        const season = pickDefault(detail.seasons);
        if (!season) return { stage: "no_seasons", provider, seriesId, detail };

        const episode = pickDefault(await adapter.episodes(season));
        if (!episode) return { stage: "no_episodes", provider, seriesId, season, title: detail.title };

        return this.resolveEpisode(adapter, seriesId, detail, season, episode);
    }

    async navigate(state: NavigationState): Promise<PipelineOutcome> {
        switch (state.action) {
            case "select":
            case "series":
                return this.openSeries(state.provider, state.seriesId);
            case "info":
                return this.seriesInfo(state.provider, state.seriesId);
            case "watch":
                return this.quickPlay(state.provider, state.seriesId);
            case "season":
                return this.listEpisodes(
                    state.provider,
                    state.seriesId,
                    state.seasonNumber,
                    state.postId,
                    state.page
                );
            case "episode":
                return this.resolveStream(
                    state.provider,
                    state.seriesId,
                    state.seasonNumber,
                    state.postId,
                    state.episodeNumber
                );
        }
    }

    watchUrlFor(streamUrl: string): string {
        return this.playerUrl ? `${this.playerUrl}${encodeURIComponent(streamUrl)}` : streamUrl;
    }

    private async resolveEpisode(
        adapter: ProviderAdapter,
        seriesId: string,
        detail: SeriesDetail,
        season: SeasonRef,
        episode: EpisodeRef
    ): Promise<PipelineOutcome> {
        const scope = { provider: adapter.key, seriesId, season, title: detail.title, episode };

        const source = pickDefault(await adapter.streams(episode));
        if (!source) {
            log.info(`[Pipeline] No stream for ${adapter.key}:${seriesId} episode ${episode.number}`);
            return { stage: "stream_unavailable", ...scope };
        }

        return { stage: "stream_resolved", ...scope, source, watchUrl: this.watchUrlFor(source.url) };
    }

    private async lookupSeries(provider: string, seriesId: string): Promise<SeriesLookup> {
        const adapter = this.registry.get(provider);
        if (!adapter) {
            return { ok: false, outcome: { stage: "unknown_provider", provider } };
        }

        const detail = await adapter.detail(seriesId);
        if (!detail) {
            return { ok: false, outcome: { stage: "detail_unavailable", provider, seriesId } };
        }

        return { ok: true, adapter, detail };
    }

    private async lookupEpisodes(
        provider: string,
        seriesId: string,
        seasonNumber: number,
        postId: string | undefined
    ): Promise<EpisodesLookup> {
        const lookup = await this.lookupSeries(provider, seriesId);
        if (!lookup.ok) return lookup;

        const { adapter, detail } = lookup;
        // Prefer the label the source gives; the payload alone is enough to list episodes.
        // Without a post id the season number picks the first matching season.
        const season = detail.seasons.find(
            (candidate) =>
                candidate.seasonNumber === seasonNumber && (postId === undefined || candidate.postId === postId)
        ) ?? { seasonNumber, label: `Season ${seasonNumber}`, postId: postId ?? seriesId };

        const episodes = await adapter.episodes(season);
        if (episodes.length === 0) {
            return {
                ok: false,
                outcome: { stage: "no_episodes", provider, seriesId, season, title: detail.title },
            };
        }

        return { ok: true, adapter, detail, season, episodes };
    }
}
