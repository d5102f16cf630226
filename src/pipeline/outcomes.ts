import type {
    EpisodeRef,
    SearchResult,
    SeasonRef,
    SeriesDetail,
    StreamSource,
} from "../providers/types.js";
import type { Page } from "./pagination.js";

interface SeriesScope {
    provider: string;
    seriesId: string;
}

interface SeasonScope extends SeriesScope {
    season: SeasonRef;
}

export type PipelineOutcome =
    | { stage: "found"; query: string; provider: string; results: SearchResult[] }
    | { stage: "not_found"; query: string }
    | ({ stage: "has_seasons"; detail: SeriesDetail } & SeriesScope)
    | ({ stage: "no_seasons"; detail: SeriesDetail } & SeriesScope)
    | ({ stage: "series_info"; detail: SeriesDetail } & SeriesScope)
    | ({ stage: "detail_unavailable" } & SeriesScope)
    | ({ stage: "episode_listing"; title: string; page: Page<EpisodeRef> } & SeasonScope)
    | ({ stage: "no_episodes"; title: string } & SeasonScope)
    | ({
        stage: "stream_resolved";
        title: string;
        episode: EpisodeRef;
        source: StreamSource;
        watchUrl: string;
    } & SeasonScope)
    | ({ stage: "stream_unavailable"; title: string; episode: EpisodeRef } & SeasonScope)
    | { stage: "unknown_provider"; provider: string };
