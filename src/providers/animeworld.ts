import * as cheerio from "cheerio";
import { NotFound, ShapeMismatch } from "./errors.js";
import { ProviderClient } from "./http.js";
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

export interface AnimeWorldOptions extends AdapterOptions {
    baseUrl: string;
}

/**
 * Pull the slug that follows `/<segment>/` out of an absolute or relative link, e.g.
 * `https://site/series/naruto-shippuden/` → `naruto-shippuden`.
 */
export function slugFrom(href: string | undefined, segment: string): string | null {
    if (!href) return null;
    const match = href.match(new RegExp(`/${segment}/([^/?#]+)/?`));
    return match ? decodeURIComponent(match[1]) : null;
}

const absolutize = (link: string, baseUrl: string): string => {
    if (link.startsWith("//")) return `https:${link}`;
    if (link.startsWith("/")) return `${baseUrl}${link}`;
    return link;
};

export function parseSearchPage(html: string): SearchResult[] {
    const $ = cheerio.load(html);
    const results: SearchResult[] = [];
    const seen = new Set<string>();

    $("article.post").each((_, element) => {
        const link = $(element).find("a.lnk-blk").attr("href") ?? $(element).find("a").first().attr("href");
        const id = slugFrom(link, "series");
        const title = $(element).find(".entry-title").first().text().trim();

        // Movies live under /movies/ and have no season picker; only series are listed.
        if (!id || !title || seen.has(id)) return;
        seen.add(id);
        results.push(link ? { id, title, sourceUrl: link } : { id, title });
    });

    return results;
}

export function parseSeriesPage(id: string, html: string): SeriesDetail | null {
    const $ = cheerio.load(html);

    const title = $("h1.entry-title").first().text().trim() ||
        $("meta[property='og:title']").attr("content")?.trim() ||
        "";
    if (!title) return null;

    const overview = $(".description p")
        .map((_, el) => $(el).text().trim())
        .get()
        .filter(Boolean)
        .join("\n\n");

    const attributes: SeriesAttribute[] = [];
    const push = (label: string, value: string) => {
        if (value) attributes.push({ label, value });
    };
    const genres = $(".genres a")
        .map((_, el) => $(el).text().trim())
        .get()
        .filter(Boolean);
    push("Genres", genres.join(", "));
    push("Year", $("span.year").first().text().trim());
    push("Duration", $("span.duration").first().text().trim());
    push("Seasons", $("span.seasons").first().text().trim());
    push("Episodes", $("span.episodes").first().text().trim());

    const seasons: SeasonRef[] = [];
    $("a[data-post][data-season]").each((_, element) => {
        const seasonNumber = parseInt($(element).attr("data-season") ?? "", 10);
        const postId = $(element).attr("data-post")?.trim();
        if (isNaN(seasonNumber) || !postId) return;
        if (seasons.some((season) => season.seasonNumber === seasonNumber)) return;

        seasons.push({
            seasonNumber,
            label: $(element).text().trim() || `Season ${seasonNumber}`,
            postId,
        });
    });
    seasons.sort((a, b) => a.seasonNumber - b.seasonNumber);

    return {
        id,
        title,
        overview: overview || undefined,
        attributes,
        seasons,
    };
}

export function parseEpisodeList(html: string): EpisodeRef[] {
    const $ = cheerio.load(html);
    const episodes: EpisodeRef[] = [];

    $("article").each((_, element) => {
        const url = $(element).find("a.lnk-blk").attr("href") ?? $(element).find("a").first().attr("href");
        const id = slugFrom(url, "episode");
        if (!id) return;

        // "1x3" in the badge, falling back to the "-1x3" suffix of the slug.
        const badge = $(element).find(".num-epi").text().trim();
        const numbering = badge.match(/(\d+)\s*x\s*(\d+)/i) ?? id.match(/-(\d+)x(\d+)$/);
        const number = numbering ? parseInt(numbering[2], 10) : NaN;
        if (isNaN(number)) return;

        const name = $(element).find(".entry-title").first().text().trim() || `Episode ${number}`;
        episodes.push(url ? { number, name, id, url } : { number, name, id });
    });

    return episodes.sort((a, b) => a.number - b.number);
}

export function parseEpisodePage(html: string, baseUrl: string): StreamSource[] {
    const $ = cheerio.load(html);

    const labels = $(".aa-tbs li a")
        .map((_, el) => $(el).find(".server").text().trim() || $(el).text().trim())
        .get();

    const sources: StreamSource[] = [];
    $("iframe").each((index, element) => {
        const link = $(element).attr("data-src") ?? $(element).attr("src");
        if (!link || link === "about:blank") return;

        const url = absolutize(link.trim(), baseUrl);
        if (sources.some((source) => source.url === url)) return;

        const label = labels[index];
        sources.push(label ? { url, label } : { url });
    });

    return sources;
}

/** Scrapes a WordPress anime-listing site with an admin-ajax season picker. */
export class AnimeWorldProvider implements ProviderAdapter {
    readonly key = "aw";
    readonly name = "AnimeWorld";

    private readonly client: ProviderClient;
    private readonly baseUrl: string;

    constructor(options: AnimeWorldOptions) {
        this.client = new ProviderClient(this.name, options);
        this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    }

    async search(query: string): Promise<SearchResult[]> {
        return this.client.guard<SearchResult[]>("search", [], async () => {
            const response = await this.client.getText(`${this.baseUrl}/?s=${encodeURIComponent(query)}`);
            if (!response.ok) {
                this.client.report("search", response.error);
                return [];
            }

            const results = parseSearchPage(response.data);
            if (results.length === 0) {
                this.client.report("search", new NotFound(this.name, `No series for "${query}"`));
            }
            return results;
        });
    }

    async detail(id: string): Promise<SeriesDetail | null> {
        return this.client.guard<SeriesDetail | null>("detail", null, async () => {
            const response = await this.client.getText(`${this.baseUrl}/series/${encodeURIComponent(id)}/`);
            if (!response.ok) {
                this.client.report("detail", response.error);
                return null;
            }

            const detail = parseSeriesPage(id, response.data);
            if (detail === null) {
                this.client.report("detail", new ShapeMismatch(this.name, `No title on series page ${id}`));
            }
            return detail;
        });
    }

    async episodes(season: SeasonRef): Promise<EpisodeRef[]> {
        return this.client.guard<EpisodeRef[]>("episodes", [], async () => {
            const response = await this.client.postForm(`${this.baseUrl}/wp-admin/admin-ajax.php`, {
                action: "action_select_season",
                season: String(season.seasonNumber),
                post: season.postId,
            });
            if (!response.ok) {
                this.client.report("episodes", response.error);
                return [];
            }

            const episodes = parseEpisodeList(response.data);
            if (episodes.length === 0) {
                this.client.report(
                    "episodes",
                    new NotFound(this.name, `No episodes for post ${season.postId} season ${season.seasonNumber}`)
                );
            }
            return episodes;
        });
    }

    async streams(episode: EpisodeRef): Promise<StreamSource[]> {
        return this.client.guard<StreamSource[]>("streams", [], async () => {
            const url = episode.url ?? `${this.baseUrl}/episode/${encodeURIComponent(episode.id)}/`;
            const response = await this.client.getText(url);
            if (!response.ok) {
                this.client.report("streams", response.error);
                return [];
            }

            const sources = parseEpisodePage(response.data, this.baseUrl);
            if (sources.length === 0) {
                this.client.report("streams", new NotFound(this.name, `No player iframes on ${url}`));
            }
            return sources;
        });
    }
}
