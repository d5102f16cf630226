import type { SeasonRef, SeriesDetail } from "../providers/types.js";
import {
    NavigationError,
    encodeNavigation,
    payloadFits,
    type NavigationState,
} from "../pipeline/navigation.js";
import type { PipelineOutcome } from "../pipeline/outcomes.js";

// Everything here is pure: outcome in, Telegram-HTML text and button rows out.

export type Button =
    | { kind: "callback"; text: string; payload: string }
    | { kind: "url"; text: string; url: string };

export type ButtonRow = Button[];

export interface FormattedMessage {
    text: string;
    buttons: ButtonRow[];
}

export const PREVIEW_LENGTH = 300;
// Telegram caps messages at 4096 characters; leave room for the header and attributes.
export const FULL_TEXT_LENGTH = 3000;
const BUTTON_TEXT_LENGTH = 48;
const SEASONS_PER_ROW = 2;

export const escapeHtml = (value: string): string =>
    value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export const bold = (value: string): string => `<b>${escapeHtml(value)}</b>`;
export const italic = (value: string): string => `<i>${escapeHtml(value)}</i>`;

/** Cuts at `max` characters (code points) and marks the cut with an ellipsis. */
export function truncate(value: string, max: number): string {
    const characters = Array.from(value.trim());
    if (characters.length <= max) return characters.join("");
    return `${characters.slice(0, max - 1).join("").trimEnd()}…`;
}

export const GREETING: FormattedMessage = {
    text: "🎬 Send /anime &lt;name&gt; to watch an anime!",
    buttons: [],
};

export const HELP: FormattedMessage = {
    text: [
        "<b>Commands</b>",
        "/anime &lt;name&gt; - search for a series and pick an episode",
        "/help - show this message",
        "",
        "Use the buttons under each result to open a series, pick a season and an episode, or jump straight to the first episode with <i>Quick play</i>.",
    ].join("\n"),
    buttons: [],
};

export const USAGE: FormattedMessage = {
    text: "❗ Usage: /anime &lt;name&gt;",
    buttons: [],
};

export const EXPIRED: FormattedMessage = {
    text: "❌ This button has expired.\nSearch again with /anime &lt;name&gt;.",
    buttons: [],
};

export const UNEXPECTED_ERROR: FormattedMessage = {
    text: "❌ Something went wrong while fetching that.\nPlease try again in a moment.",
    buttons: [],
};

const clip = (text: string): string => truncate(text, BUTTON_TEXT_LENGTH);

// Long post ids are dropped before the button is; the season number then finds the season.
function fittingPayload(state: NavigationState): string | null {
    const payload = encodeNavigation(state);
    if (payloadFits(payload)) return payload;
    if ((state.action === "season" || state.action === "episode") && state.postId !== undefined) {
        const compact = encodeNavigation({ ...state, postId: undefined });
        return payloadFits(compact) ? compact : null;
    }
    return null;
}

function callback(text: string, state: NavigationState): Button | null {
    let payload: string | null;
    try {
        payload = fittingPayload(state);
    } catch (error) {
        if (error instanceof NavigationError) return null;
        throw error;
    }
    return payload === null ? null : { kind: "callback", text: clip(text), payload };
}

function rows(...candidates: Array<Array<Button | null>>): ButtonRow[] {
    return candidates
        .map((row) => row.filter((button): button is Button => button !== null))
        .filter((row) => row.length > 0);
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const result: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        result.push(items.slice(i, i + size));
    }
    return result;
}

function describeSeries(detail: SeriesDetail, overviewLength: number, italicOverview: boolean): string {
    const lines = [`🎬 ${bold(detail.title)}`];

    if (detail.overview) {
        const overview = truncate(detail.overview, overviewLength);
        lines.push("", italicOverview ? italic(overview) : escapeHtml(overview));
    }

    if (detail.attributes.length > 0) {
        lines.push("");
        for (const attribute of detail.attributes) {
            lines.push(`• ${bold(`${attribute.label}:`)} ${escapeHtml(attribute.value)}`);
        }
    }

    return lines.join("\n");
}

const seasonHeading = (title: string, season: SeasonRef): string =>
    `${bold(title)} - ${escapeHtml(season.label)}`;

const episodesButton = (provider: string, seriesId: string, season: SeasonRef): Button | null =>
    callback("⬅️ Episodes", {
        action: "season",
        provider,
        seriesId,
        seasonNumber: season.seasonNumber,
        postId: season.postId,
        page: 1,
    });

export function formatOutcome(outcome: PipelineOutcome): FormattedMessage {
    switch (outcome.stage) {
        case "found": {
            const { query, provider, results } = outcome;
            const list = results.map((result, index) => `${index + 1}. ${escapeHtml(result.title)}`);
            return {
                text: [`🔎 <b>Results for</b> ${italic(query)}`, "", ...list, "", "Pick a title below."].join("\n"),
                buttons: rows(
                    ...results.map((result, index) => [
                        callback(`${index + 1}. ${result.title}`, { action: "select", provider, seriesId: result.id }),
                    ])
                ),
            };
        }

        case "not_found":
            return {
                text: `❌ No anime found for ${italic(outcome.query)}.\nCheck the spelling or try an alternate title.`,
                buttons: [],
            };

        case "has_seasons": {
            const { provider, seriesId, detail } = outcome;
            const seasonButtons = detail.seasons.map((season) =>
                callback(`📁 ${season.label}`, {
                    action: "season",
                    provider,
                    seriesId,
                    seasonNumber: season.seasonNumber,
                    postId: season.postId,
                    page: 1,
                })
            );
            return {
                text: `${describeSeries(detail, PREVIEW_LENGTH, true)}\n\nChoose a season:`,
                buttons: rows(
                    ...chunk(seasonButtons, SEASONS_PER_ROW),
                    [
                        callback("ℹ️ Full info", { action: "info", provider, seriesId }),
                        callback("▶️ Quick play", { action: "watch", provider, seriesId }),
                    ]
                ),
            };
        }

        case "no_seasons":
            return {
                text: `${describeSeries(outcome.detail, PREVIEW_LENGTH, true)}\n\n❌ No seasons available for this title.\nTry another result or search with an alternate title.`,
                buttons: rows([
                    callback("ℹ️ Full info", {
                        action: "info",
                        provider: outcome.provider,
                        seriesId: outcome.seriesId,
                    }),
                ]),
            };

        case "series_info":
            return {
                text: describeSeries(outcome.detail, FULL_TEXT_LENGTH, false),
                buttons: rows([
                    callback("⬅️ Back", { action: "series", provider: outcome.provider, seriesId: outcome.seriesId }),
                ]),
            };

        case "detail_unavailable":
            return {
                text: "❌ Could not load this title right now.\nTry again later or search again with /anime &lt;name&gt;.",
                buttons: [],
            };

        case "episode_listing": {
            const { provider, seriesId, season, page } = outcome;
            const seasonState = {
                action: "season",
                provider,
                seriesId,
                seasonNumber: season.seasonNumber,
                postId: season.postId,
            } as const;

            return {
                text: [
                    `📺 ${seasonHeading(outcome.title, season)}`,
                    `Page ${page.page}/${page.totalPages} · ${page.totalItems} episode${page.totalItems === 1 ? "" : "s"}`,
                ].join("\n"),
                buttons: rows(
                    ...page.items.map((episode) => [
                        callback(`Ep ${episode.number}: ${episode.name}`, {
                            action: "episode",
                            provider,
                            seriesId,
                            seasonNumber: season.seasonNumber,
                            postId: season.postId,
                            episodeNumber: episode.number,
                        }),
                    ]),
                    [
                        page.hasPrevious ? callback("⬅️ Previous", { ...seasonState, page: page.page - 1 }) : null,
                        page.hasNext ? callback("Next ➡️", { ...seasonState, page: page.page + 1 }) : null,
                    ],
                    [callback("⬅️ Seasons", { action: "series", provider, seriesId })]
                ),
            };
        }

        case "no_episodes":
            return {
                text: `❌ No episodes found for ${seasonHeading(outcome.title, outcome.season)}.\nTry another season.`,
                buttons: rows([
                    callback("⬅️ Seasons", { action: "series", provider: outcome.provider, seriesId: outcome.seriesId }),
                ]),
            };

        case "stream_resolved": {
            const { episode } = outcome;
            const lines = [`▶️ ${bold(outcome.title)} - Episode ${episode.number}`];
            if (episode.name !== `Episode ${episode.number}`) lines.push(italic(episode.name));
            if (outcome.source.label) lines.push(`🎞 ${escapeHtml(outcome.source.label)}`);
            lines.push(`🔗 ${escapeHtml(outcome.watchUrl)}`);

            return {
                text: lines.join("\n"),
                buttons: rows(
                    [{ kind: "url", text: "▶️ Watch", url: outcome.watchUrl }],
                    [episodesButton(outcome.provider, outcome.seriesId, outcome.season)]
                ),
            };
        }

        case "stream_unavailable":
            return {
                text: `❌ No stream source found for ${bold(outcome.title)} - Episode ${outcome.episode.number}.\nTry another episode or check back later.`,
                buttons: rows([episodesButton(outcome.provider, outcome.seriesId, outcome.season)]),
            };

        case "unknown_provider":
            return EXPIRED;
    }
}
