// Item parsers shared by the JSON adapters. Each returns `null` when a required field is
// missing so the envelope matcher can drop the item.
import { isRecord, readNumber, readString, readTitle } from "./shapes.js";
import type { EpisodeRef, SearchResult, StreamSource } from "./types.js";

export function parseSearchItem(raw: unknown): SearchResult | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.id);
    const title = readTitle(raw.title) ?? readString(raw.name);
    if (!id || !title) return null;

    const sourceUrl = readString(raw.url);
    return sourceUrl ? { id, title, sourceUrl } : { id, title };
}

export function parseEpisode(raw: unknown): EpisodeRef | null {
    if (!isRecord(raw)) return null;

    const id = readString(raw.id) ?? readString(raw.episodeId);
    const number = readNumber(raw.number) ?? readNumber(raw.episode);
    if (!id || number === undefined) return null;

    const episode: EpisodeRef = {
        number,
        name: readString(raw.title) ?? `Episode ${number}`,
        id,
    };
    const url = readString(raw.url);
    if (url) episode.url = url;
    return episode;
}

export function parseSource(raw: unknown): StreamSource | null {
    if (!isRecord(raw)) return null;

    const url = readString(raw.url) ?? readString(raw.file);
    if (!url) return null;

    const label = readString(raw.quality) ?? readString(raw.server) ?? readString(raw.name) ?? readString(raw.type);
    return label ? { url, label } : { url };
}
