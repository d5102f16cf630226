import { log } from "../config/logger.js";
import { AniListProvider } from "./anilist.js";
import { AnimeWorldProvider } from "./animeworld.js";
import { GogoanimeProvider } from "./gogoanime.js";
import { JikanProvider } from "./jikan.js";
import type { FetchLike, ProviderAdapter } from "./types.js";
import { ZoroProvider } from "./zoro.js";

export interface ProviderSettings {
    timeoutMs: number;
    consumetBaseUrls: string[];
    zoroBaseUrl: string;
    jikanBaseUrl: string;
    anilistUrl: string;
    animeworldBaseUrl: string;
    fetchImpl?: FetchLike;
}

export function createProviders(settings: ProviderSettings): ProviderAdapter[] {
    const common = { timeoutMs: settings.timeoutMs, fetchImpl: settings.fetchImpl };

    return [
        new AnimeWorldProvider({ ...common, baseUrl: settings.animeworldBaseUrl }),
        new GogoanimeProvider({ ...common, baseUrls: settings.consumetBaseUrls }),
        new ZoroProvider({ ...common, baseUrl: settings.zoroBaseUrl }),
        new JikanProvider({ ...common, baseUrl: settings.jikanBaseUrl }),
        new AniListProvider({ ...common, endpoint: settings.anilistUrl }),
    ];
}

export class ProviderRegistry {
    private readonly adapters = new Map<string, ProviderAdapter>();

    constructor(adapters: ProviderAdapter[]) {
        for (const adapter of adapters) {
            if (adapter.key.includes(":")) {
                throw new Error(`Provider key "${adapter.key}" cannot contain ":"`);
            }
            this.adapters.set(adapter.key, adapter);
        }
    }

    get(key: string): ProviderAdapter | undefined {
        return this.adapters.get(key);
    }

    /** Adapters for the given keys, in that order; unknown keys are logged and skipped. */
    ordered(keys: readonly string[]): ProviderAdapter[] {
        const result: ProviderAdapter[] = [];
        for (const key of keys) {
            const adapter = this.adapters.get(key);
            if (adapter) {
                result.push(adapter);
            } else {
                log.warn(`Unknown provider "${key}" in search order, skipping`);
            }
        }
        return result;
    }
}

export type { ProviderAdapter } from "./types.js";
