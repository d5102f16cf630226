import "dotenv/config";
import { cleanEnv, str, port, num, url } from "envalid";

export const env = cleanEnv(process.env, {
    // Server
    PORT: port({ default: 10000, desc: "HTTP port for webhook and health checks" }),
    NODE_ENV: str({
        choices: ["development", "production", "test"],
        default: "development",
    }),
    LOG_LEVEL: str({ default: "", desc: "Overrides the level derived from NODE_ENV" }),

    // Rate Limiting (health endpoints)
    RATE_LIMIT_WINDOW_MS: num({
        default: 60000,
        desc: "Rate limit window in milliseconds",
    }),
    RATE_LIMIT_MAX_REQUESTS: num({
        default: 60,
        desc: "Max requests per window",
    }),

    // Providers
    REQUEST_TIMEOUT_MS: num({ default: 15000, desc: "Timeout for every upstream call" }),
    SEARCH_PROVIDERS: str({
        default: "aw,gogo,zoro,jikan,anilist",
        desc: "Comma-separated provider keys, tried in order by /anime",
    }),
    CONSUMET_BASE_URLS: str({
        default: "https://api.consumet.org,https://consumet-api-0kir.onrender.com",
        desc: "Comma-separated gogoanime aggregator mirrors, tried in order",
    }),
    ZORO_BASE_URL: url({ default: "https://aniwatch-api.vercel.app/api/v2/hianime" }),
    JIKAN_BASE_URL: url({ default: "https://api.jikan.moe/v4" }),
    ANILIST_URL: url({ default: "https://graphql.anilist.co" }),
    ANIMEWORLD_BASE_URL: url({ default: "https://watchanimeworld.in" }),
    PLAYER_URL: str({ default: "", desc: "Web player prefix; the stream URL is appended encoded" }),
});

// Convenience flags
export const isDev = env.NODE_ENV === "development";
export const isTest = env.NODE_ENV === "test";

export interface BotConfig {
    botToken: string;
    webhookUrl: string;
}

export class ConfigurationError extends Error {
    constructor(public readonly missing: string[]) {
        super(`Missing or invalid configuration: ${missing.join(", ")}`);
        this.name = "ConfigurationError";
    }
}

/**
 * Loads the settings the bot cannot start without. Unlike `env`, nothing here has a
 * default, so it is read once at startup instead of at import time.
 */
export function loadBotConfig(source: Record<string, string | undefined> = process.env): BotConfig {
    const cleaned = cleanEnv(
        source,
        {
            BOT_TOKEN: str({ desc: "Telegram bot access token" }),
            WEBHOOK_URL: url({ desc: "Public URL Telegram delivers updates to" }),
        },
        {
            reporter: ({ errors }) => {
                const missing = Object.keys(errors);
                if (missing.length > 0) {
                    throw new ConfigurationError(missing.sort());
                }
            },
        }
    );

    return {
        botToken: cleaned.BOT_TOKEN,
        webhookUrl: cleaned.WEBHOOK_URL,
    };
}

export const splitList = (value: string): string[] =>
    value.split(",").map((item) => item.trim()).filter(Boolean);
