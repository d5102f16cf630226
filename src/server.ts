import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { createBotHandlers } from "./bot/handlers.js";
import { TelegramTransport } from "./bot/telegram.js";
import type { AppContext } from "./config/context.js";
import { ConfigurationError, env, loadBotConfig, splitList, type BotConfig } from "./config/env.js";
import { log } from "./config/logger.js";
import { ResolutionPipeline } from "./pipeline/resolver.js";
import { ProviderRegistry, createProviders } from "./providers/index.js";
import { execGracefulShutdown } from "./utils.js";

let config: BotConfig;
try {
    config = loadBotConfig();
} catch (error) {
    if (error instanceof ConfigurationError) {
        log.fatal({ missing: error.missing }, error.message);
        process.exit(1);
    }
    throw error;
}

const registry = new ProviderRegistry(
    createProviders({
        timeoutMs: env.REQUEST_TIMEOUT_MS,
        consumetBaseUrls: splitList(env.CONSUMET_BASE_URLS),
        zoroBaseUrl: env.ZORO_BASE_URL,
        jikanBaseUrl: env.JIKAN_BASE_URL,
        anilistUrl: env.ANILIST_URL,
        animeworldBaseUrl: env.ANIMEWORLD_BASE_URL,
    })
);

const pipeline = new ResolutionPipeline(registry, {
    searchOrder: splitList(env.SEARCH_PROVIDERS),
    playerUrl: env.PLAYER_URL,
});

const transport = new TelegramTransport(config, createBotHandlers({ pipeline }));

const ctx: AppContext = { pipeline, transport, startedAt: Date.now() };
const app = createApp(ctx);

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info(`Bot server listening on http://localhost:${info.port}`);
});

transport.start().catch((error: unknown) => {
    log.error({ webhookUrl: config.webhookUrl, error: String(error) }, "Failed to register webhook");
});

process.on("SIGINT", () => execGracefulShutdown(server));
process.on("SIGTERM", () => execGracefulShutdown(server));
