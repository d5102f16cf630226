import type { ResolutionPipeline } from "../pipeline/resolver.js";
import type { BotTransport } from "../bot/transport.js";

/**
 * Everything a handler needs, built once in `server.ts` and passed down explicitly.
 */
export interface AppContext {
    pipeline: ResolutionPipeline;
    transport: BotTransport;
    startedAt: number;
}

export interface ServerContext {
    Variables: {
        APP: AppContext;
    };
}
