import { Hono } from "hono";
import type { ServerContext } from "../../config/context.js";
import { ratelimit } from "../../config/ratelimit.js";

export const SERVICE_NAME = "anime-relay-bot";

const healthRouter = new Hono<ServerContext>();

// Per route: the webhook shares "/" and must never be throttled.
for (const path of ["/", "/health"]) {
    healthRouter.get(path, ratelimit, (c) => {
        const { startedAt } = c.get("APP");
        return c.json({
            status: "ok",
            service: SERVICE_NAME,
            uptime: Math.floor((Date.now() - startedAt) / 1000),
        });
    });
}

export { healthRouter };
