import { rateLimiter } from "hono-rate-limiter";
import { getConnInfo } from "@hono/node-server/conninfo";
import { env } from "./env.js";

// Health endpoints only.
export const ratelimit = rateLimiter({
    standardHeaders: "draft-7",
    limit: env.RATE_LIMIT_MAX_REQUESTS,
    windowMs: env.RATE_LIMIT_WINDOW_MS,

    keyGenerator(c) {
        try {
            const { remote } = getConnInfo(c);
            return `${String(remote.addressType)}_${String(remote.address)}`;
        } catch {
            return (
                c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
                c.req.header("x-real-ip") ||
                "unknown"
            );
        }
    },

    handler(c) {
        return c.json(
            {
                status: 429,
                message: "Too Many Requests",
                retryAfter: Math.ceil(env.RATE_LIMIT_WINDOW_MS / 1000),
            },
            { status: 429 }
        );
    },
});
