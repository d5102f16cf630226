import type { MiddlewareHandler } from "hono";
import { log } from "../config/logger.js";

export const logging: MiddlewareHandler = async (c, next) => {
    const start = Date.now();
    const { method, path } = c.req;

    log.debug({
        type: "request",
        method,
        path,
        ip: c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
            c.req.header("x-real-ip") ||
            "unknown",
    });

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    const entry = {
        type: "response",
        method,
        path,
        status,
        duration: `${duration}ms`,
    };
    if (status >= 500) log.error(entry);
    else if (status >= 400) log.warn(entry);
    else log.info(entry);
};
