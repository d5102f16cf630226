import { Hono } from "hono";
import type { AppContext, ServerContext } from "./config/context.js";
import { errorHandler, notFoundHandler } from "./config/errorHandler.js";
import { logging } from "./middleware/logging.js";
import { healthRouter } from "./routes/health/index.js";
import { webhookRouter } from "./routes/webhook/index.js";

export function createApp(ctx: AppContext) {
    const app = new Hono<ServerContext>();

    app.use(async (c, next) => {
        c.set("APP", ctx);
        await next();
    });
    app.use(logging);

    app.route("/", healthRouter);
    app.route("/", webhookRouter);

    app.onError(errorHandler);
    app.notFound(notFoundHandler);

    return app;
}
