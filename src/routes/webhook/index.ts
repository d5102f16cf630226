import { Hono } from "hono";
import type { ServerContext } from "../../config/context.js";
import { log } from "../../config/logger.js";

const webhookRouter = new Hono<ServerContext>();

// Telegram posts to whatever WEBHOOK_URL names; both the bare root and /webhook are accepted.
for (const path of ["/", "/webhook"]) {
    webhookRouter.post(path, async (c) => {
        const { transport } = c.get("APP");

        let body: unknown;
        try {
            body = await c.req.json();
        } catch (error) {
            log.warn({ path: c.req.path, error: String(error) }, "Webhook body is not JSON");
            return c.json({ status: 400, message: "Invalid JSON body" }, 400);
        }

        if (!transport.handleUpdate(body)) {
            log.warn({ path: c.req.path }, "Webhook body is not a Telegram update");
            return c.json({ status: 400, message: "Body is not a Telegram update" }, 400);
        }

        return c.json({ status: "received" });
    });
}

export { webhookRouter };
