import { describe, expect, it, vi } from "vitest";
import { createApp } from "./app.js";
import type { BotTransport } from "./bot/transport.js";
import type { AppContext } from "./config/context.js";
import { ResolutionPipeline } from "./pipeline/resolver.js";
import { ProviderRegistry } from "./providers/index.js";

function appWith(transport: BotTransport, startedAt = Date.now()) {
    const ctx: AppContext = {
        pipeline: new ResolutionPipeline(new ProviderRegistry([]), { searchOrder: [] }),
        transport,
        startedAt,
    };
    return createApp(ctx);
}

const fakeTransport = () => ({
    start: vi.fn(async () => {}),
    handleUpdate: vi.fn((update: unknown) => typeof update === "object" && update !== null && "update_id" in update),
});

const post = (body: string) => ({
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
});

describe("health routes", () => {
    it.each(["/", "/health"])("reports liveness on %s", async (path) => {
        const app = appWith(fakeTransport(), Date.now() - 5000);

        const res = await app.request(path);
        expect(res.status).toBe(200);

        expect(await res.json()).toEqual({
            status: "ok",
            service: "anime-relay-bot",
            uptime: expect.any(Number),
        });
    });
});

describe("webhook routes", () => {
    it.each(["/", "/webhook"])("hands updates posted to %s to the transport", async (path) => {
        const transport = fakeTransport();
        const update = { update_id: 1, message: { message_id: 1, text: "/start" } };

        const res = await appWith(transport).request(path, post(JSON.stringify(update)));

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: "received" });
        expect(transport.handleUpdate).toHaveBeenCalledWith(update);
    });

    it("rejects a body that is not an update", async () => {
        const transport = fakeTransport();
        const res = await appWith(transport).request("/webhook", post(JSON.stringify({ hello: "world" })));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({ status: 400, message: "Body is not a Telegram update" });
    });

    it("rejects a body that is not JSON", async () => {
        const transport = fakeTransport();
        const res = await appWith(transport).request("/webhook", post("{not json"));

        expect(res.status).toBe(400);
        expect(transport.handleUpdate).not.toHaveBeenCalled();
    });
});

describe("unknown routes", () => {
    it("answers with the JSON not-found envelope", async () => {
        const res = await appWith(fakeTransport()).request("/nope");

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({
            status: 404,
            message: "Not Found",
            error: "Route /nope does not exist",
        });
    });
});
