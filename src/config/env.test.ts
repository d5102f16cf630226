import { describe, expect, it } from "vitest";
import { ConfigurationError, loadBotConfig, splitList } from "./env.js";

describe("loadBotConfig", () => {
    it("names every missing setting", () => {
        let caught: unknown;
        try {
            loadBotConfig({});
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught instanceof ConfigurationError && caught.missing).toEqual(["BOT_TOKEN", "WEBHOOK_URL"]);
        expect(caught instanceof Error && caught.message).toBe(
            "Missing or invalid configuration: BOT_TOKEN, WEBHOOK_URL"
        );
    });

    it("rejects a webhook URL that does not parse", () => {
        expect(() => loadBotConfig({ BOT_TOKEN: "test-secret", WEBHOOK_URL: "not a url" })).toThrow(
            "Missing or invalid configuration: WEBHOOK_URL"
        );
    });

    it("returns the bot settings", () => {
        expect(
            loadBotConfig({ BOT_TOKEN: "test-secret", WEBHOOK_URL: "https://bot.example/webhook" })
        ).toEqual({ botToken: "test-secret", webhookUrl: "https://bot.example/webhook" });
    });
});

describe("splitList", () => {
    it("splits, trims and drops blanks", () => {
        expect(splitList(" aw, gogo ,,zoro ")).toEqual(["aw", "gogo", "zoro"]);
        expect(splitList("")).toEqual([]);
    });
});
