import { describe, expect, it } from "vitest";
import { ProviderRegistry, createProviders } from "./index.js";

const settings = {
    timeoutMs: 1000,
    consumetBaseUrls: ["https://consumet.test"],
    zoroBaseUrl: "https://zoro.test",
    jikanBaseUrl: "https://jikan.test",
    anilistUrl: "https://anilist.test",
    animeworldBaseUrl: "https://aw.test",
};

describe("createProviders", () => {
    it("builds every adapter with a payload-safe key", () => {
        const adapters = createProviders(settings);
        expect(adapters.map((adapter) => adapter.key)).toEqual(["aw", "gogo", "zoro", "jikan", "anilist"]);
    });
});

describe("ProviderRegistry", () => {
    it("returns adapters in the requested order", () => {
        const registry = new ProviderRegistry(createProviders(settings));
        expect(registry.ordered(["jikan", "missing", "aw"]).map((adapter) => adapter.name)).toEqual([
            "Jikan",
            "AnimeWorld",
        ]);
        expect(registry.get("zoro")?.name).toBe("Zoro");
        expect(registry.get("missing")).toBeUndefined();
    });

    it("refuses keys that would break callback payloads", () => {
        const broken = {
            key: "a:b",
            name: "Broken",
            search: async () => [],
            detail: async () => null,
            episodes: async () => [],
            streams: async () => [],
        };
        expect(() => new ProviderRegistry([broken])).toThrow('Provider key "a:b" cannot contain ":"');
    });
});
