import { describe, expect, it, vi } from "vitest";
import { ResolutionPipeline } from "../pipeline/resolver.js";
import { ProviderRegistry } from "../providers/index.js";
import type { ProviderAdapter } from "../providers/types.js";
import type { Button, ButtonRow } from "./formatter.js";
import { EXPIRED, GREETING, HELP, UNEXPECTED_ERROR, USAGE } from "./formatter.js";
import { createBotHandlers } from "./handlers.js";

const adapter: ProviderAdapter = {
    key: "aw",
    name: "AnimeWorld",
    search: async (query) => (query === "naruto" ? [{ id: "naruto", title: "Naruto" }] : []),
    detail: async (id) =>
        id === "naruto"
            ? {
                id: "naruto",
                title: "Naruto",
                attributes: [],
                seasons: [{ seasonNumber: 1, label: "Season 1", postId: "101" }],
            }
            : null,
    episodes: async (season) =>
        season.postId === "101" ? [{ number: 1, name: "Enter: Naruto Uzumaki!", id: "naruto-1x1" }] : [],
    streams: async (episode) =>
        episode.id === "naruto-1x1" ? [{ url: "https://example/video.mp4", label: "Multi" }] : [],
};

const titanSeasonTwo = "attack-on-titan-season-2-3136";

const titan: ProviderAdapter = {
    key: "zoro",
    name: "Zoro",
    search: async (query) =>
        query === "attack on titan" ? [{ id: "attack-on-titan-112", title: "Attack on Titan" }] : [],
    detail: async (id) =>
        id === "attack-on-titan-112"
            ? {
                id,
                title: "Attack on Titan",
                attributes: [],
                seasons: [
                    { seasonNumber: 1, label: "Season 1", postId: "attack-on-titan-112" },
                    { seasonNumber: 2, label: "Season 2", postId: titanSeasonTwo },
                ],
            }
            : null,
    episodes: async (season) =>
        season.postId === titanSeasonTwo
            ? Array.from({ length: 12 }, (_, index) => ({
                number: index + 1,
                name: `Episode ${index + 1}`,
                id: `${titanSeasonTwo}?ep=${3001 + index}`,
            }))
            : [],
    streams: async (episode) =>
        episode.id === `${titanSeasonTwo}?ep=3007` ? [{ url: "https://cdn.test/titan-2x7.m3u8" }] : [],
};

function fakeReply() {
    return {
        send: vi.fn(async (_text: string, _buttons?: ButtonRow[]) => {}),
        edit: vi.fn(async (_text: string, _buttons?: ButtonRow[]) => {}),
    };
}

function handlersFor(adapters: ProviderAdapter[]) {
    const pipeline = new ResolutionPipeline(new ProviderRegistry(adapters), {
        searchOrder: adapters.map((item) => item.key),
    });
    return createBotHandlers({ pipeline });
}

const callbackPayloads = (buttons: ButtonRow[] | undefined): string[] =>
    (buttons ?? []).flat().flatMap((button: Button) => (button.kind === "callback" ? [button.payload] : []));

describe("bot handlers", () => {
    it("greets on /start and explains on /help", async () => {
        const handlers = handlersFor([adapter]);
        const reply = fakeReply();

        await handlers.onCommand("start", "", reply);
        await handlers.onCommand("help", "", reply);

        expect(reply.send.mock.calls).toEqual([
            [GREETING.text, []],
            [HELP.text, []],
        ]);
    });

    it("asks for a title when /anime has none", async () => {
        const reply = fakeReply();
        await handlersFor([adapter]).onCommand("anime", "   ", reply);
        expect(reply.send).toHaveBeenCalledWith(USAGE.text, []);
    });

    it("reports a title that no provider knows", async () => {
        const reply = fakeReply();
        await handlersFor([adapter]).onCommand("anime", "zzzznotarealshow", reply);
        expect(reply.send).toHaveBeenCalledWith(
            "❌ No anime found for <i>zzzznotarealshow</i>.\nCheck the spelling or try an alternate title.",
            []
        );
    });

    it("walks from search to a playable link", async () => {
        const handlers = handlersFor([adapter]);
        const reply = fakeReply();

        await handlers.onCommand("anime", "  naruto ", reply);
        const results = reply.send.mock.calls[0];
        expect(callbackPayloads(results?.[1])).toEqual(["select:aw:naruto"]);

        await handlers.onButtonPress("select:aw:naruto", reply);
        expect(callbackPayloads(reply.edit.mock.calls[0]?.[1])).toEqual([
            "season:aw:naruto:1:101",
            "info:aw:naruto",
            "watch:aw:naruto",
        ]);

        await handlers.onButtonPress("season:aw:naruto:1:101", reply);
        expect(callbackPayloads(reply.edit.mock.calls[1]?.[1])).toEqual([
            "episode:aw:naruto:1:101:1",
            "series:aw:naruto",
        ]);

        await handlers.onButtonPress("episode:aw:naruto:1:101:1", reply);
        const [text, buttons] = reply.edit.mock.calls[2] ?? ["", []];
        expect(text).toBe(
            "▶️ <b>Naruto</b> - Episode 1\n<i>Enter: Naruto Uzumaki!</i>\n🎞 Multi\n🔗 https://example/video.mp4"
        );
        expect(buttons?.[0]).toEqual([{ kind: "url", text: "▶️ Watch", url: "https://example/video.mp4" }]);
    });

    it("walks long source slugs without losing buttons", async () => {
        const handlers = handlersFor([titan]);
        const reply = fakeReply();

        await handlers.onCommand("anime", "attack on titan", reply);
        expect(callbackPayloads(reply.send.mock.calls[0]?.[1])).toEqual(["select:zoro:attack-on-titan-112"]);

        await handlers.onButtonPress("select:zoro:attack-on-titan-112", reply);
        expect(callbackPayloads(reply.edit.mock.calls[0]?.[1])).toEqual([
            "season:zoro:attack-on-titan-112:1:",
            `season:zoro:attack-on-titan-112:2:${titanSeasonTwo}`,
            "info:zoro:attack-on-titan-112",
            "watch:zoro:attack-on-titan-112",
        ]);

        await handlers.onButtonPress(`season:zoro:attack-on-titan-112:2:${titanSeasonTwo}`, reply);
        expect(callbackPayloads(reply.edit.mock.calls[1]?.[1])).toEqual([
            "episode:zoro:attack-on-titan-112:2::1",
            "episode:zoro:attack-on-titan-112:2::2",
            "episode:zoro:attack-on-titan-112:2::3",
            "episode:zoro:attack-on-titan-112:2::4",
            "episode:zoro:attack-on-titan-112:2::5",
            "season:zoro:attack-on-titan-112:2::2",
            "series:zoro:attack-on-titan-112",
        ]);

        await handlers.onButtonPress("season:zoro:attack-on-titan-112:2::2", reply);
        expect(callbackPayloads(reply.edit.mock.calls[2]?.[1])).toEqual([
            "episode:zoro:attack-on-titan-112:2::6",
            "episode:zoro:attack-on-titan-112:2::7",
            "episode:zoro:attack-on-titan-112:2::8",
            "episode:zoro:attack-on-titan-112:2::9",
            "episode:zoro:attack-on-titan-112:2::10",
            `season:zoro:attack-on-titan-112:2:${titanSeasonTwo}`,
            "season:zoro:attack-on-titan-112:2::3",
            "series:zoro:attack-on-titan-112",
        ]);

        await handlers.onButtonPress("episode:zoro:attack-on-titan-112:2::7", reply);
        expect(reply.edit.mock.calls[3]?.[0]).toBe(
            "▶️ <b>Attack on Titan</b> - Episode 7\n🔗 https://cdn.test/titan-2x7.m3u8"
        );
    });

    it("answers the same search the same way twice", async () => {
        const handlers = handlersFor([adapter]);
        const reply = fakeReply();

        await handlers.onCommand("anime", "naruto", reply);
        await handlers.onCommand("anime", "naruto", reply);

        expect(reply.send).toHaveBeenCalledTimes(2);
        expect(reply.send.mock.calls[1]).toEqual(reply.send.mock.calls[0]);
    });

    it("quick play jumps straight to the first stream", async () => {
        const reply = fakeReply();
        await handlersFor([adapter]).onButtonPress("watch:aw:naruto", reply);

        const buttons = reply.edit.mock.calls[0]?.[1] ?? [];
        expect(buttons.flat().find((button) => button.kind === "url")).toEqual({
            kind: "url",
            text: "▶️ Watch",
            url: "https://example/video.mp4",
        });
    });

    it("answers stale or foreign buttons with the expired notice", async () => {
        const handlers = handlersFor([adapter]);
        const reply = fakeReply();

        await handlers.onButtonPress("garbage", reply);
        await handlers.onButtonPress("select:retired:naruto", reply);

        expect(reply.edit.mock.calls).toEqual([
            [EXPIRED.text, []],
            [EXPIRED.text, []],
        ]);
    });

    it("replies with a generic error when a lookup throws", async () => {
        const broken: ProviderAdapter = {
            ...adapter,
            search: async () => {
                throw new Error("boom");
            },
        };
        const reply = fakeReply();

        await handlersFor([broken]).onCommand("anime", "naruto", reply);
        expect(reply.send).toHaveBeenCalledWith(UNEXPECTED_ERROR.text, []);
    });
});
