import { describe, expect, it } from "vitest";
import {
    NavigationError,
    decodeNavigation,
    encodeNavigation,
    payloadFits,
    type NavigationState,
} from "./navigation.js";

describe("encodeNavigation", () => {
    it("writes the colon-delimited grammar", () => {
        expect(encodeNavigation({ action: "select", provider: "aw", seriesId: "naruto" })).toBe("select:aw:naruto");
        expect(
            encodeNavigation({
                action: "season",
                provider: "aw",
                seriesId: "naruto",
                seasonNumber: 2,
                postId: "1234",
                page: 1,
            })
        ).toBe("season:aw:naruto:2:1234");
        expect(
            encodeNavigation({
                action: "season",
                provider: "aw",
                seriesId: "naruto",
                seasonNumber: 2,
                postId: "1234",
                page: 3,
            })
        ).toBe("season:aw:naruto:2:1234:3");
        expect(
            encodeNavigation({
                action: "episode",
                provider: "gogo",
                seriesId: "naruto",
                seasonNumber: 1,
                postId: "1234",
                episodeNumber: 7,
            })
        ).toBe("episode:gogo:naruto:1:1234:7");
    });

    it("leaves the post id empty when it repeats the series id", () => {
        expect(
            encodeNavigation({
                action: "episode",
                provider: "gogo",
                seriesId: "shingeki-no-kyojin",
                seasonNumber: 1,
                postId: "shingeki-no-kyojin",
                episodeNumber: 1,
            })
        ).toBe("episode:gogo:shingeki-no-kyojin:1::1");
        expect(
            encodeNavigation({ action: "season", provider: "zoro", seriesId: "attack-on-titan-112", seasonNumber: 2, page: 2 })
        ).toBe("season:zoro:attack-on-titan-112:2::2");
    });

    it("rejects tokens containing the separator", () => {
        expect(() => encodeNavigation({ action: "info", provider: "aw", seriesId: "re:zero" })).toThrow(
            NavigationError
        );
    });

    it("rejects empty tokens", () => {
        expect(() => encodeNavigation({ action: "info", provider: "", seriesId: "naruto" })).toThrow(
            "Empty provider in navigation payload"
        );
    });
});

describe("decodeNavigation", () => {
    const states: NavigationState[] = [
        { action: "series", provider: "zoro", seriesId: "one-piece-100" },
        { action: "watch", provider: "jikan", seriesId: "20" },
        { action: "season", provider: "aw", seriesId: "naruto", seasonNumber: 1, postId: "77", page: 4 },
        {
            action: "episode",
            provider: "aw",
            seriesId: "naruto",
            seasonNumber: 1,
            postId: "77",
            episodeNumber: 3,
        },
        { action: "episode", provider: "zoro", seriesId: "attack-on-titan-112", seasonNumber: 2, episodeNumber: 12.5 },
    ];

    it.each(states)("reads back what was written for $action", (state) => {
        expect(decodeNavigation(encodeNavigation(state))).toEqual(state);
    });

    it("defaults the season page to 1", () => {
        expect(decodeNavigation("season:aw:naruto:1:77")).toEqual({
            action: "season",
            provider: "aw",
            seriesId: "naruto",
            seasonNumber: 1,
            postId: "77",
            page: 1,
        });
    });

    it("reads an empty post id as absent", () => {
        expect(decodeNavigation("episode:gogo:shingeki-no-kyojin:1::25")).toEqual({
            action: "episode",
            provider: "gogo",
            seriesId: "shingeki-no-kyojin",
            seasonNumber: 1,
            postId: undefined,
            episodeNumber: 25,
        });
    });

    it.each([
        "",
        "play:aw:naruto",
        "select:aw",
        "select::naruto",
        "select:aw:naruto:extra",
        "season:aw:naruto:one:77",
        "season:aw:naruto:1",
        "season:aw:naruto:1:77:two",
        "season:aw:naruto:1:77:2:9",
        "episode:aw:naruto:1:77",
        "episode:aw:naruto:1:77:3:more",
        "episode:aw:naruto:1:77:naruto-1x3",
    ])("rejects %j", (payload) => {
        expect(decodeNavigation(payload)).toBeNull();
    });
});

describe("payloadFits", () => {
    it("measures bytes, not characters", () => {
        expect(payloadFits("a".repeat(64))).toBe(true);
        expect(payloadFits("a".repeat(65))).toBe(false);
        expect(payloadFits("é".repeat(33))).toBe(false);
    });
});
