import { log } from "../config/logger.js";
import {
    NetworkFailure,
    NotFound,
    ProviderError,
    ShapeMismatch,
    UpstreamUnavailable,
    describeError,
} from "./errors.js";
import { looksLikeDocumentation, type ShapeMatch } from "./shapes.js";
import type { AdapterOptions, FetchLike } from "./types.js";

export const USER_AGENT =
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export type FetchResult<T> =
    | { ok: true; data: T }
    | { ok: false; error: ProviderError };

type RequestOptions = Omit<RequestInit, "headers" | "signal"> & {
    headers?: Record<string, string>;
};

const isTimeout = (error: unknown): boolean =>
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError");

/**
 * One HTTP round trip per call, bounded by the configured timeout. Nothing here throws:
 * transport problems come back as a `NetworkFailure`, bodies that do not parse as a
 * `ShapeMismatch`.
 */
export class ProviderClient {
    private readonly fetchImpl: FetchLike;

    constructor(
        public readonly provider: string,
        private readonly options: AdapterOptions
    ) {
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async getJson(url: string, init: RequestOptions = {}): Promise<FetchResult<unknown>> {
        const text = await this.request(url, {
            ...init,
            headers: { Accept: "application/json", ...init.headers },
        });
        if (!text.ok) return text;

        try {
            return { ok: true, data: JSON.parse(text.data) as unknown };
        } catch (error) {
            return {
                ok: false,
                error: new ShapeMismatch(this.provider, `Unparseable JSON from ${url}`, { cause: error }),
            };
        }
    }

    async postJson(url: string, body: unknown): Promise<FetchResult<unknown>> {
        return this.getJson(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(body),
        });
    }

    async getText(url: string, init: RequestOptions = {}): Promise<FetchResult<string>> {
        return this.request(url, {
            ...init,
            headers: {
                Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
                ...init.headers,
            },
        });
    }

    async postForm(url: string, form: Record<string, string>): Promise<FetchResult<string>> {
        return this.getText(url, {
            method: "POST",
            headers: {
                "Content-Type": "application/x-www-form-urlencoded; charset=UTF-8",
                "X-Requested-With": "XMLHttpRequest",
            },
            body: new URLSearchParams(form).toString(),
        });
    }

    /**
     * Runs one adapter operation, turning any escaped exception into `fallback` and a log
     * line that names the adapter and the operation.
     */
    async guard<T>(operation: string, fallback: T, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            log.error(
                { provider: this.provider, operation, error: describeError(error) },
                `[${this.provider}] ${operation} crashed`
            );
            return fallback;
        }
    }

    /**
     * Tries each endpoint variant in order. Transport failures, documentation payloads and
     * unknown envelopes move on to the next variant; the first `match` that is not `null`
     * wins.
     */
    async firstMatch<T>(
        operation: string,
        urls: readonly string[],
        match: (payload: unknown) => T | null
    ): Promise<T | null> {
        for (const url of urls) {
            const response = await this.getJson(url);
            if (!response.ok) {
                this.report(operation, response.error);
                continue;
            }

            if (looksLikeDocumentation(response.data)) {
                this.report(
                    operation,
                    new ShapeMismatch(this.provider, `Documentation payload instead of data at ${url}`)
                );
                continue;
            }

            const matched = match(response.data);
            if (matched !== null) return matched;

            this.report(operation, new ShapeMismatch(this.provider, `No known envelope matched ${url}`));
        }

        this.report(
            operation,
            new UpstreamUnavailable(this.provider, `All ${urls.length} endpoint variant(s) exhausted`)
        );
        return null;
    }

    /** Items of a matched envelope; a well-formed empty answer is logged as `NotFound`. */
    unwrap<T>(operation: string, matched: ShapeMatch<T> | null, emptyMessage: string): T[] {
        if (matched === null) return [];
        if (matched.items.length === 0) {
            this.report(operation, new NotFound(this.provider, emptyMessage));
        }
        return matched.items;
    }

    report(operation: string, error: ProviderError): void {
        const bindings = { provider: this.provider, operation, kind: error.kind };
        const message = `[${this.provider}] ${operation}: ${error.message}`;

        if (error.kind === "NotFound") {
            log.debug(bindings, message);
        } else {
            log.warn(bindings, message);
        }
    }

    private async request(url: string, init: RequestOptions): Promise<FetchResult<string>> {
        log.debug(`[${this.provider}] Fetching: ${url}`);

        try {
            const response = await this.fetchImpl(url, {
                ...init,
                headers: { "User-Agent": USER_AGENT, ...init.headers },
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });

            if (!response.ok) {
                return {
                    ok: false,
                    error: new NetworkFailure(
                        this.provider,
                        `Upstream returned ${response.status} for ${url}`,
                        response.status
                    ),
                };
            }

            return { ok: true, data: await response.text() };
        } catch (error) {
            const message = isTimeout(error)
                ? `Request timeout after ${this.options.timeoutMs}ms: ${url}`
                : `Fetch failed for ${url}: ${describeError(error)}`;
            return { ok: false, error: new NetworkFailure(this.provider, message, undefined, { cause: error }) };
        }
    }
}
