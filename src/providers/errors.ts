export type ProviderErrorKind =
    | "NetworkFailure"
    | "ShapeMismatch"
    | "NotFound"
    | "UpstreamUnavailable";

export abstract class ProviderError extends Error {
    abstract readonly kind: ProviderErrorKind;

    constructor(
        public readonly provider: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Timeout, connection error or non-2xx status. */
export class NetworkFailure extends ProviderError {
    readonly kind = "NetworkFailure";

    constructor(
        provider: string,
        message: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(provider, message, options);
    }
}

/** The body parsed, but none of the expected fields or envelopes are there. */
export class ShapeMismatch extends ProviderError {
    readonly kind = "ShapeMismatch";
}

export class NotFound extends ProviderError {
    readonly kind = "NotFound";
}

/** Every configured endpoint variant was tried and none produced data. */
export class UpstreamUnavailable extends ProviderError {
    readonly kind = "UpstreamUnavailable";
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
