import type { ErrorHandler, NotFoundHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { log } from "./logger.js";

interface ErrorResponse {
    status: ContentfulStatusCode;
    message: string;
    error?: string;
    timestamp: string;
}

const createErrorResponse = (
    status: ContentfulStatusCode,
    message: string,
    error?: string
): ErrorResponse => ({
    status,
    message,
    error,
    timestamp: new Date().toISOString(),
});

export const errorHandler: ErrorHandler = (err, c) => {
    log.error({
        message: err.message,
        stack: err.stack,
        path: c.req.path,
        method: c.req.method,
    });

    let status: ContentfulStatusCode = 500;
    if (err instanceof HTTPException && err.status >= 400 && err.status < 600) {
        status = err.status as ContentfulStatusCode;
    }

    const message =
        status === 500 ? "Internal Server Error" : err.message || "An error occurred";

    return c.json(createErrorResponse(status, message, err.name), status);
};

export const notFoundHandler: NotFoundHandler = (c) => {
    log.warn({
        message: "Route not found",
        path: c.req.path,
        method: c.req.method,
    });

    return c.json(
        createErrorResponse(404, "Not Found", `Route ${c.req.path} does not exist`),
        404
    );
};
