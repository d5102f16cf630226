import { env, isDev, isTest } from "./env.js";
import { pino, type LoggerOptions } from "pino";

const defaultLevel = isTest ? "silent" : isDev ? "debug" : "info";

const loggerOptions: LoggerOptions = {
    redact: isDev ? [] : ["hostname"],
    level: env.LOG_LEVEL || defaultLevel,
    transport: isDev
        ? {
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
            },
        }
        : undefined,
    formatters: {
        level(label) {
            return { level: label.toUpperCase() };
        },
    },
    base: {
        env: env.NODE_ENV,
    },
};

export const log = pino(loggerOptions);
