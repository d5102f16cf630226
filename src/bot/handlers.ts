import type { AppContext } from "../config/context.js";
import { log } from "../config/logger.js";
import { decodeNavigation } from "../pipeline/navigation.js";
import {
    EXPIRED,
    GREETING,
    HELP,
    UNEXPECTED_ERROR,
    USAGE,
    formatOutcome,
    type FormattedMessage,
} from "./formatter.js";
import type { BotHandlers, ReplyChannel } from "./transport.js";

export const COMMANDS = ["start", "help", "anime"] as const;

const send = (reply: ReplyChannel, message: FormattedMessage) => reply.send(message.text, message.buttons);
const edit = (reply: ReplyChannel, message: FormattedMessage) => reply.edit(message.text, message.buttons);

export function createBotHandlers(ctx: Pick<AppContext, "pipeline">): BotHandlers {
    const { pipeline } = ctx;

    return {
        async onCommand(name, argsText, reply) {
            switch (name) {
                case "start":
                    return send(reply, GREETING);
                case "help":
                    return send(reply, HELP);
                case "anime": {
                    const query = argsText.trim().replace(/\s+/g, " ");
                    if (!query) return send(reply, USAGE);

                    let message: FormattedMessage;
                    try {
                        message = formatOutcome(await pipeline.search(query));
                    } catch (error) {
                        log.error({ command: name, query, error: String(error) }, "Search command failed");
                        message = UNEXPECTED_ERROR;
                    }
                    return send(reply, message);
                }
                default:
                    log.debug(`Unknown command /${name}`);
                    return send(reply, HELP);
            }
        },

        async onButtonPress(payload, reply) {
            const state = decodeNavigation(payload);
            if (!state) {
                log.info({ payload }, "Undecodable button payload");
                return edit(reply, EXPIRED);
            }

            let message: FormattedMessage;
            try {
                const outcome = await pipeline.navigate(state);
                log.debug({ action: state.action, stage: outcome.stage }, "Button resolved");
                message = formatOutcome(outcome);
            } catch (error) {
                log.error({ payload, error: String(error) }, "Button press failed");
                message = UNEXPECTED_ERROR;
            }
            return edit(reply, message);
        },
    };
}
