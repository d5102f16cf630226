import TelegramBot from "node-telegram-bot-api";
import type { BotConfig } from "../config/env.js";
import { log } from "../config/logger.js";
import { UNEXPECTED_ERROR, type ButtonRow } from "./formatter.js";
import { COMMANDS } from "./handlers.js";
import type { BotHandlers, BotTransport, ReplyChannel } from "./transport.js";

// "/anime naruto", "/anime@SomeBot naruto", "/help"
const COMMAND_PATTERN = new RegExp(`^/(${COMMANDS.join("|")})(?:@\\w+)?(?:\\s+([\\s\\S]*))?$`);

export const isTelegramUpdate = (value: unknown): value is TelegramBot.Update =>
    typeof value === "object" &&
    value !== null &&
    "update_id" in value &&
    typeof value.update_id === "number";

export function toInlineKeyboard(buttons: ButtonRow[] = []): TelegramBot.InlineKeyboardMarkup {
    return {
        inline_keyboard: buttons.map((row) =>
            row.map((button) =>
                button.kind === "url"
                    ? { text: button.text, url: button.url }
                    : { text: button.text, callback_data: button.payload }
            )
        ),
    };
}

const isNotModified = (error: unknown): boolean =>
    error instanceof Error && error.message.includes("message is not modified");

/**
 * Binds the handlers to the Telegram Bot API. Updates arrive through the webhook route and
 * are fed in with `handleUpdate`; the library never polls.
 */
export class TelegramTransport implements BotTransport {
    private readonly bot: TelegramBot;

    constructor(
        private readonly config: BotConfig,
        private readonly handlers: BotHandlers,
        bot?: TelegramBot
    ) {
        this.bot = bot ?? new TelegramBot(config.botToken, { polling: false });

        this.bot.onText(COMMAND_PATTERN, (message: TelegramBot.Message, match: RegExpExecArray | null) => {
            const name = match?.[1];
            if (!name) return;
            const reply = this.channel(message.chat.id);
            this.handlers.onCommand(name, match?.[2] ?? "", reply).catch((error: unknown) => {
                log.error({ command: name, chatId: message.chat.id, error: String(error) }, "Command reply failed");
            });
        });

        this.bot.on("callback_query", (query: TelegramBot.CallbackQuery) => {
            this.onCallbackQuery(query).catch((error: unknown) => {
                log.error({ callbackQueryId: query.id, error: String(error) }, "Button reply failed");
            });
        });
    }

    async start(): Promise<void> {
        await this.bot.setWebHook(this.config.webhookUrl);
        log.info(`Webhook set to: ${this.config.webhookUrl}`);
    }

    handleUpdate(update: unknown): boolean {
        if (!isTelegramUpdate(update)) return false;
        this.bot.processUpdate(update);
        return true;
    }

    private async onCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
        // Stops the client spinner; an expired query must not block the reply.
        const answered = this.bot.answerCallbackQuery(query.id).then(
            () => undefined,
            (error: unknown) => {
                log.warn({ callbackQueryId: query.id, error: String(error) }, "Could not answer callback query");
            }
        );

        const message = query.message;
        if (message && query.data) {
            await this.handlers.onButtonPress(query.data, this.channel(message.chat.id, message.message_id));
        }

        await answered;
    }

    /** A failed delivery is reported once as plain text, which cannot trip the HTML parser. */
    private async deliver(chatId: number, attempt: () => Promise<void>): Promise<void> {
        try {
            await attempt();
        } catch (error) {
            // Pressing the button that produced the current view again.
            if (isNotModified(error)) {
                log.debug({ chatId }, "Message unchanged, edit skipped");
                return;
            }
            log.warn({ chatId, error: String(error) }, "Reply delivery failed");
            await this.bot.sendMessage(chatId, UNEXPECTED_ERROR.text);
        }
    }

    /**
     * `edit` rewrites `messageId` when given (the message whose button was pressed),
     * otherwise the last message this channel sent.
     */
    private channel(chatId: number, messageId?: number): ReplyChannel {
        let target = messageId;

        const post = async (text: string, buttons?: ButtonRow[]): Promise<void> => {
            const sent = await this.bot.sendMessage(chatId, text, {
                parse_mode: "HTML",
                disable_web_page_preview: true,
                reply_markup: toInlineKeyboard(buttons),
            });
            target = sent.message_id;
        };

        const rewrite = async (text: string, buttons?: ButtonRow[]): Promise<void> => {
            if (target === undefined) return post(text, buttons);

            await this.bot.editMessageText(text, {
                chat_id: chatId,
                message_id: target,
                parse_mode: "HTML",
                disable_web_page_preview: true,
                reply_markup: toInlineKeyboard(buttons),
            });
        };

        return {
            send: (text, buttons) => this.deliver(chatId, () => post(text, buttons)),
            edit: (text, buttons) => this.deliver(chatId, () => rewrite(text, buttons)),
        };
    }
}
