import type { ButtonRow } from "./formatter.js";

/** Where a handler's reply goes: a fresh message, or an edit of the one being answered. */
export interface ReplyChannel {
    send(text: string, buttons?: ButtonRow[]): Promise<void>;
    edit(text: string, buttons?: ButtonRow[]): Promise<void>;
}

export interface BotHandlers {
    onCommand(name: string, argsText: string, reply: ReplyChannel): Promise<void>;
    onButtonPress(payload: string, reply: ReplyChannel): Promise<void>;
}

/** The chat runtime as the HTTP layer sees it. */
export interface BotTransport {
    /** Registers the webhook with the chat platform. */
    start(): Promise<void>;
    /** Hands one decoded webhook body to the runtime; `false` when it is not an update. */
    handleUpdate(update: unknown): boolean;
}
