import TelegramBot from "node-telegram-bot-api";

import { STATUS_FILTERS } from "../air_quality";
import type { AppContext } from "../context";
import { errorMessage } from "../errors";
import { FILTER_DESCRIPTIONS } from "../messages";
import type { MessageSender } from "../scripts/notify-core";
import { STATIONS } from "../stations";
import {
    FILTER_CALLBACK_PREFIX,
    handleFilterCallback,
    handleMessage,
    type CommandReply,
    type ReplyKeyboard,
} from "./commands";

const FALLBACK_REPLY = "⚠️ Something went wrong. Please try again later.";

export function createTelegramBot(token: string, polling: boolean): TelegramBot {
    return new TelegramBot(token, { polling });
}

export function toReplyMarkup(keyboard: ReplyKeyboard | undefined): TelegramBot.SendMessageOptions["reply_markup"] {
    if (!keyboard) return undefined;

    switch (keyboard.kind) {
        case "stations":
            return {
                keyboard: STATIONS.map((station) => [{ text: station.displayName }]),
                one_time_keyboard: true,
                resize_keyboard: true,
            };
        case "filters":
            return {
                inline_keyboard: STATUS_FILTERS.map((filter) => [
                    { text: FILTER_DESCRIPTIONS[filter], callback_data: `${FILTER_CALLBACK_PREFIX}${filter}` },
                ]),
            };
    }
}

export function createTelegramSender(bot: TelegramBot): MessageSender {
    return {
        async send(userId, text) {
            await bot.sendMessage(userId, text);
        },
    };
}

/**
 * Attach message and callback handlers. A handler that throws is logged and
 * answered with a generic apology; it never takes the bot down.
 */
export function registerBotHandlers(bot: TelegramBot, ctx: AppContext): void {
    const log = ctx.logger.child({ subsystem: "telegram" });

    const reply = (chatId: number, response: CommandReply) =>
        bot
            .sendMessage(chatId, response.text, { reply_markup: toReplyMarkup(response.keyboard) })
            .catch((error) => log.error({ err: error, chatId }, "Failed to send reply"));

    bot.on("message", (msg) => {
        const chatId = msg.chat.id;
        const text = msg.text ?? "";

        let response: CommandReply | null;
        try {
            response = handleMessage(ctx, chatId, text);
        } catch (error) {
            log.error({ err: error, chatId, text }, "Command handler failed");
            response = { text: FALLBACK_REPLY };
        }

        if (response) {
            void reply(chatId, response);
        }
    });

    bot.on("callback_query", (query) => {
        const chatId = query.message?.chat.id ?? query.from.id;

        void bot
            .answerCallbackQuery(query.id)
            .catch((error) => log.warn({ err: error, chatId }, "Failed to answer callback query"));

        let response: CommandReply;
        try {
            response = handleFilterCallback(ctx, chatId, query.data ?? "");
        } catch (error) {
            log.error({ err: error, chatId, data: query.data }, "Callback handler failed");
            response = { text: FALLBACK_REPLY };
        }

        if (query.message) {
            void bot
                .editMessageText(response.text, { chat_id: chatId, message_id: query.message.message_id })
                .catch((error) => log.error({ err: error, chatId }, "Failed to edit filter message"));
        } else {
            void reply(chatId, response);
        }
    });

    bot.on("polling_error", (error) => {
        log.error({ err: error, reason: errorMessage(error) }, "Telegram polling error");
    });
}
