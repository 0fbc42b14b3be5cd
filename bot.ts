import { assertCommandTable } from "./bot/commands";
import { createTelegramBot, createTelegramSender, registerBotHandlers } from "./bot/telegram";
import { loadConfig, loadEnvFile } from "./config";
import { createContext } from "./context";
import { runNotify } from "./scripts/notify-core";
import { scheduleJob } from "./scripts/schedule";

/**
 * Bot process: answers Telegram commands and sends the scheduled
 * notifications.
 */
async function main(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();

    if (!config.telegram.token) {
        throw new Error("TELEGRAM_BOT_TOKEN environment variable not set");
    }

    assertCommandTable();

    const ctx = await createContext(config, "cy-air-quality-bot");
    const bot = createTelegramBot(config.telegram.token, config.telegram.polling);
    registerBotHandlers(bot, ctx);

    const sender = createTelegramSender(bot);
    scheduleJob(ctx, "notify", config.notify.cronSchedule, () => runNotify(ctx, sender));

    ctx.logger.info({ polling: config.telegram.polling }, "Bot started");
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
