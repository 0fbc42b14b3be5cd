/**
 * One-shot Notify
 *
 * Sends one round of notifications without starting the command listener.
 * Run via: npm run notify
 */

import { createTelegramBot, createTelegramSender } from "../bot/telegram";
import { loadConfig, loadEnvFile } from "../config";
import { createContext } from "../context";
import { runNotify } from "./notify-core";

async function main(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();
    if (!config.telegram.token) {
        throw new Error("TELEGRAM_BOT_TOKEN environment variable not set");
    }

    const ctx = await createContext(config, "cy-air-quality-bot");
    const bot = createTelegramBot(config.telegram.token, false);
    const stats = await runNotify(ctx, createTelegramSender(bot));
    console.log(
        `Notified ${stats.sent}/${stats.subscribers} subscribers ` +
            `(${stats.filtered} filtered, ${stats.noData} without data, ${stats.failed} failed)`
    );
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
