/**
 * One-shot Scrape
 *
 * Runs a single scrape cycle and exits. For hosts that schedule with system
 * cron instead of the long-running service.
 * Run via: npm run scrape
 */

import { loadConfig, loadEnvFile } from "../config";
import { createContext } from "../context";
import { runScrape } from "./scrape-core";

async function main(): Promise<void> {
    loadEnvFile();
    const ctx = await createContext(loadConfig(), "cy-air-quality-scraper");
    const stats = await runScrape(ctx);
    console.log(
        `Scrape ${stats.outcome}: ${stats.inserted} inserted, ${stats.duplicates} duplicate, ` +
            `${stats.skipped} skipped, ${stats.failed} failed`
    );
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
