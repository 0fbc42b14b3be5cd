import type { AppContext } from "../context";
import { errorMessage } from "../errors";
import { runScrape, type ScrapeOptions, type ScrapeStats } from "./scrape-core";

export interface ScrapeStatus {
    status: "idle" | "running" | "completed" | "partial" | "failed";
    startedAt: string | null;
    completedAt: string | null;
    stats: ScrapeStats | null;
    error: string | null;
}

/**
 * Runs scrape cycles one at a time and remembers how the last one went.
 * Shared by the cron schedule and the /force-scrape route.
 */
export class ScrapeRunner {
    private running = false;
    private last: ScrapeStatus = {
        status: "idle",
        startedAt: null,
        completedAt: null,
        stats: null,
        error: null,
    };

    constructor(
        private readonly ctx: AppContext,
        private readonly options: ScrapeOptions = {}
    ) {}

    get isRunning(): boolean {
        return this.running;
    }

    get status(): ScrapeStatus {
        return { ...this.last };
    }

    /**
     * Run one cycle. Resolves to null without scraping when a cycle is
     * already in progress; rejects when the cycle fails.
     */
    async trigger(): Promise<ScrapeStats | null> {
        if (this.running) {
            this.ctx.logger.info("Scrape already in progress, skipping");
            return null;
        }

        this.running = true;
        this.last = {
            status: "running",
            startedAt: this.ctx.now().toISOString(),
            completedAt: null,
            stats: null,
            error: null,
        };

        try {
            const stats = await runScrape(this.ctx, this.options);
            this.last.status = stats.outcome === "success" ? "completed" : "partial";
            this.last.completedAt = this.ctx.now().toISOString();
            this.last.stats = stats;
            return stats;
        } catch (error) {
            this.last.status = "failed";
            this.last.completedAt = this.ctx.now().toISOString();
            this.last.error = errorMessage(error);
            throw error;
        } finally {
            this.running = false;
        }
    }
}
