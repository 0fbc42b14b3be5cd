import { Router } from "express";

import type { Logger } from "../logger";
import type { ScrapeRunner } from "../scripts/scrape-runner";

export function createForceScrapeRouter(runner: ScrapeRunner, logger: Logger): Router {
    const router = Router();

    /**
     * POST /force-scrape
     * Starts a scrape cycle in the background
     */
    router.post("/force-scrape", (req, res) => {
        if (runner.isRunning) {
            res.status(409).json({
                error: "Scrape already in progress",
                status: runner.status,
            });
            return;
        }

        runner.trigger().catch((error) => {
            logger.error({ err: error }, "Forced scrape failed");
        });

        res.status(202).json({
            message: "Scrape started",
            status: runner.status,
        });
    });

    /**
     * GET /scrape-status
     * Returns the state of the current or last scrape cycle
     */
    router.get("/scrape-status", (req, res) => {
        res.json({
            isScraping: runner.isRunning,
            ...runner.status,
        });
    });

    return router;
}
