import cors from "cors";
import express from "express";
import type { NextFunction, Request, Response } from "express";

import { loadConfig, loadEnvFile } from "./config";
import { createContext } from "./context";
import { createForceScrapeRouter } from "./routes/force-scrape";
import { createHealthRouter } from "./routes/health";
import { createStationsRouter } from "./routes/stations";
import { scheduleJob } from "./scripts/schedule";
import { ScrapeRunner } from "./scripts/scrape-runner";

/**
 * Scraper service: scheduled scrape cycles plus a small read/ops HTTP API.
 */
async function main(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();
    const ctx = await createContext(config, "cy-air-quality-scraper");
    const runner = new ScrapeRunner(ctx);
    const httpLogger = ctx.logger.child({ subsystem: "http" });

    const app = express();
    app.use(cors());
    app.use(express.json());

    app.get("/", (req, res) => {
        res.send("Cyprus air quality scraper");
    });

    app.use(createHealthRouter(ctx));
    app.use(createForceScrapeRouter(runner, httpLogger));
    app.use(createStationsRouter(ctx));

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        httpLogger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
        res.status(500).json({ error: "Internal server error" });
    });

    scheduleJob(ctx, "scrape", config.scrape.cronSchedule, () => runner.trigger());

    if (config.scrape.runOnStart) {
        runner.trigger().catch((error) => {
            ctx.logger.error({ err: error }, "Initial scrape failed");
        });
    }

    app.listen(config.http.port, () => {
        ctx.logger.info({ port: config.http.port }, "Scraper service listening");
    });
}

main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
});
