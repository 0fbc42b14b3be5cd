import express from "express";

import type { AppContext } from "../context";
import { errorMessage } from "../errors";

interface SourceCheck {
    status: "healthy" | "unhealthy";
    responseTime: number;
    error?: string;
}

const checkSourceConnectivity = async (url: string, timeoutMs: number): Promise<SourceCheck> => {
    const startTime = Date.now();

    try {
        const response = await fetch(url, {
            method: "HEAD",
            signal: AbortSignal.timeout(timeoutMs),
        });

        const responseTime = Date.now() - startTime;

        if (response.ok) {
            return { status: "healthy", responseTime };
        }
        return {
            status: "unhealthy",
            responseTime,
            error: `HTTP ${response.status}: ${response.statusText}`,
        };
    } catch (error) {
        return {
            status: "unhealthy",
            responseTime: Date.now() - startTime,
            error: errorMessage(error),
        };
    }
};

export function createHealthRouter(ctx: AppContext): express.Router {
    const router = express.Router();

    router.get("/health", async (req, res) => {
        const source = await checkSourceConnectivity(
            ctx.config.scrape.sourceUrl,
            Math.min(ctx.config.scrape.timeoutMs, 10_000)
        );

        const overall = source.status === "healthy" ? "healthy" : "degraded";
        res.status(overall === "healthy" ? 200 : 503).json({
            server: {
                status: "healthy",
                timestamp: ctx.now().toISOString(),
                uptime: process.uptime(),
            },
            source,
            overall,
        });
    });

    return router;
}
