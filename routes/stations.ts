import { Router } from "express";
import { z } from "zod";

import type { AppContext } from "../context";
import { withStationDatabase } from "../scripts/db";
import { getLatestReadings, getRecentReadings } from "../scripts/db-queries";
import { isStationId, STATIONS } from "../stations";

const readingsQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(24),
});

export function createStationsRouter(ctx: AppContext): Router {
    const router = Router();

    /**
     * GET /stations
     * Every station with its latest reading (null when none is stored)
     */
    router.get("/stations", (req, res) => {
        const latest = withStationDatabase(ctx.config.storage, (db) => getLatestReadings(db));
        res.json(
            STATIONS.map((station) => ({
                ...station,
                latest: latest.get(station.id) ?? null,
            }))
        );
    });

    /**
     * GET /stations/:id/readings?limit=24
     * Most recent readings for one station, newest first
     */
    router.get("/stations/:id/readings", (req, res) => {
        const { id } = req.params;
        if (!isStationId(id)) {
            res.status(404).json({ error: `Unknown station: ${id}` });
            return;
        }

        const query = readingsQuerySchema.safeParse(req.query);
        if (!query.success) {
            res.status(400).json({ error: "Invalid query", issues: query.error.issues });
            return;
        }

        const readings = withStationDatabase(ctx.config.storage, (db) =>
            getRecentReadings(db, id, query.data.limit)
        );
        res.json({ station: id, readings });
    });

    return router;
}
