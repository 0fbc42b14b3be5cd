/**
 * Core Scrape Logic
 *
 * One scrape cycle: fetch the overview page, parse every station block,
 * classify each reading and append it to the station's log unless its update
 * time equals the latest one already stored.
 *
 * A fetch or page-format failure aborts the cycle before anything is written.
 * Problems with a single station are recorded for that station and the cycle
 * carries on with the rest.
 */

import { classifyReading } from "../air_quality";
import type { AppContext } from "../context";
import { errorMessage } from "../errors";
import { fetchStationsPage, parseStationsPage, type StationBlockResult } from "../scraping";
import { STATIONS } from "../stations";
import type { SeverityStatus, StationId } from "../types";
import { withStationDatabase } from "./db";
import { getLatestUpdateTime, insertReading } from "./db-queries";

export type StationOutcome = "inserted" | "duplicate" | "skipped" | "failed";

export interface StationScrapeResult {
    stationId: StationId | null;
    title: string;
    outcome: StationOutcome;
    previousUpdateTime: string | null;
    updateTime: string | null;
    status: SeverityStatus | null;
    reason: string | null;
}

export interface ScrapeStats {
    total: number;
    inserted: number;
    duplicates: number;
    skipped: number;
    failed: number;
    /** "partial" when at least one station was skipped or failed */
    outcome: "success" | "partial";
    startedAt: string;
    completedAt: string;
    stations: StationScrapeResult[];
}

export interface ScrapeOptions {
    /** Page loader, replaceable in tests. Defaults to an HTTP GET of the source URL. */
    fetchPage?: (url: string, timeoutMs: number) => Promise<string>;
}

function summarize(results: StationScrapeResult[], startedAt: Date, completedAt: Date): ScrapeStats {
    const count = (outcome: StationOutcome) => results.filter((r) => r.outcome === outcome).length;
    const skipped = count("skipped");
    const failed = count("failed");

    return {
        total: results.length,
        inserted: count("inserted"),
        duplicates: count("duplicate"),
        skipped,
        failed,
        outcome: skipped + failed === 0 ? "success" : "partial",
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        stations: results,
    };
}

/**
 * Run one scrape cycle.
 *
 * @throws PageFetchError | PageFormatError when the cycle cannot proceed
 */
export async function runScrape(ctx: AppContext, options: ScrapeOptions = {}): Promise<ScrapeStats> {
    const { fetchPage = fetchStationsPage } = options;
    const { sourceUrl, timeoutMs } = ctx.config.scrape;
    const log = ctx.logger.child({ subsystem: "scrape" });
    const startedAt = ctx.now();

    log.info({ url: sourceUrl }, "Starting scrape");

    let blocks: StationBlockResult[];
    try {
        const html = await fetchPage(sourceUrl, timeoutMs);
        blocks = parseStationsPage(html);
    } catch (error) {
        log.error({ err: error, url: sourceUrl }, "Scrape cycle failed");
        throw error;
    }

    const results: StationScrapeResult[] = [];

    withStationDatabase(ctx.config.storage, (db) => {
        for (const block of blocks) {
            if (!block.ok) {
                log.warn(
                    { station: block.stationId, title: block.title, reason: block.reason, outcome: "skipped" },
                    "Station skipped"
                );
                results.push({
                    stationId: block.stationId,
                    title: block.title,
                    outcome: "skipped",
                    previousUpdateTime: null,
                    updateTime: null,
                    status: null,
                    reason: block.reason,
                });
                continue;
            }

            const { reading } = block;
            const base = { stationId: reading.stationId, title: block.title, updateTime: reading.updateTime };

            let previousUpdateTime: string | null = null;
            try {
                previousUpdateTime = getLatestUpdateTime(db, reading.stationId);

                if (previousUpdateTime === reading.updateTime) {
                    log.info(
                        { station: reading.stationId, previousUpdateTime, updateTime: reading.updateTime, outcome: "duplicate" },
                        "Duplicate skipped"
                    );
                    results.push({ ...base, outcome: "duplicate", previousUpdateTime, status: null, reason: null });
                    continue;
                }

                const { status } = classifyReading(reading.pollutants, ctx.thresholds, reading.pageStatus);
                insertReading(db, reading, status);

                log.info(
                    { station: reading.stationId, previousUpdateTime, updateTime: reading.updateTime, outcome: "inserted", status },
                    "New reading inserted"
                );
                results.push({ ...base, outcome: "inserted", previousUpdateTime, status, reason: null });
            } catch (error) {
                log.error(
                    { err: error, station: reading.stationId, previousUpdateTime, updateTime: reading.updateTime, outcome: "failed" },
                    "Failed to store reading"
                );
                results.push({
                    ...base,
                    outcome: "failed",
                    previousUpdateTime,
                    status: null,
                    reason: errorMessage(error),
                });
            }
        }
    });

    const seen = new Set(results.map((r) => r.stationId));
    for (const station of STATIONS) {
        if (seen.has(station.id)) continue;
        log.warn({ station: station.id, title: station.sourceName, outcome: "skipped" }, "Station not present on page");
        results.push({
            stationId: station.id,
            title: station.sourceName,
            outcome: "skipped",
            previousUpdateTime: null,
            updateTime: null,
            status: null,
            reason: "not present on page",
        });
    }

    const stats = summarize(results, startedAt, ctx.now());
    log.info(
        {
            total: stats.total,
            inserted: stats.inserted,
            duplicates: stats.duplicates,
            skipped: stats.skipped,
            failed: stats.failed,
            outcome: stats.outcome,
        },
        "Scrape complete"
    );

    return stats;
}
