import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";

import { isSeverityStatus } from "./air_quality";
import { PageFetchError, PageFormatError, TimestampParseError, errorMessage } from "./errors";
import { findStationBySourceTitle } from "./stations";
import type { ScrapedReading, SeverityStatus, StationId } from "./types";
import { cleanText, emptyPollutants, normalizePollutantLabel, normalizeUpdateTime, parsePollutantValue } from "./utils";

const OVERVIEW_CONTAINER_ID = "views-bootstrap-frontpage-stations-overview-block-1";

const USER_AGENT = "Mozilla/5.0 (compatible; cy-air-quality-bot/1.0)";

export type StationBlockResult =
    | { ok: true; title: string; reading: ScrapedReading }
    | { ok: false; title: string; stationId: StationId | null; reason: string };

/**
 * Fetch the stations overview page. Any network error, timeout or non-2xx
 * status becomes a PageFetchError.
 */
export async function fetchStationsPage(url: string, timeoutMs: number): Promise<string> {
    try {
        const response = await fetch(url, {
            headers: { "User-Agent": USER_AGENT },
            redirect: "follow",
            signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
            throw new PageFetchError(`Failed to fetch ${url}: Status ${response.status}`, url, response.status);
        }

        return await response.text();
    } catch (error) {
        if (error instanceof PageFetchError) throw error;
        throw new PageFetchError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, null, { cause: error });
    }
}

/**
 * "station-status-orange" -> "orange"; "station-status-white" and anything
 * unrecognised -> "unknown".
 */
function parsePageStatus(classAttr: string | undefined): SeverityStatus {
    const statusClass = (classAttr ?? "").split(/\s+/).find((c) => c.startsWith("station-status-"));
    const colour = statusClass?.slice("station-status-".length) ?? "";
    return isSeverityStatus(colour) && colour !== "unknown" ? colour : "unknown";
}

function parseStationBlock($block: CheerioAPI, title: string): StationBlockResult {
    const station = findStationBySourceTitle(title);
    if (!station) {
        return { ok: false, title, stationId: null, reason: `no station mapping for "${title}"` };
    }

    if ($block("span.under-maintenance-label").length > 0) {
        return { ok: false, title, stationId: station.id, reason: "under maintenance" };
    }

    const rawUpdateTime = cleanText($block("div.views-field-field-station-update-time").first().text());
    if (!rawUpdateTime) {
        return { ok: false, title, stationId: station.id, reason: "missing update time" };
    }

    let updateTime: string;
    try {
        updateTime = normalizeUpdateTime(rawUpdateTime);
    } catch (error) {
        if (error instanceof TimestampParseError) {
            return { ok: false, title, stationId: station.id, reason: error.message };
        }
        throw error;
    }

    const pollutants = emptyPollutants();
    const labels = $block("span.pollutant-label");
    const values = $block("span.pollutant-value");
    const pairs = Math.min(labels.length, values.length);

    for (let i = 0; i < pairs; i++) {
        const key = normalizePollutantLabel($block(labels[i]).text());
        if (key) {
            pollutants[key] = parsePollutantValue($block(values[i]).text());
        }
    }

    const pageStatus = parsePageStatus($block("span.group-status-helper-wrapper span").first().attr("class"));

    return {
        ok: true,
        title,
        reading: { stationId: station.id, pageStatus, pollutants, updateTime },
    };
}

/**
 * Split the overview page into one result per station block. A malformed
 * block yields a failed result for that station only; a page without the
 * overview container throws PageFormatError.
 */
export function parseStationsPage(html: string): StationBlockResult[] {
    const $ = cheerio.load(html);
    const container = $(`#${OVERVIEW_CONTAINER_ID}`);

    if (container.length === 0) {
        throw new PageFormatError("Stations overview not found on the page");
    }

    const results: StationBlockResult[] = [];
    const seenTitles = new Set<string>();

    container.find("div").each((_, element) => {
        const classes = ($(element).attr("class") ?? "").split(/\s+/);
        if (!classes.some((c) => c.startsWith("col"))) return;

        // Nested column wrappers repeat the same title; keep the outermost
        const title = cleanText($(element).find("h4.stations-overview-title").first().text());
        if (!title || seenTitles.has(title)) return;
        seenTitles.add(title);

        results.push(parseStationBlock(cheerio.load($.html(element)), title));
    });

    return results;
}
