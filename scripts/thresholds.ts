/**
 * Pollutant band thresholds
 *
 * Loaded from a CSV with the header `pollutant,yellow,orange,red`. A value
 * strictly above a bound falls into that band, so with PM10 bounds 50/100/200
 * a reading of 50 is green and 50.1 is yellow.
 */

import { parse as parseCSV } from "csv-parse";
import { createReadStream } from "fs";
import { ThresholdConfigError } from "../errors";
import type { PollutantKey, ThresholdTable } from "../types";
import { POLLUTANT_KEYS } from "../utils";

function isPollutantKey(value: string): value is PollutantKey {
    return (POLLUTANT_KEYS as readonly string[]).includes(value);
}

function parseBound(raw: string | undefined, pollutant: string, column: string): number {
    const value = Number.parseFloat((raw ?? "").trim());
    if (!Number.isFinite(value) || value < 0) {
        throw new ThresholdConfigError(`Invalid ${column} bound for ${pollutant}: "${raw ?? ""}"`);
    }
    return value;
}

/**
 * Validate CSV rows (header already skipped) into a threshold table.
 */
export function buildThresholdTable(rows: string[][]): ThresholdTable {
    const table: ThresholdTable = {};

    for (const row of rows) {
        const pollutant = (row[0] ?? "").trim().toLowerCase();
        if (!isPollutantKey(pollutant)) {
            throw new ThresholdConfigError(`Unknown pollutant in thresholds: "${row[0] ?? ""}"`);
        }
        if (table[pollutant]) {
            throw new ThresholdConfigError(`Duplicate thresholds for ${pollutant}`);
        }

        const yellow = parseBound(row[1], pollutant, "yellow");
        const orange = parseBound(row[2], pollutant, "orange");
        const red = parseBound(row[3], pollutant, "red");

        if (!(yellow < orange && orange < red)) {
            throw new ThresholdConfigError(`Bounds for ${pollutant} must increase: ${yellow}, ${orange}, ${red}`);
        }

        table[pollutant] = { yellow, orange, red };
    }

    if (Object.keys(table).length === 0) {
        throw new ThresholdConfigError("Threshold table is empty");
    }

    return table;
}

export async function loadThresholds(filePath: string): Promise<ThresholdTable> {
    const rows: string[][] = [];

    await new Promise<void>((resolve, reject) => {
        createReadStream(filePath)
            .on("error", reject)
            .pipe(parseCSV({ delimiter: ",", from_line: 2, skip_empty_lines: true, trim: true }))
            .on("data", (row: string[]) => {
                rows.push(row);
            })
            .on("end", () => resolve())
            .on("error", reject);
    });

    return buildThresholdTable(rows);
}
