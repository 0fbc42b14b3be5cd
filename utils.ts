import { isValid, parse } from "date-fns";
import { TimestampParseError } from "./errors";
import type { PollutantKey, PollutantValues } from "./types";

export const UPDATE_TIME_FORMAT = "dd/MM/yyyy HH:mm";

export const POLLUTANT_KEYS: readonly PollutantKey[] = [
    "pm_10",
    "pm_2_5",
    "o3",
    "no",
    "no2",
    "nox",
    "so2",
    "co",
    "c6h6",
];

// Page labels after subscripts are flattened and case is folded
const POLLUTANT_LABELS: Record<string, PollutantKey> = {
    PM10: "pm_10",
    "PM2.5": "pm_2_5",
    O3: "o3",
    NO: "no",
    NO2: "no2",
    NOX: "nox",
    SO2: "so2",
    CO: "co",
    C6H6: "c6h6",
};

const SUBSCRIPT_DIGITS = "₀₁₂₃₄₅₆₇₈₉";

/**
 * Normalize a published update time to "DD/MM/YYYY HH:MM".
 * Leading label text such as "Updated on:" is ignored.
 * Example: "Updated on: 5/3/2024 14:30" -> "05/03/2024 14:30"
 */
export function normalizeUpdateTime(raw: string): string {
    const match = raw.match(/(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2})(?!\d)/);
    if (!match) {
        throw new TimestampParseError(raw);
    }

    const [, day, month, year, hour, minute] = match;
    if (!isValid(parse(`${day}/${month}/${year} ${hour}:${minute}`, "d/M/yyyy H:mm", new Date(0)))) {
        throw new TimestampParseError(raw);
    }

    // Rebuilt from the matched fields; a local Date would shift times inside a DST gap
    return `${day.padStart(2, "0")}/${month.padStart(2, "0")}/${year} ${hour.padStart(2, "0")}:${minute}`;
}

/**
 * Map a page label ("PM₂.₅:", "NO₂", "NOx") to its pollutant key.
 */
export function normalizePollutantLabel(label: string): PollutantKey | null {
    const flattened = label
        .replace(/[₀-₉]/g, (digit) => String(SUBSCRIPT_DIGITS.indexOf(digit)))
        .replace(/[:\s]/g, "")
        .toUpperCase();

    return POLLUTANT_LABELS[flattened] ?? null;
}

/**
 * Parse a concentration such as "69.6 μg/m³" or "12,4". Returns null for
 * blanks, dashes and anything else that is not a number.
 */
export function parsePollutantValue(raw: string | null | undefined): number | null {
    if (!raw) return null;

    const match = raw.trim().match(/^-?\d+(?:[.,]\d+)?/);
    if (!match) return null;

    const value = Number.parseFloat(match[0].replace(",", "."));
    return Number.isFinite(value) ? value : null;
}

export function emptyPollutants(): PollutantValues {
    return {
        pm_10: null,
        pm_2_5: null,
        o3: null,
        no: null,
        no2: null,
        nox: null,
        so2: null,
        co: null,
        c6h6: null,
    };
}

/**
 * Collapse whitespace runs (including newlines from nested markup).
 */
export function cleanText(str: string): string {
    return str.replace(/\s+/g, " ").trim();
}
