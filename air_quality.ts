import type {
    PollutantBands,
    PollutantKey,
    PollutantValues,
    SeverityStatus,
    StatusFilter,
    ThresholdTable,
} from "./types";
import { POLLUTANT_KEYS } from "./utils";

export const SEVERITY_ORDER: readonly SeverityStatus[] = ["unknown", "green", "yellow", "orange", "red"];

export const STATUS_FILTERS: readonly StatusFilter[] = ["all", "yellow_up", "orange_up", "red_only"];

export function severityRank(status: SeverityStatus): number {
    return SEVERITY_ORDER.indexOf(status);
}

export function isSeverityStatus(value: string): value is SeverityStatus {
    return (SEVERITY_ORDER as readonly string[]).includes(value);
}

export function isStatusFilter(value: string): value is StatusFilter {
    return (STATUS_FILTERS as readonly string[]).includes(value);
}

export function worstStatus(a: SeverityStatus, b: SeverityStatus): SeverityStatus {
    return severityRank(a) >= severityRank(b) ? a : b;
}

export interface PollutantAssessment {
    pollutant: PollutantKey;
    value: number;
    band: SeverityStatus;
    /** value divided by the lower bound of its band; 0 for green */
    exceedance: number;
}

export interface Classification {
    status: SeverityStatus;
    /** Every pollutant that had both a value and thresholds */
    assessments: PollutantAssessment[];
    /** Pollutants at the worst band, most exceeded first; empty when green or unknown */
    contributors: PollutantAssessment[];
}

export function bandFor(value: number, bands: PollutantBands): SeverityStatus {
    if (value > bands.red) return "red";
    if (value > bands.orange) return "orange";
    if (value > bands.yellow) return "yellow";
    return "green";
}

function lowerBound(band: SeverityStatus, bands: PollutantBands): number | null {
    switch (band) {
        case "yellow":
            return bands.yellow;
        case "orange":
            return bands.orange;
        case "red":
            return bands.red;
        default:
            return null;
    }
}

function assess(pollutant: PollutantKey, value: number, bands: PollutantBands): PollutantAssessment {
    const band = bandFor(value, bands);
    const bound = lowerBound(band, bands);
    return {
        pollutant,
        value,
        band,
        exceedance: bound && bound > 0 ? value / bound : 0,
    };
}

function bySeverity(a: PollutantAssessment, b: PollutantAssessment): number {
    return severityRank(b.band) - severityRank(a.band) || b.exceedance - a.exceedance;
}

/**
 * Overall status is the worst band among measured pollutants. When nothing
 * could be classified the page-reported band is used instead.
 */
export function classifyReading(
    pollutants: PollutantValues,
    thresholds: ThresholdTable,
    fallback: SeverityStatus = "unknown"
): Classification {
    const assessments: PollutantAssessment[] = [];

    for (const pollutant of POLLUTANT_KEYS) {
        const value = pollutants[pollutant];
        const bands = thresholds[pollutant];
        if (value === null || !bands) continue;
        assessments.push(assess(pollutant, value, bands));
    }

    if (assessments.length === 0) {
        return { status: fallback, assessments, contributors: [] };
    }

    const status = assessments.reduce<SeverityStatus>((worst, a) => worstStatus(worst, a.band), "green");
    const contributors =
        severityRank(status) > severityRank("green")
            ? assessments.filter((a) => a.band === status).sort(bySeverity)
            : [];

    return { status, assessments, contributors };
}

/**
 * Pollutants above green, worst first.
 */
export function elevatedPollutants(classification: Classification): PollutantAssessment[] {
    return classification.assessments.filter((a) => severityRank(a.band) > severityRank("green")).sort(bySeverity);
}

export function passesFilter(status: SeverityStatus, filter: StatusFilter): boolean {
    switch (filter) {
        case "all":
            return true;
        case "yellow_up":
            return severityRank(status) >= severityRank("yellow");
        case "orange_up":
            return severityRank(status) >= severityRank("orange");
        case "red_only":
            return status === "red";
    }
}
