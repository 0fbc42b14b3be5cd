import { format } from "date-fns";

import { elevatedPollutants, type Classification, type PollutantAssessment } from "./air_quality";
import type { PollutantKey, SeverityStatus, Station, StationReading, StatusFilter } from "./types";
import { POLLUTANT_KEYS, UPDATE_TIME_FORMAT } from "./utils";

export const POLLUTANT_LABELS: Record<PollutantKey, string> = {
    pm_10: "PM₁₀",
    pm_2_5: "PM₂.₅",
    o3: "O₃",
    no: "NO",
    no2: "NO₂",
    nox: "NOx",
    so2: "SO₂",
    co: "CO",
    c6h6: "C₆H₆",
};

export const STATUS_EMOJI: Record<SeverityStatus, string> = {
    unknown: "⚪",
    green: "🟢",
    yellow: "🟡",
    orange: "🟠",
    red: "🔴",
};

const STATUS_NAMES: Record<SeverityStatus, string> = {
    unknown: "Unknown",
    green: "Good",
    yellow: "Moderate",
    orange: "High",
    red: "Very high",
};

const STATUS_EXPLANATIONS: Record<SeverityStatus, string> = {
    unknown: "Not enough data to rate the air quality right now.",
    green: "Air pollution is low. Air quality is good.",
    yellow: "Pollution is moderate. Air quality is acceptable for most people.",
    orange: "Pollution is high. Sensitive groups may feel the effects.",
    red: "Pollution is very high. Everyone may experience health effects.",
};

const HEALTH_RECOMMENDATIONS: Record<SeverityStatus, string> = {
    unknown: "Check again after the next update.",
    green: "Safe for all outdoor activities.",
    yellow: "Sensitive individuals may want to limit prolonged outdoor exertion.",
    orange: "Sensitive groups should reduce outdoor activity. Consider limiting extended time outdoors.",
    red: "Avoid outdoor activities and keep windows closed.",
};

interface PollutantInfo {
    name: string;
    impact: string;
    sources: string;
}

const POLLUTANT_INFO: Partial<Record<PollutantKey, PollutantInfo>> = {
    pm_10: {
        name: "PM₁₀ (coarse particles)",
        impact: "Irritates airways, worsens asthma, aggravates heart/lung disease",
        sources: "Saharan/Middle Eastern dust storms (~50 days/year), local traffic, construction",
    },
    pm_2_5: {
        name: "PM₂.₅ (fine particles)",
        impact: "Penetrates lungs/bloodstream causing cardiovascular disease, stroke, lung cancer",
        sources: "Vehicle exhaust, power generation, industrial facilities, regional transport",
    },
    o3: {
        name: "Ozone (O₃)",
        impact: "Inflames airways, triggers asthma, reduces lung function",
        sources: "Forms from traffic NOx under heat and sunlight",
    },
    no2: {
        name: "Nitrogen dioxide (NO₂)",
        impact: "Aggravates asthma, reduces lung function, increases respiratory infections",
        sources: "Urban traffic, diesel vehicles, ships, aviation",
    },
    so2: {
        name: "Sulfur dioxide (SO₂)",
        impact: "Causes wheezing, chest tightness, shortness of breath",
        sources: "Power generation, cement production, ship emissions",
    },
    co: {
        name: "Carbon monoxide (CO)",
        impact: "Reduces oxygen to organs, causes headaches, dizziness, fatigue",
        sources: "Vehicle exhaust, incomplete combustion in congested traffic",
    },
};

export const FILTER_DESCRIPTIONS: Record<StatusFilter, string> = {
    all: "All statuses",
    yellow_up: "🟡 Yellow and above",
    orange_up: "🟠 Orange and above",
    red_only: "🔴 Red only",
};

export function statusLabel(status: SeverityStatus): string {
    return `${STATUS_EMOJI[status]} ${STATUS_NAMES[status]}`;
}

export function explainStatus(status: SeverityStatus): string {
    return STATUS_EXPLANATIONS[status];
}

export function healthRecommendation(status: SeverityStatus): string {
    return HEALTH_RECOMMENDATIONS[status];
}

export function pollutantName(pollutant: PollutantKey): string {
    return POLLUTANT_INFO[pollutant]?.name ?? POLLUTANT_LABELS[pollutant];
}

export function formatValue(value: number | null): string {
    return value === null ? "n/a" : String(value);
}

function describeAssessment(a: PollutantAssessment): string[] {
    const lines = [`• ${pollutantName(a.pollutant)}: ${a.value} μg/m³ (${a.band})`];
    const impact = POLLUTANT_INFO[a.pollutant]?.impact;
    if (impact) {
        lines.push(`  ${impact}`);
    }
    return lines;
}

/**
 * Full notification text for one station reading.
 */
export function renderReadingMessage(
    station: Station,
    reading: StationReading,
    classification: Classification
): string {
    const sections: string[] = [];

    sections.push(`📍 ${station.displayName}\nStatus: ${statusLabel(reading.status)}`);
    sections.push(explainStatus(reading.status));

    if (classification.contributors.length > 0) {
        const names = classification.contributors.map((c) => pollutantName(c.pollutant));
        sections.push(`Likely cause: ${names.join(" and ")}`);
    }

    const elevated = elevatedPollutants(classification).slice(0, 3);
    if (elevated.length > 0) {
        const lines = ["⚠️ Elevated pollutants:", ...elevated.flatMap(describeAssessment)];
        const sources = POLLUTANT_INFO[elevated[0].pollutant]?.sources;
        if (sources) {
            lines.push(`Common sources: ${sources}`);
        }
        sections.push(lines.join("\n"));
    }

    sections.push(`💡 ${healthRecommendation(reading.status)}`);
    sections.push(
        POLLUTANT_KEYS.map((key) => `${POLLUTANT_LABELS[key]}: ${formatValue(reading.pollutants[key])}`).join("\n")
    );
    sections.push(`Timestamp: ${reading.updateTime}`);

    return sections.join("\n\n");
}

/**
 * Short history listing used by /check.
 */
export function renderHistory(station: Station, readings: StationReading[], now: Date): string {
    if (readings.length === 0) {
        return `No data found for ${station.displayName}.`;
    }

    const lines = readings.map((r) => `ID: ${r.id} - Time: ${r.updateTime} - ${STATUS_EMOJI[r.status]}`);
    return [
        `Last ${readings.length} entries for ${station.displayName}:`,
        "",
        ...lines,
        "",
        `Current time: ${format(now, UPDATE_TIME_FORMAT)}`,
    ].join("\n");
}
