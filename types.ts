export type StationId =
    | "station01"
    | "station02"
    | "station03"
    | "station04"
    | "station05"
    | "station06"
    | "station07"
    | "station08"
    | "station09"
    | "station10"
    | "station11";

export interface Station {
    id: StationId;
    /** Name shown to bot users, e.g. "Limassol: Traffic Station" */
    displayName: string;
    /** Title as printed on the source page, e.g. "Limassol - Traffic Station" */
    sourceName: string;
}

export type PollutantKey =
    | "pm_10"
    | "pm_2_5"
    | "o3"
    | "no"
    | "no2"
    | "nox"
    | "so2"
    | "co"
    | "c6h6";

export type PollutantValues = Record<PollutantKey, number | null>;

/** Ordered from least to most severe. */
export type SeverityStatus = "unknown" | "green" | "yellow" | "orange" | "red";

export type StatusFilter = "all" | "yellow_up" | "orange_up" | "red_only";

export interface PollutantBands {
    yellow: number;
    orange: number;
    red: number;
}

export type ThresholdTable = Partial<Record<PollutantKey, PollutantBands>>;

export interface StationReading {
    id: number;
    stationId: StationId;
    status: SeverityStatus;
    pollutants: PollutantValues;
    updateTime: string;
}

/** A reading as scraped, before it has a row id. */
export interface ScrapedReading {
    stationId: StationId;
    pageStatus: SeverityStatus;
    pollutants: PollutantValues;
    updateTime: string;
}

export interface Subscriber {
    userId: number;
    selectedStation: StationId | null;
    statusFilter: StatusFilter;
    active: boolean;
    updatedAt: string;
}
