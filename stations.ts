import type { Station, StationId } from "./types";

export const STATIONS: readonly Station[] = [
    { id: "station01", displayName: "Nicosia: Traffic Station", sourceName: "Nicosia - Traffic Station" },
    { id: "station02", displayName: "Nicosia: Residential Station", sourceName: "Nicosia - Residential Station" },
    { id: "station03", displayName: "Limassol: Traffic Station", sourceName: "Limassol - Traffic Station" },
    { id: "station04", displayName: "Larnaca: Traffic Station", sourceName: "Larnaca - Traffic Station" },
    { id: "station05", displayName: "Paphos: Traffic Station", sourceName: "Paphos - Traffic Station" },
    {
        id: "station06",
        displayName: "Ayia Marina Xyliatou: Background Station",
        sourceName: "Ayia Marina Xyliatou - Background Station",
    },
    { id: "station07", displayName: "Zygi: Industrial Station", sourceName: "Zygi - Industrial Station" },
    { id: "station08", displayName: "Mari: Industrial Station", sourceName: "Mari - Industrial Station" },
    { id: "station09", displayName: "Paralimni: Traffic Station", sourceName: "Paralimni - Traffic Station" },
    { id: "station10", displayName: "Kalavasos Industrial Station", sourceName: "Kalavasos Industrial Station" },
    { id: "station11", displayName: "Ormidia Industrial Station", sourceName: "Ormidia Industrial Station" },
];

const stationsById = new Map<string, Station>(STATIONS.map((station) => [station.id, station]));

export type StationLookup =
    | { kind: "found"; station: Station }
    | { kind: "ambiguous"; matches: Station[] }
    | { kind: "none" };

/**
 * Lowercase, treat "-" and ":" as spaces and collapse whitespace, so that
 * "Nicosia - Traffic Station" and "Nicosia: Traffic Station" compare equal.
 */
export function normalizeStationName(name: string): string {
    return name
        .toLowerCase()
        .replace(/[-:–]/g, " ")
        .replace(/\s+/g, " ")
        .trim();
}

export function isStationId(value: string): value is StationId {
    return stationsById.has(value);
}

export function getStation(id: StationId): Station {
    const station = stationsById.get(id);
    if (!station) {
        throw new Error(`Unknown station id: ${id}`);
    }
    return station;
}

/**
 * Resolve a title from the source page to a catalogue entry.
 */
export function findStationBySourceTitle(title: string): Station | null {
    const wanted = normalizeStationName(title);
    return (
        STATIONS.find(
            (station) =>
                normalizeStationName(station.sourceName) === wanted ||
                normalizeStationName(station.displayName) === wanted
        ) ?? null
    );
}

function editDistance(a: string, b: string): number {
    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
        }
        previous = current;
    }
    return previous[b.length];
}

/**
 * True when some word of `name` starts with `query` give or take one typo,
 * e.g. "limo" against "limassol". Single words of four or more letters only.
 */
function hasNearPrefix(name: string, query: string): boolean {
    if (query.length < 4 || query.includes(" ")) return false;
    return name.split(" ").some((word) => editDistance(word.slice(0, query.length), query) <= 1);
}

/**
 * Case-insensitive partial match of user input against station names.
 * An exact name wins over whole-word matches, then substring matches, then
 * near prefixes.
 */
export function findStationByName(query: string): StationLookup {
    const wanted = normalizeStationName(query);
    if (!wanted) {
        return { kind: "none" };
    }

    const exact = findStationBySourceTitle(query);
    if (exact) {
        return { kind: "found", station: exact };
    }

    let matches = STATIONS.filter((station) => normalizeStationName(station.displayName).includes(wanted));

    // "mari" is inside "ayia marina"; whole words decide before calling it ambiguous
    const wholeWord = matches.filter((station) =>
        ` ${normalizeStationName(station.displayName)} `.includes(` ${wanted} `)
    );
    if (wholeWord.length > 0) {
        matches = wholeWord;
    }

    if (matches.length === 0) {
        matches = STATIONS.filter((station) => hasNearPrefix(normalizeStationName(station.displayName), wanted));
    }

    if (matches.length === 1) {
        return { kind: "found", station: matches[0] };
    }
    if (matches.length > 1) {
        return { kind: "ambiguous", matches };
    }
    return { kind: "none" };
}
