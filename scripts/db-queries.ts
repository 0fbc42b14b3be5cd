/**
 * Station Reading Queries
 *
 * Read/insert helpers over the per-station reading tables. Callers own the
 * connection (see withStationDatabase).
 */

import type Database from "better-sqlite3";

import { isSeverityStatus } from "../air_quality";
import { STATIONS } from "../stations";
import type { ScrapedReading, SeverityStatus, StationId, StationReading } from "../types";
import { stationTable } from "./db";

interface DbReadingRow {
    id: number;
    status: string;
    pm_10: number | null;
    pm_2_5: number | null;
    o3: number | null;
    no: number | null;
    no2: number | null;
    nox: number | null;
    so2: number | null;
    co: number | null;
    c6h6: number | null;
    update_time: string;
}

function dbRowToReading(stationId: StationId, row: DbReadingRow): StationReading {
    return {
        id: row.id,
        stationId,
        status: isSeverityStatus(row.status) ? row.status : "unknown",
        pollutants: {
            pm_10: row.pm_10,
            pm_2_5: row.pm_2_5,
            o3: row.o3,
            no: row.no,
            no2: row.no2,
            nox: row.nox,
            so2: row.so2,
            co: row.co,
            c6h6: row.c6h6,
        },
        updateTime: row.update_time,
    };
}

/**
 * Most recently stored update time for a station, or null for an empty log.
 */
export function getLatestUpdateTime(db: Database.Database, stationId: StationId): string | null {
    const row = db
        .prepare(`SELECT update_time FROM ${stationTable(stationId)} ORDER BY id DESC LIMIT 1`)
        .get() as { update_time: string } | undefined;
    return row?.update_time ?? null;
}

/**
 * Append one reading. A single INSERT, so readers see all of it or none.
 * Returns the new row id.
 */
export function insertReading(db: Database.Database, reading: ScrapedReading, status: SeverityStatus): number {
    const { pollutants: p } = reading;
    const result = db
        .prepare(
            `INSERT INTO ${stationTable(reading.stationId)}
                (status, pm_10, pm_2_5, o3, no, no2, nox, so2, co, c6h6, update_time)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(status, p.pm_10, p.pm_2_5, p.o3, p.no, p.no2, p.nox, p.so2, p.co, p.c6h6, reading.updateTime);
    return Number(result.lastInsertRowid);
}

export function getRecentReadings(db: Database.Database, stationId: StationId, limit: number): StationReading[] {
    const rows = db
        .prepare(`SELECT * FROM ${stationTable(stationId)} ORDER BY id DESC LIMIT ?`)
        .all(limit) as DbReadingRow[];
    return rows.map((row) => dbRowToReading(stationId, row));
}

export function getLatestReading(db: Database.Database, stationId: StationId): StationReading | null {
    return getRecentReadings(db, stationId, 1)[0] ?? null;
}

/**
 * Latest reading of every station that has one, read in a single transaction
 * so the snapshot is consistent across tables.
 */
export function getLatestReadings(db: Database.Database): Map<StationId, StationReading> {
    const readAll = db.transaction(() => {
        const latest = new Map<StationId, StationReading>();
        for (const station of STATIONS) {
            const reading = getLatestReading(db, station.id);
            if (reading) {
                latest.set(station.id, reading);
            }
        }
        return latest;
    });
    return readAll();
}

export function countReadings(db: Database.Database, stationId: StationId): number {
    const row = db.prepare(`SELECT COUNT(*) AS count FROM ${stationTable(stationId)}`).get() as { count: number };
    return row.count;
}
