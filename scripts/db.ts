import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import path from "path";

import { STATIONS } from "../stations";
import type { StationId } from "../types";

export interface StoragePaths {
    stationsDbPath: string;
    subscribersDbPath: string;
}

/**
 * Table names are interpolated into SQL, so only catalogue ids are allowed.
 */
export function stationTable(id: StationId): string {
    if (!/^station\d{2}$/.test(id)) {
        throw new Error(`Refusing to use "${id}" as a table name`);
    }
    return id;
}

function openDatabase(filePath: string): Database.Database {
    const dir = path.dirname(filePath);
    if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
    }

    const db = new Database(filePath);
    // WAL lets the bot read while the scraper commits
    db.pragma("journal_mode = WAL");
    db.pragma("busy_timeout = 5000");
    return db;
}

/**
 * Create one append-only reading table per station.
 */
export function initializeStationDatabase(db: Database.Database): void {
    const statements = STATIONS.map(
        (station) => `
        CREATE TABLE IF NOT EXISTS ${stationTable(station.id)} (
            id              INTEGER PRIMARY KEY AUTOINCREMENT,
            status          TEXT NOT NULL,
            pm_10           REAL,
            pm_2_5          REAL,
            o3              REAL,
            no              REAL,
            no2             REAL,
            nox             REAL,
            so2             REAL,
            co              REAL,
            c6h6            REAL,
            update_time     TEXT NOT NULL UNIQUE
        );`
    );
    db.exec(statements.join("\n"));
}

function hasColumn(db: Database.Database, table: string, column: string): boolean {
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    return columns.some((c) => c.name === column);
}

/**
 * Create the subscribers table, adding columns missing from older databases.
 */
export function initializeSubscriberDatabase(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS subscribers (
            user_id          INTEGER PRIMARY KEY,
            selected_station TEXT,
            status_filter    TEXT NOT NULL DEFAULT 'all',
            active           INTEGER NOT NULL DEFAULT 1,
            updated_at       TEXT NOT NULL DEFAULT ''
        );
    `);

    if (!hasColumn(db, "subscribers", "status_filter")) {
        db.exec(`ALTER TABLE subscribers ADD COLUMN status_filter TEXT NOT NULL DEFAULT 'all'`);
    }
    if (!hasColumn(db, "subscribers", "active")) {
        db.exec(`ALTER TABLE subscribers ADD COLUMN active INTEGER NOT NULL DEFAULT 1`);
    }
    if (!hasColumn(db, "subscribers", "updated_at")) {
        db.exec(`ALTER TABLE subscribers ADD COLUMN updated_at TEXT NOT NULL DEFAULT ''`);
    }
}

/**
 * Open a connection, run `fn`, and always close it again.
 */
function withDatabase<T>(
    filePath: string,
    initialize: (db: Database.Database) => void,
    fn: (db: Database.Database) => T
): T {
    const db = openDatabase(filePath);
    try {
        initialize(db);
        return fn(db);
    } finally {
        db.close();
    }
}

export function withStationDatabase<T>(paths: StoragePaths, fn: (db: Database.Database) => T): T {
    return withDatabase(paths.stationsDbPath, initializeStationDatabase, fn);
}

export function withSubscriberDatabase<T>(paths: StoragePaths, fn: (db: Database.Database) => T): T {
    return withDatabase(paths.subscribersDbPath, initializeSubscriberDatabase, fn);
}
