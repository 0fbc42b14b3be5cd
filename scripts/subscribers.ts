import type Database from "better-sqlite3";

import { isStatusFilter } from "../air_quality";
import { findStationBySourceTitle, isStationId } from "../stations";
import type { StationId, StatusFilter, Subscriber } from "../types";

interface DbSubscriberRow {
    user_id: number;
    selected_station: string | null;
    status_filter: string | null;
    active: number;
    updated_at: string;
}

// Older databases stored the display name instead of the table id
function toStationId(value: string | null): StationId | null {
    if (!value) return null;
    if (isStationId(value)) return value;
    return findStationBySourceTitle(value)?.id ?? null;
}

function dbRowToSubscriber(row: DbSubscriberRow): Subscriber {
    return {
        userId: row.user_id,
        selectedStation: toStationId(row.selected_station),
        statusFilter: row.status_filter && isStatusFilter(row.status_filter) ? row.status_filter : "all",
        active: row.active === 1,
        updatedAt: row.updated_at,
    };
}

/**
 * Subscriber rows keyed by Telegram chat id. Every write is a single
 * statement, so concurrent commands for one user resolve as last-write-wins.
 */
export class SubscriberRepository {
    constructor(
        private readonly db: Database.Database,
        private readonly now: () => Date = () => new Date()
    ) {}

    get(userId: number): Subscriber | null {
        const row = this.db.prepare(`SELECT * FROM subscribers WHERE user_id = ?`).get(userId) as
            | DbSubscriberRow
            | undefined;
        return row ? dbRowToSubscriber(row) : null;
    }

    listActive(): Subscriber[] {
        const rows = this.db
            .prepare(`SELECT * FROM subscribers WHERE active = 1 ORDER BY user_id ASC`)
            .all() as DbSubscriberRow[];
        return rows.map(dbRowToSubscriber);
    }

    /**
     * Create the subscriber or reactivate it, keeping any stored preferences.
     */
    activate(userId: number): Subscriber {
        this.db
            .prepare(
                `INSERT INTO subscribers (user_id, selected_station, status_filter, active, updated_at)
                 VALUES (?, NULL, 'all', 1, ?)
                 ON CONFLICT(user_id) DO UPDATE SET active = 1, updated_at = excluded.updated_at`
            )
            .run(userId, this.timestamp());
        return this.require(userId);
    }

    /**
     * Unsubscribe without forgetting station and filter.
     * Returns false when there was no active subscription.
     */
    deactivate(userId: number): boolean {
        const result = this.db
            .prepare(`UPDATE subscribers SET active = 0, updated_at = ? WHERE user_id = ? AND active = 1`)
            .run(this.timestamp(), userId);
        return result.changes > 0;
    }

    /**
     * Store a preference without touching `active`. A user without a row gets
     * an inactive one; only activate() subscribes.
     */
    setStation(userId: number, stationId: StationId): Subscriber {
        this.db
            .prepare(
                `INSERT INTO subscribers (user_id, selected_station, status_filter, active, updated_at)
                 VALUES (?, ?, 'all', 0, ?)
                 ON CONFLICT(user_id) DO UPDATE SET
                    selected_station = excluded.selected_station,
                    updated_at = excluded.updated_at`
            )
            .run(userId, stationId, this.timestamp());
        return this.require(userId);
    }

    setFilter(userId: number, filter: StatusFilter): Subscriber {
        this.db
            .prepare(
                `INSERT INTO subscribers (user_id, selected_station, status_filter, active, updated_at)
                 VALUES (?, NULL, ?, 0, ?)
                 ON CONFLICT(user_id) DO UPDATE SET
                    status_filter = excluded.status_filter,
                    updated_at = excluded.updated_at`
            )
            .run(userId, filter, this.timestamp());
        return this.require(userId);
    }

    private require(userId: number): Subscriber {
        const subscriber = this.get(userId);
        if (!subscriber) {
            throw new Error(`Subscriber ${userId} missing after write`);
        }
        return subscriber;
    }

    private timestamp(): string {
        return this.now().toISOString();
    }
}
