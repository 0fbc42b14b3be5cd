import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { withStationDatabase, withSubscriberDatabase } from "../scripts/db";
import { countReadings, getLatestReadings, getLatestUpdateTime, getRecentReadings, insertReading } from "../scripts/db-queries";
import { SubscriberRepository } from "../scripts/subscribers";
import type { ScrapedReading, StationId } from "../types";
import { emptyPollutants } from "../utils";
import { createTestContext, type TestContext } from "./helpers";

function scraped(stationId: StationId, updateTime: string, pm10: number | null = 20): ScrapedReading {
    return { stationId, pageStatus: "green", pollutants: { ...emptyPollutants(), pm_10: pm10 }, updateTime };
}

describe("station readings", () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    afterEach(() => {
        ctx.cleanup();
    });

    it("should start every station with an empty log", () => {
        withStationDatabase(ctx.config.storage, (db) => {
            expect(getLatestUpdateTime(db, "station01")).toBeNull();
            expect(countReadings(db, "station11")).toBe(0);
            expect(getLatestReadings(db).size).toBe(0);
        });
    });

    it("should return recent readings newest first", () => {
        withStationDatabase(ctx.config.storage, (db) => {
            insertReading(db, scraped("station02", "05/03/2024 12:00"), "green");
            insertReading(db, scraped("station02", "05/03/2024 13:00"), "yellow");
            insertReading(db, scraped("station02", "05/03/2024 14:00"), "green");

            expect(getRecentReadings(db, "station02", 2).map((r) => [r.id, r.updateTime, r.status])).toEqual([
                [3, "05/03/2024 14:00", "green"],
                [2, "05/03/2024 13:00", "yellow"],
            ]);
            expect(getLatestUpdateTime(db, "station02")).toBe("05/03/2024 14:00");
        });
    });

    it("should keep nulls for pollutants that were not reported", () => {
        const [stored] = withStationDatabase(ctx.config.storage, (db) => {
            insertReading(db, scraped("station07", "05/03/2024 14:00", null), "unknown");
            return getRecentReadings(db, "station07", 1);
        });
        expect(stored.pollutants).toEqual(emptyPollutants());
        expect(stored.status).toBe("unknown");
    });

    it("should refuse a second row with the same update time", () => {
        withStationDatabase(ctx.config.storage, (db) => {
            insertReading(db, scraped("station04", "05/03/2024 14:00"), "green");
            expect(() => insertReading(db, scraped("station04", "05/03/2024 14:00"), "green")).toThrow(/UNIQUE/);
            expect(countReadings(db, "station04")).toBe(1);
        });
    });

    it("should collect the latest reading of each station", () => {
        const latest = withStationDatabase(ctx.config.storage, (db) => {
            insertReading(db, scraped("station01", "05/03/2024 13:00"), "green");
            insertReading(db, scraped("station01", "05/03/2024 14:00"), "red");
            insertReading(db, scraped("station09", "05/03/2024 14:00"), "yellow");
            return getLatestReadings(db);
        });

        expect([...latest.keys()]).toEqual(["station01", "station09"]);
        expect(latest.get("station01")?.status).toBe("red");
    });

    it("should persist across connections", () => {
        withStationDatabase(ctx.config.storage, (db) => insertReading(db, scraped("station05", "05/03/2024 14:00"), "green"));
        expect(withStationDatabase(ctx.config.storage, (db) => countReadings(db, "station05"))).toBe(1);
    });
});

describe("SubscriberRepository", () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    afterEach(() => {
        ctx.cleanup();
    });

    function withRepo<T>(fn: (repo: SubscriberRepository) => T): T {
        return withSubscriberDatabase(ctx.config.storage, (db) => fn(new SubscriberRepository(db, ctx.now)));
    }

    it("should create subscribers with the default filter", () => {
        const subscriber = withRepo((repo) => repo.activate(1));
        expect(subscriber).toEqual({
            userId: 1,
            selectedStation: null,
            statusFilter: "all",
            active: true,
            updatedAt: ctx.now().toISOString(),
        });
    });

    it("should change only the field being set", () => {
        withRepo((repo) => {
            repo.setFilter(1, "orange_up");
            repo.setStation(1, "station06");
            expect(repo.get(1)).toMatchObject({ selectedStation: "station06", statusFilter: "orange_up" });

            repo.setStation(1, "station08");
            expect(repo.get(1)).toMatchObject({ selectedStation: "station08", statusFilter: "orange_up" });
        });
    });

    it("should list only active subscribers in id order", () => {
        const ids = withRepo((repo) => {
            repo.activate(30);
            repo.activate(10);
            repo.activate(20);
            repo.deactivate(20);
            return repo.listActive().map((s) => s.userId);
        });
        expect(ids).toEqual([10, 30]);
    });

    it("should report whether deactivate changed anything", () => {
        withRepo((repo) => {
            expect(repo.deactivate(5)).toBe(false);
            repo.activate(5);
            expect(repo.deactivate(5)).toBe(true);
            expect(repo.deactivate(5)).toBe(false);
        });
    });

    it("should migrate a legacy subscribers table in place", () => {
        const file = ctx.config.storage.subscribersDbPath;
        mkdirSync(path.dirname(file), { recursive: true });

        const legacy = new Database(file);
        legacy.exec(`CREATE TABLE subscribers (user_id INTEGER PRIMARY KEY, selected_station TEXT)`);
        legacy.prepare(`INSERT INTO subscribers (user_id, selected_station) VALUES (?, ?)`).run(7, "Nicosia: Traffic Station");
        legacy.prepare(`INSERT INTO subscribers (user_id, selected_station) VALUES (?, ?)`).run(8, "station10");
        legacy.close();

        const migrated = withRepo((repo) => [repo.get(7), repo.get(8)]);

        expect(migrated).toEqual([
            { userId: 7, selectedStation: "station01", statusFilter: "all", active: true, updatedAt: "" },
            { userId: 8, selectedStation: "station10", statusFilter: "all", active: true, updatedAt: "" },
        ]);
    });
});
