import { mkdtempSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";

import { ThresholdConfigError } from "../errors";
import { buildThresholdTable, loadThresholds } from "../scripts/thresholds";

describe("thresholds", () => {
    const tempDirs: string[] = [];

    afterEach(() => {
        for (const dir of tempDirs.splice(0)) {
            rmSync(dir, { recursive: true, force: true });
        }
    });

    it("should load the shipped threshold file", async () => {
        const table = await loadThresholds(path.join(process.cwd(), "data", "thresholds.csv"));
        expect(Object.keys(table).sort()).toEqual(["co", "no2", "o3", "pm_10", "pm_2_5", "so2"]);
        expect(table.pm_10).toEqual({ yellow: 50, orange: 100, red: 200 });
        expect(table.co).toEqual({ yellow: 10000, orange: 20000, red: 30000 });
    });

    it("should load a custom file and skip blank lines", async () => {
        const dir = mkdtempSync(path.join(os.tmpdir(), "cy-thresholds-"));
        tempDirs.push(dir);
        const file = path.join(dir, "thresholds.csv");
        writeFileSync(file, "pollutant,yellow,orange,red\nPM_10, 40 , 80, 160\n\nno2,90,180,360\n");

        const table = await loadThresholds(file);
        expect(table).toEqual({
            pm_10: { yellow: 40, orange: 80, red: 160 },
            no2: { yellow: 90, orange: 180, red: 360 },
        });
    });

    it("should reject a missing file", async () => {
        await expect(loadThresholds(path.join(os.tmpdir(), "does-not-exist", "thresholds.csv"))).rejects.toThrow();
    });

    describe("buildThresholdTable", () => {
        it("should reject unknown pollutants", () => {
            expect(() => buildThresholdTable([["radon", "1", "2", "3"]])).toThrow(ThresholdConfigError);
        });

        it("should reject bounds that do not increase", () => {
            expect(() => buildThresholdTable([["o3", "100", "100", "180"]])).toThrow(
                "Bounds for o3 must increase: 100, 100, 180"
            );
        });

        it("should reject non-numeric bounds", () => {
            expect(() => buildThresholdTable([["o3", "100", "high", "180"]])).toThrow(
                'Invalid orange bound for o3: "high"'
            );
        });

        it("should reject duplicates", () => {
            expect(() =>
                buildThresholdTable([
                    ["co", "1", "2", "3"],
                    ["co", "4", "5", "6"],
                ])
            ).toThrow("Duplicate thresholds for co");
        });

        it("should reject an empty table", () => {
            expect(() => buildThresholdTable([])).toThrow("Threshold table is empty");
        });
    });
});
