import { describe, it, expect } from "vitest";
import {
    bandFor,
    classifyReading,
    elevatedPollutants,
    passesFilter,
    SEVERITY_ORDER,
    severityRank,
    STATUS_FILTERS,
} from "../air_quality";
import type { PollutantKey, PollutantValues } from "../types";
import { emptyPollutants, POLLUTANT_KEYS } from "../utils";
import { TEST_THRESHOLDS } from "./helpers";

function pollutants(values: Partial<PollutantValues>): PollutantValues {
    return { ...emptyPollutants(), ...values };
}

describe("air_quality", () => {
    describe("bandFor", () => {
        const bands = { yellow: 50, orange: 100, red: 200 };

        it("should treat a value on a bound as the lower band", () => {
            expect(bandFor(50, bands)).toBe("green");
            expect(bandFor(100, bands)).toBe("yellow");
            expect(bandFor(200, bands)).toBe("orange");
        });

        it("should move up a band strictly above each bound", () => {
            expect(bandFor(50.1, bands)).toBe("yellow");
            expect(bandFor(100.1, bands)).toBe("orange");
            expect(bandFor(200.1, bands)).toBe("red");
        });
    });

    describe("classifyReading", () => {
        it("should use the worst pollutant band", () => {
            const result = classifyReading(pollutants({ pm_10: 120, o3: 60, no2: 250 }), TEST_THRESHOLDS);
            expect(result.status).toBe("orange");
            expect(result.contributors.map((c) => c.pollutant)).toEqual(["no2", "pm_10"]);
        });

        it("should be green with no contributors when everything is low", () => {
            const result = classifyReading(pollutants({ pm_10: 10, pm_2_5: 5 }), TEST_THRESHOLDS);
            expect(result.status).toBe("green");
            expect(result.contributors).toEqual([]);
        });

        it("should ignore pollutants without thresholds", () => {
            const result = classifyReading(pollutants({ nox: 9999, c6h6: 50 }), TEST_THRESHOLDS, "yellow");
            expect(result.status).toBe("yellow");
            expect(result.assessments).toEqual([]);
        });

        it("should fall back to unknown when nothing can be classified", () => {
            expect(classifyReading(emptyPollutants(), TEST_THRESHOLDS).status).toBe("unknown");
        });

        it("should never lower the status when one pollutant increases", () => {
            const base = pollutants({ pm_10: 60, pm_2_5: 20, o3: 90, no2: 150, so2: 100, co: 5000 });
            const steps = [0, 10, 25, 50, 100, 140, 200, 350, 400, 500, 10000, 20000, 30000, 40000];

            for (const key of POLLUTANT_KEYS) {
                let previous = -1;
                for (const value of steps) {
                    const rank = severityRank(classifyReading({ ...base, [key]: value }, TEST_THRESHOLDS).status);
                    expect(rank).toBeGreaterThanOrEqual(previous);
                    previous = rank;
                }
            }
        });
    });

    describe("elevatedPollutants", () => {
        it("should list pollutants above green, worst first", () => {
            const result = classifyReading(pollutants({ pm_10: 60, o3: 190, co: 100 }), TEST_THRESHOLDS);
            const elevated = elevatedPollutants(result).map((a): [PollutantKey, string] => [a.pollutant, a.band]);
            expect(elevated).toEqual([
                ["o3", "red"],
                ["pm_10", "yellow"],
            ]);
        });
    });

    describe("passesFilter", () => {
        it("should always pass 'all'", () => {
            for (const status of SEVERITY_ORDER) {
                expect(passesFilter(status, "all")).toBe(true);
            }
        });

        it("should pass 'red_only' exactly for red", () => {
            for (const status of SEVERITY_ORDER) {
                expect(passesFilter(status, "red_only")).toBe(status === "red");
            }
        });

        it("should pass threshold filters at or above their band", () => {
            expect(passesFilter("green", "yellow_up")).toBe(false);
            expect(passesFilter("yellow", "yellow_up")).toBe(true);
            expect(passesFilter("red", "yellow_up")).toBe(true);
            expect(passesFilter("yellow", "orange_up")).toBe(false);
            expect(passesFilter("orange", "orange_up")).toBe(true);
            expect(passesFilter("unknown", "yellow_up")).toBe(false);
        });

        it("should know every filter", () => {
            expect(STATUS_FILTERS).toEqual(["all", "yellow_up", "orange_up", "red_only"]);
        });
    });
});
