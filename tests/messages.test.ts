import { describe, it, expect } from "vitest";

import { classifyReading } from "../air_quality";
import { formatValue, renderHistory, renderReadingMessage, statusLabel } from "../messages";
import { getStation } from "../stations";
import type { PollutantValues, SeverityStatus, StationReading } from "../types";
import { emptyPollutants } from "../utils";
import { TEST_THRESHOLDS } from "./helpers";

function reading(id: number, status: SeverityStatus, pollutants: Partial<PollutantValues>, updateTime = "05/03/2024 14:00"): StationReading {
    return {
        id,
        stationId: "station03",
        status,
        pollutants: { ...emptyPollutants(), ...pollutants },
        updateTime,
    };
}

describe("messages", () => {
    it("should label statuses with emoji and name", () => {
        expect(statusLabel("green")).toBe("🟢 Good");
        expect(statusLabel("red")).toBe("🔴 Very high");
        expect(statusLabel("unknown")).toBe("⚪ Unknown");
    });

    it("should print missing values as n/a", () => {
        expect(formatValue(null)).toBe("n/a");
        expect(formatValue(0)).toBe("0");
        expect(formatValue(12.4)).toBe("12.4");
    });

    it("should explain an elevated reading and name its causes", () => {
        const r = reading(1, "orange", { pm_10: 120, o3: 60, no2: 250 });
        const text = renderReadingMessage(getStation("station03"), r, classifyReading(r.pollutants, TEST_THRESHOLDS));

        expect(text).toBe(
            [
                "📍 Limassol: Traffic Station\nStatus: 🟠 High",
                "Pollution is high. Sensitive groups may feel the effects.",
                "Likely cause: Nitrogen dioxide (NO₂) and PM₁₀ (coarse particles)",
                [
                    "⚠️ Elevated pollutants:",
                    "• Nitrogen dioxide (NO₂): 250 μg/m³ (orange)",
                    "  Aggravates asthma, reduces lung function, increases respiratory infections",
                    "• PM₁₀ (coarse particles): 120 μg/m³ (orange)",
                    "  Irritates airways, worsens asthma, aggravates heart/lung disease",
                    "Common sources: Urban traffic, diesel vehicles, ships, aviation",
                ].join("\n"),
                "💡 Sensitive groups should reduce outdoor activity. Consider limiting extended time outdoors.",
                "PM₁₀: 120\nPM₂.₅: n/a\nO₃: 60\nNO: n/a\nNO₂: 250\nNOx: n/a\nSO₂: n/a\nCO: n/a\nC₆H₆: n/a",
                "Timestamp: 05/03/2024 14:00",
            ].join("\n\n")
        );
    });

    it("should leave out cause and elevated sections for good air", () => {
        const r = reading(1, "green", { pm_10: 20 });
        const text = renderReadingMessage(getStation("station03"), r, classifyReading(r.pollutants, TEST_THRESHOLDS));

        expect(text.split("\n\n")).toEqual([
            "📍 Limassol: Traffic Station\nStatus: 🟢 Good",
            "Air pollution is low. Air quality is good.",
            "💡 Safe for all outdoor activities.",
            "PM₁₀: 20\nPM₂.₅: n/a\nO₃: n/a\nNO: n/a\nNO₂: n/a\nNOx: n/a\nSO₂: n/a\nCO: n/a\nC₆H₆: n/a",
            "Timestamp: 05/03/2024 14:00",
        ]);
    });

    it("should list history newest first with the current time", () => {
        const readings = [reading(3, "yellow", {}, "05/03/2024 14:00"), reading(2, "green", {}, "05/03/2024 13:00")];
        const text = renderHistory(getStation("station03"), readings, new Date(2024, 2, 5, 14, 45));

        expect(text).toBe(
            [
                "Last 2 entries for Limassol: Traffic Station:",
                "",
                "ID: 3 - Time: 05/03/2024 14:00 - 🟡",
                "ID: 2 - Time: 05/03/2024 13:00 - 🟢",
                "",
                "Current time: 05/03/2024 14:45",
            ].join("\n")
        );
    });

    it("should say when a station has no history", () => {
        expect(renderHistory(getStation("station10"), [], new Date(2024, 2, 5))).toBe(
            "No data found for Kalavasos Industrial Station."
        );
    });
});
