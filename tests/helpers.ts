import { mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";
import pino from "pino";

import { loadConfig } from "../config";
import type { AppContext } from "../context";
import { buildThresholdTable } from "../scripts/thresholds";

export type LogLine = Record<string, unknown>;

export interface TestContext extends AppContext {
    dir: string;
    logs: LogLine[];
    cleanup: () => void;
}

export const TEST_THRESHOLDS = buildThresholdTable([
    ["pm_10", "50", "100", "200"],
    ["pm_2_5", "25", "50", "100"],
    ["o3", "100", "140", "180"],
    ["no2", "100", "200", "400"],
    ["so2", "125", "350", "500"],
    ["co", "10000", "20000", "30000"],
]);

/**
 * Context backed by fresh SQLite files in a temp directory, with every log
 * line captured in `logs`.
 */
export function createTestContext(env: NodeJS.ProcessEnv = {}, now: Date = new Date(2024, 2, 5, 14, 45)): TestContext {
    const dir = mkdtempSync(path.join(os.tmpdir(), "cy-air-"));
    const config = loadConfig({ DATA_DIR: "data", LOG_DIR: "logs", LOG_LEVEL: "debug", ...env }, dir);

    const logs: LogLine[] = [];
    const logger = pino(
        { level: "debug" },
        {
            write(line: string) {
                logs.push(JSON.parse(line));
            },
        }
    );

    return {
        config,
        logger,
        thresholds: TEST_THRESHOLDS,
        now: () => now,
        dir,
        logs,
        cleanup: () => rmSync(dir, { recursive: true, force: true }),
    };
}
