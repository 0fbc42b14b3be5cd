import { mkdirSync } from "fs";
import path from "path";
import pino from "pino";
import type { Logger, TransportTargetOptions } from "pino";

import type { AppConfig } from "./config";

export type { Logger };

/**
 * Application logger: JSON lines to app.log, errors duplicated to error.log,
 * and stdout unless LOG_TO_STDOUT=false.
 */
export function createLogger(config: AppConfig, service: string): Logger {
    const { level, dir, toStdout } = config.logging;
    mkdirSync(dir, { recursive: true });

    const targets: TransportTargetOptions[] = [
        {
            target: "pino/file",
            level,
            options: { destination: path.join(dir, "app.log"), mkdir: true },
        },
        {
            target: "pino/file",
            level: "error",
            options: { destination: path.join(dir, "error.log"), mkdir: true },
        },
    ];

    if (toStdout) {
        targets.push({
            target: "pino/file",
            level,
            options: { destination: 1 },
        });
    }

    return pino(
        {
            level,
            timestamp: pino.stdTimeFunctions.isoTime,
            base: { service },
        },
        pino.transport({ targets })
    );
}
