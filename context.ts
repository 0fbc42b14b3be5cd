import type { AppConfig } from "./config";
import { createLogger, type Logger } from "./logger";
import { loadThresholds } from "./scripts/thresholds";
import type { ThresholdTable } from "./types";

/**
 * Everything a component needs, built once per process at start-up and
 * passed down explicitly.
 */
export interface AppContext {
    config: AppConfig;
    logger: Logger;
    thresholds: ThresholdTable;
    now: () => Date;
}

export async function createContext(config: AppConfig, service: string): Promise<AppContext> {
    const logger = createLogger(config, service);
    const thresholds = await loadThresholds(config.thresholdsPath);
    logger.info({ pollutants: Object.keys(thresholds), path: config.thresholdsPath }, "Loaded pollutant thresholds");
    return { config, logger, thresholds, now: () => new Date() };
}
