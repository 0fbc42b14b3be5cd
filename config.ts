import fs from "fs";
import path from "path";

import dotenv from "dotenv";
import { z } from "zod";

/**
 * Load `.env.<NODE_ENV>` when it exists, otherwise `.env`.
 * Called once by each entry point before `loadConfig`.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
    const nodeEnv = process.env.NODE_ENV || "development";
    const envFilePath = path.resolve(cwd, `.env.${nodeEnv}`);
    if (fs.existsSync(envFilePath)) {
        dotenv.config({ path: envFilePath });
    } else {
        dotenv.config();
    }
}

const booleanFlag = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value) => (value === undefined || value === "" ? fallback : value.toLowerCase() !== "false"));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).catch("development"),
    TZ: z.string().min(1).default("Asia/Nicosia"),
    DATA_DIR: optionalString,
    STATIONS_DB_PATH: optionalString,
    SUBSCRIBERS_DB_PATH: optionalString,
    THRESHOLDS_PATH: optionalString,
    SOURCE_URL: z.string().url().default("https://www.airquality.dli.mlsi.gov.cy/"),
    SCRAPE_TIMEOUT_MS: positiveInt(30_000),
    SCRAPE_CRON_SCHEDULE: z.string().min(1).default("20 * * * *"),
    NOTIFY_CRON_SCHEDULE: z.string().min(1).default("25 * * * *"),
    SCRAPE_ON_START: booleanFlag(true),
    CHECK_HISTORY_LIMIT: positiveInt(5),
    PORT: positiveInt(8073),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    LOG_DIR: optionalString,
    LOG_TO_STDOUT: booleanFlag(true),
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_POLLING: booleanFlag(true),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
    environment: "development" | "production" | "test";
    timezone: string;
    storage: {
        stationsDbPath: string;
        subscribersDbPath: string;
    };
    thresholdsPath: string;
    scrape: {
        sourceUrl: string;
        timeoutMs: number;
        cronSchedule: string;
        runOnStart: boolean;
    };
    notify: {
        cronSchedule: string;
        checkHistoryLimit: number;
    };
    http: {
        port: number;
    };
    logging: {
        level: LogLevel;
        dir: string;
        toStdout: boolean;
    };
    telegram: {
        token: string | null;
        polling: boolean;
    };
}

/**
 * Build the application config from an environment map.
 * Throws with the list of invalid keys when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    }

    const values = result.data;
    const dataDir = path.resolve(cwd, values.DATA_DIR ?? "data");

    return {
        environment: values.NODE_ENV,
        timezone: values.TZ,
        storage: {
            stationsDbPath: path.resolve(cwd, values.STATIONS_DB_PATH ?? path.join(dataDir, "stations.db")),
            subscribersDbPath: path.resolve(cwd, values.SUBSCRIBERS_DB_PATH ?? path.join(dataDir, "subscribers.db")),
        },
        thresholdsPath: path.resolve(cwd, values.THRESHOLDS_PATH ?? path.join("data", "thresholds.csv")),
        scrape: {
            sourceUrl: values.SOURCE_URL,
            timeoutMs: values.SCRAPE_TIMEOUT_MS,
            cronSchedule: values.SCRAPE_CRON_SCHEDULE,
            runOnStart: values.SCRAPE_ON_START,
        },
        notify: {
            cronSchedule: values.NOTIFY_CRON_SCHEDULE,
            checkHistoryLimit: values.CHECK_HISTORY_LIMIT,
        },
        http: {
            port: values.PORT,
        },
        logging: {
            level: values.LOG_LEVEL,
            dir: path.resolve(cwd, values.LOG_DIR ?? "logs"),
            toStdout: values.LOG_TO_STDOUT,
        },
        telegram: {
            token: values.TELEGRAM_BOT_TOKEN ?? null,
            polling: values.TELEGRAM_POLLING,
        },
    };
}
