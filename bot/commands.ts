/**
 * Bot command handlers
 *
 * Handlers are plain functions of (context, user id, argument text) that
 * return the reply to send. They do not know about Telegram; bot/telegram.ts
 * turns a CommandReply into API calls.
 */

import { classifyReading, isStatusFilter, STATUS_FILTERS } from "../air_quality";
import type { AppContext } from "../context";
import { FILTER_DESCRIPTIONS, renderHistory, renderReadingMessage } from "../messages";
import { withStationDatabase, withSubscriberDatabase } from "../scripts/db";
import { getLatestReading, getRecentReadings } from "../scripts/db-queries";
import { SubscriberRepository } from "../scripts/subscribers";
import { findStationByName, getStation, STATIONS } from "../stations";
import type { Station, StatusFilter, Subscriber } from "../types";

export const COMMAND_NAMES = ["start", "stop", "check", "filter", "status", "test", "help", "station"] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type ReplyKeyboard = { kind: "stations" } | { kind: "filters" };

export interface CommandReply {
    text: string;
    keyboard?: ReplyKeyboard;
}

export type CommandHandler = (ctx: AppContext, userId: number, args: string) => CommandReply;

export const COMMAND_ALIASES: Readonly<Record<string, CommandName>> = {
    subscribe: "start",
    restart: "start",
    unsubscribe: "stop",
};

export const FILTER_CALLBACK_PREFIX = "filter:";

const FILTER_CONFIRMATIONS: Record<StatusFilter, string> = {
    all: "You will receive notifications for all statuses.",
    yellow_up: "You will receive notifications for 🟡 Yellow, 🟠 Orange and 🔴 Red statuses only.",
    orange_up: "You will receive notifications for 🟠 Orange and 🔴 Red statuses only.",
    red_only: "You will receive notifications for 🔴 Red status only.",
};

const HELP_TEXT = [
    "/start to subscribe and choose a station.",
    "/stop to stop receiving hourly notifications.",
    "/check [station] to see the latest entries for a station.",
    "/filter [all|yellow_up|orange_up|red_only] to choose which statuses notify you.",
    "/station <name> to change your station.",
    "/status to check your current settings.",
    "/help for help.",
    "",
    "Data source: https://www.airquality.dli.mlsi.gov.cy",
].join("\n");

function subscribers<T>(ctx: AppContext, fn: (repo: SubscriberRepository) => T): T {
    return withSubscriberDatabase(ctx.config.storage, (db) => fn(new SubscriberRepository(db, ctx.now)));
}

function stationList(stations: readonly Station[]): string {
    return stations.map((s) => s.displayName).join("\n");
}

type StationResolution = { ok: true; station: Station } | { ok: false; reply: CommandReply };

function resolveStation(query: string): StationResolution {
    const lookup = findStationByName(query);
    switch (lookup.kind) {
        case "found":
            return { ok: true, station: lookup.station };
        case "ambiguous":
            return {
                ok: false,
                reply: {
                    text: `"${query}" matches several stations:\n${stationList(lookup.matches)}\n\nPlease be more specific.`,
                },
            };
        case "none":
            return {
                ok: false,
                reply: { text: `Station "${query}" not found.\n\nAvailable stations:\n${stationList(STATIONS)}` },
            };
    }
}

function describeSettings(subscriber: Subscriber): string {
    const station = subscriber.selectedStation ? getStation(subscriber.selectedStation).displayName : "not selected";
    return [
        "Your current settings:",
        "",
        `📍 Station: ${station}`,
        `🔔 Notification filter: ${FILTER_DESCRIPTIONS[subscriber.statusFilter]}`,
        `📬 Hourly updates: ${subscriber.active ? "on" : "off"}`,
        "",
        "Use /filter to change notification preferences.",
    ].join("\n");
}

const handleStart: CommandHandler = (ctx, userId) => {
    const subscriber = subscribers(ctx, (repo) => repo.activate(userId));

    if (subscriber.selectedStation) {
        const station = getStation(subscriber.selectedStation);
        return {
            text: `You are subscribed to hourly updates for ${station.displayName}.\nPick another station below or use /filter to choose alerts.`,
            keyboard: { kind: "stations" },
        };
    }

    return { text: "Please select a station:", keyboard: { kind: "stations" } };
};

const handleStop: CommandHandler = (ctx, userId) => {
    const stopped = subscribers(ctx, (repo) => repo.deactivate(userId));
    if (!stopped) {
        return { text: "You are not subscribed." };
    }
    return { text: "You have unsubscribed from hourly updates. Your station and filter are kept; use /start to resume." };
};

const handleCheck: CommandHandler = (ctx, userId, args) => {
    let station: Station;

    if (args) {
        const resolved = resolveStation(args);
        if (!resolved.ok) return resolved.reply;
        station = resolved.station;
    } else {
        const subscriber = subscribers(ctx, (repo) => repo.get(userId));
        if (!subscriber?.selectedStation) {
            return { text: "Please select a station first using /start or provide a station name: /check Limassol" };
        }
        station = getStation(subscriber.selectedStation);
    }

    const readings = withStationDatabase(ctx.config.storage, (db) =>
        getRecentReadings(db, station.id, ctx.config.notify.checkHistoryLimit)
    );
    return { text: renderHistory(station, readings, ctx.now()) };
};

/**
 * Validate and store a filter value. Shared by /filter and the inline keyboard.
 */
export function applyFilter(ctx: AppContext, userId: number, value: string): CommandReply {
    const filter = value.trim().toLowerCase();
    if (!isStatusFilter(filter)) {
        return { text: `Unknown filter "${value.trim()}". Valid options: ${STATUS_FILTERS.join(", ")}` };
    }

    subscribers(ctx, (repo) => repo.setFilter(userId, filter));
    return { text: `Filter updated! ${FILTER_CONFIRMATIONS[filter]}` };
}

const handleFilter: CommandHandler = (ctx, userId, args) => {
    if (!args) {
        return {
            text: "Select which air quality statuses you want to be notified about:",
            keyboard: { kind: "filters" },
        };
    }
    return applyFilter(ctx, userId, args);
};

const handleStatus: CommandHandler = (ctx, userId) => {
    const subscriber = subscribers(ctx, (repo) => repo.get(userId));
    if (!subscriber) {
        return { text: "You are not subscribed yet. Use /start to begin." };
    }
    return { text: describeSettings(subscriber) };
};

const handleTest: CommandHandler = () => ({ text: "Test command works!" });

const handleHelp: CommandHandler = () => ({ text: HELP_TEXT });

const handleStation: CommandHandler = (ctx, userId, args) => {
    if (!args) {
        return { text: "Please select a station:", keyboard: { kind: "stations" } };
    }

    const resolved = resolveStation(args);
    if (!resolved.ok) return resolved.reply;
    const { station } = resolved;

    const subscriber = subscribers(ctx, (repo) => repo.setStation(userId, station.id));
    const updates = subscriber.active
        ? "You will get hourly updates for this station. Use /filter for alerts only."
        : "Use /start to get hourly updates for this station.";
    const reading = withStationDatabase(ctx.config.storage, (db) => getLatestReading(db, station.id));

    if (!reading) {
        return { text: `Station set to ${station.displayName}. No data found for this station yet.\n\n${updates}` };
    }

    const classification = classifyReading(reading.pollutants, ctx.thresholds, reading.status);
    return { text: `${renderReadingMessage(station, reading, classification)}\n\n${updates}` };
};

export const COMMAND_HANDLERS: Readonly<Record<CommandName, CommandHandler>> = {
    start: handleStart,
    stop: handleStop,
    check: handleCheck,
    filter: handleFilter,
    status: handleStatus,
    test: handleTest,
    help: handleHelp,
    station: handleStation,
};

/**
 * Fail fast at start-up if the table and the command list drift apart.
 */
export function assertCommandTable(table: Readonly<Record<string, CommandHandler>> = COMMAND_HANDLERS): void {
    const names = new Set<string>(COMMAND_NAMES);
    for (const name of COMMAND_NAMES) {
        if (typeof table[name] !== "function") {
            throw new Error(`No handler registered for /${name}`);
        }
    }
    for (const name of Object.keys(table)) {
        if (!names.has(name)) {
            throw new Error(`Handler registered for unknown command /${name}`);
        }
    }
    for (const [alias, target] of Object.entries(COMMAND_ALIASES)) {
        if (names.has(alias) || !names.has(target)) {
            throw new Error(`Invalid command alias /${alias} -> /${target}`);
        }
    }
}

function isCommandName(value: string): value is CommandName {
    return (COMMAND_NAMES as readonly string[]).includes(value);
}

/**
 * "/check@SomeBot Limassol" -> { name: "check", args: "Limassol" }
 */
export function parseCommand(text: string): { name: string; args: string } | null {
    const match = text.trim().match(/^\/([A-Za-z_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/);
    if (!match) return null;
    return { name: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}

export function resolveCommandName(name: string): CommandName | null {
    if (isCommandName(name)) return name;
    return Object.hasOwn(COMMAND_ALIASES, name) ? COMMAND_ALIASES[name] : null;
}

/**
 * Route one incoming text message. Plain text is treated as a station name,
 * which is what the station keyboard sends. Returns null for empty messages.
 */
export function handleMessage(ctx: AppContext, userId: number, text: string): CommandReply | null {
    const trimmed = text.trim();
    if (!trimmed) return null;

    const command = parseCommand(trimmed);
    if (command) {
        const name = resolveCommandName(command.name);
        if (!name) {
            return { text: `Unknown command /${command.name}. Use /help to see what I can do.` };
        }
        return COMMAND_HANDLERS[name](ctx, userId, command.args);
    }

    if (trimmed.startsWith("/")) {
        return { text: "Unknown command. Use /help to see what I can do." };
    }

    return COMMAND_HANDLERS.station(ctx, userId, trimmed);
}

export function handleFilterCallback(ctx: AppContext, userId: number, data: string): CommandReply {
    if (!data.startsWith(FILTER_CALLBACK_PREFIX)) {
        return { text: "Unknown option." };
    }
    return applyFilter(ctx, userId, data.slice(FILTER_CALLBACK_PREFIX.length));
}
