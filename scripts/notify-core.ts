/**
 * Core Notify Logic
 *
 * One notify cycle: read the latest reading of every station once, then walk
 * the active subscribers and send each the reading for their station when it
 * passes their status filter.
 */

import { classifyReading, passesFilter } from "../air_quality";
import type { AppContext } from "../context";
import { errorMessage } from "../errors";
import { renderReadingMessage } from "../messages";
import { getStation } from "../stations";
import type { StationId, StationReading, Subscriber } from "../types";
import { withStationDatabase, withSubscriberDatabase } from "./db";
import { getLatestReadings } from "./db-queries";
import { SubscriberRepository } from "./subscribers";

/**
 * Delivery side of the notifier; the Telegram bot in production.
 */
export interface MessageSender {
    send(userId: number, text: string): Promise<void>;
}

export type NotifyDecision =
    | { kind: "send"; text: string }
    | { kind: "no-data" }
    | { kind: "filtered" };

export interface NotifyStats {
    subscribers: number;
    sent: number;
    filtered: number;
    noData: number;
    failed: number;
}

/**
 * Decide what, if anything, a subscriber receives this cycle.
 */
export function decideNotification(
    ctx: Pick<AppContext, "thresholds">,
    subscriber: Subscriber,
    latest: ReadonlyMap<StationId, StationReading>
): NotifyDecision {
    if (!subscriber.selectedStation) {
        return { kind: "no-data" };
    }

    const reading = latest.get(subscriber.selectedStation);
    if (!reading) {
        return { kind: "no-data" };
    }

    if (!passesFilter(reading.status, subscriber.statusFilter)) {
        return { kind: "filtered" };
    }

    const classification = classifyReading(reading.pollutants, ctx.thresholds, reading.status);
    return { kind: "send", text: renderReadingMessage(getStation(reading.stationId), reading, classification) };
}

export async function runNotify(ctx: AppContext, sender: MessageSender): Promise<NotifyStats> {
    const log = ctx.logger.child({ subsystem: "notify" });
    const startedAt = Date.now();

    const latest = withStationDatabase(ctx.config.storage, (db) => getLatestReadings(db));
    const subscribers = withSubscriberDatabase(ctx.config.storage, (db) => new SubscriberRepository(db).listActive());

    log.info({ stations: latest.size, subscribers: subscribers.length }, "Starting notifications");

    const stats: NotifyStats = { subscribers: subscribers.length, sent: 0, filtered: 0, noData: 0, failed: 0 };

    for (const subscriber of subscribers) {
        const decision = decideNotification(ctx, subscriber, latest);

        if (decision.kind === "no-data") {
            stats.noData++;
            log.debug({ userId: subscriber.userId, station: subscriber.selectedStation }, "No reading for subscriber");
            continue;
        }

        if (decision.kind === "filtered") {
            stats.filtered++;
            log.debug(
                { userId: subscriber.userId, station: subscriber.selectedStation, filter: subscriber.statusFilter },
                "Reading does not pass subscriber filter"
            );
            continue;
        }

        try {
            await sender.send(subscriber.userId, decision.text);
            stats.sent++;
        } catch (error) {
            stats.failed++;
            log.error({ err: error, userId: subscriber.userId, reason: errorMessage(error) }, "Failed to deliver notification");
        }
    }

    log.info({ ...stats, durationMs: Date.now() - startedAt }, "Notifications complete");
    return stats;
}
