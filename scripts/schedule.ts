import cron from "node-cron";
import type { ScheduledTask } from "node-cron";

import type { AppContext } from "../context";

/**
 * Schedule `job` on a cron expression in the configured timezone. Failures are
 * logged; the next tick is the retry.
 */
export function scheduleJob(
    ctx: AppContext,
    name: string,
    expression: string,
    job: () => Promise<unknown>
): ScheduledTask {
    if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression for ${name}: "${expression}"`);
    }

    const log = ctx.logger.child({ subsystem: "cron", job: name });

    const task = cron.schedule(
        expression,
        async () => {
            log.info("Scheduled run triggered");
            try {
                await job();
                log.info("Scheduled run completed");
            } catch (error) {
                log.error({ err: error }, "Scheduled run failed");
            }
        },
        { timezone: ctx.config.timezone }
    );

    log.info({ schedule: expression, timezone: ctx.config.timezone }, "Job scheduled");
    return task;
}
