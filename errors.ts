/**
 * The source page could not be fetched (network error, timeout or non-2xx).
 * Fatal to the current scrape cycle.
 */
export class PageFetchError extends Error {
    constructor(
        message: string,
        readonly url: string,
        readonly status: number | null = null,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "PageFetchError";
    }
}

/**
 * The page was fetched but does not contain the stations overview.
 */
export class PageFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "PageFormatError";
    }
}

export class TimestampParseError extends Error {
    constructor(readonly raw: string) {
        super(`Unparseable update time: "${raw}"`);
        this.name = "TimestampParseError";
    }
}

export class ThresholdConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ThresholdConfigError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
