import { DEFAULT_API_BASE_URL, type ReleaseEndpoint } from '../features/update/RepositoryLocator';
import {
    DEFAULT_PRESENTATION_HEIGHT,
    DEFAULT_PRESENTATION_WIDTH,
    DEFAULT_USER_AGENT,
    MINIMUM_PRESENTATION_HEIGHT,
    MINIMUM_PRESENTATION_WIDTH
} from '../features/update/constants';

export type LogLevel = 'off' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Size of the optional presentation surface, in terminal columns and lines.
 */
export interface PresentationSize {
    width: number;
    height: number;
}

export interface CheckerConfiguration {
    apiBaseUrl: string;
    endpoint: ReleaseEndpoint;
    token: string | null;
    userAgent: string;
    /** `null` leaves the request to the transport's own timeout. */
    timeoutMs: number | null;
    logLevel: LogLevel;
    presentation: PresentationSize;
}

const LOG_LEVELS: readonly LogLevel[] = ['off', 'error', 'warn', 'info', 'debug'];

/**
 * Gets the checker configuration from environment variables
 */
export function getCheckerConfiguration(env: NodeJS.ProcessEnv = process.env): CheckerConfiguration {
    return {
        apiBaseUrl: readText(env.RELEASE_CHECK_API_URL) ?? DEFAULT_API_BASE_URL,
        endpoint: env.RELEASE_CHECK_ENDPOINT?.trim() === 'latest' ? 'latest' : 'collection',
        token: readText(env.RELEASE_CHECK_TOKEN) ?? readText(env.GITHUB_TOKEN),
        userAgent: readText(env.RELEASE_CHECK_USER_AGENT) ?? DEFAULT_USER_AGENT,
        timeoutMs: readPositiveInteger(env.RELEASE_CHECK_TIMEOUT_MS),
        logLevel: parseLogLevel(env.RELEASE_CHECK_LOG_LEVEL),
        presentation: normalizePresentationSize({
            width: readPositiveInteger(env.RELEASE_CHECK_WIDTH) ?? DEFAULT_PRESENTATION_WIDTH,
            height: readPositiveInteger(env.RELEASE_CHECK_HEIGHT) ?? DEFAULT_PRESENTATION_HEIGHT
        })
    };
}

/**
 * Parses a log level name, falling back to `warn`
 */
export function parseLogLevel(value: string | undefined): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === normalized) ?? 'warn';
}

/**
 * Clamps a presentation size to the smallest surface the notifier can draw
 */
export function normalizePresentationSize(size: Partial<PresentationSize>): PresentationSize {
    return {
        width: Math.max(MINIMUM_PRESENTATION_WIDTH, Math.trunc(size.width ?? DEFAULT_PRESENTATION_WIDTH)),
        height: Math.max(MINIMUM_PRESENTATION_HEIGHT, Math.trunc(size.height ?? DEFAULT_PRESENTATION_HEIGHT))
    };
}

function readText(value: string | undefined): string | null {
    const normalized = value?.trim();
    return normalized ? normalized : null;
}

function readPositiveInteger(value: string | undefined): number | null {
    if (value === undefined || !/^\d+$/.test(value.trim())) {
        return null;
    }
    const parsed = Number.parseInt(value.trim(), 10);
    return parsed > 0 ? parsed : null;
}
