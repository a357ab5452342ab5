/**
 * Portal access settings, read from environment variables with defaults.
 *
 * Durations are milliseconds except the cache TTLs, which are seconds like TtlCache itself.
 */

export interface PortalConfig {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffFactor: number;
    backoffMaxMs: number;
    concurrencyLimit: number;
    delayMinMs: number;
    delayMaxMs: number;
    cacheTtlStatesSeconds: number;
    cacheTtlCommissionsSeconds: number;
    defaultPageSize: number;
    maxPageSize: number;
    alertTopicArn?: string;
    serviceName: string;
    version: string;
    stage: string;
    debug: boolean;
}

export const DEFAULT_CONFIG: PortalConfig = {
    baseUrl: 'https://e-jagriti.gov.in',
    timeoutMs: 30000,
    maxRetries: 3,
    backoffBaseMs: 500,
    backoffFactor: 2,
    backoffMaxMs: 10000,
    concurrencyLimit: 4,
    delayMinMs: 250,
    delayMaxMs: 1000,
    cacheTtlStatesSeconds: 24 * 60 * 60,
    cacheTtlCommissionsSeconds: 24 * 60 * 60,
    defaultPageSize: 20,
    maxPageSize: 100,
    serviceName: 'commission-case-search',
    version: '1.0.0',
    stage: 'dev',
    debug: false,
};

type Env = Record<string, string | undefined>;

function readNumber(value: string | undefined, fallback: number, min: number): number {
    if (value === undefined || value.trim() === '') return fallback;

    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function readInteger(value: string | undefined, fallback: number, min: number): number {
    const parsed = readNumber(value, fallback, min);
    return Number.isInteger(parsed) ? parsed : fallback;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): PortalConfig {
    const defaults = DEFAULT_CONFIG;

    const delayMinMs = readNumber(env.PORTAL_DELAY_MIN_MS, defaults.delayMinMs, 0);
    const delayMaxMs = Math.max(delayMinMs, readNumber(env.PORTAL_DELAY_MAX_MS, defaults.delayMaxMs, 0));
    const defaultPageSize = readInteger(env.DEFAULT_PAGE_SIZE, defaults.defaultPageSize, 1);
    const maxPageSize = Math.max(defaultPageSize, readInteger(env.MAX_PAGE_SIZE, defaults.maxPageSize, 1));

    return {
        baseUrl: (env.PORTAL_URL?.trim() || defaults.baseUrl).replace(/\/+$/, ''),
        timeoutMs: readNumber(env.PORTAL_TIMEOUT_MS, defaults.timeoutMs, 1),
        maxRetries: readInteger(env.PORTAL_MAX_RETRIES, defaults.maxRetries, 0),
        backoffBaseMs: readNumber(env.PORTAL_BACKOFF_BASE_MS, defaults.backoffBaseMs, 0),
        backoffFactor: readNumber(env.PORTAL_BACKOFF_FACTOR, defaults.backoffFactor, 1),
        backoffMaxMs: readNumber(env.PORTAL_BACKOFF_MAX_MS, defaults.backoffMaxMs, 0),
        concurrencyLimit: readInteger(env.PORTAL_CONCURRENCY_LIMIT, defaults.concurrencyLimit, 1),
        delayMinMs,
        delayMaxMs,
        cacheTtlStatesSeconds: readNumber(env.CACHE_TTL_STATES, defaults.cacheTtlStatesSeconds, 0),
        cacheTtlCommissionsSeconds: readNumber(env.CACHE_TTL_COMMISSIONS, defaults.cacheTtlCommissionsSeconds, 0),
        defaultPageSize,
        maxPageSize,
        alertTopicArn: env.ALERT_TOPIC_ARN?.trim() || undefined,
        serviceName: env.SERVICE_NAME?.trim() || defaults.serviceName,
        version: env.SERVICE_VERSION?.trim() || defaults.version,
        stage: env.STAGE?.trim() || defaults.stage,
        debug: readBoolean(env.DEBUG, defaults.debug),
    };
}
