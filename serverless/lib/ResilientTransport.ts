/**
 * Resilient portal transport
 *
 * Every logical GET/POST against the portal goes through here. A call:
 * 1. waits for a slot on the shared admission gate,
 * 2. waits a random politeness delay,
 * 3. sends the request with a fixed browser-like header set and the session cookie jar,
 * 4. scans the body for captcha markers (terminal, never retried),
 * 5. on a network error, timeout, 429 or 5xx, releases its slot, backs off and tries again.
 *
 * Retries exhausted on a timeout surface as PortalTimeoutError; any other exhausted or
 * non-retryable failure surfaces as TransportFailureError.
 */
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { wrapper } from 'axios-cookiejar-support';
import { CookieJar } from 'tough-cookie';
import AdmissionGate from './AdmissionGate';
import { CategoryLogger } from './AlertService';
import { findCaptchaMarker } from './ChallengeDetector';
import { PortalConfig } from './Config';
import { CaptchaRequiredError, PortalError, PortalTimeoutError, TransportFailureError } from './PortalErrors';

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/134.0.0.0 Safari/537.36';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function getDefaultRequestHeaders(): Record<string, string> {
    return {
        'User-Agent': DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.9',
    };
}

export type TransportSettings = Pick<
    PortalConfig,
    | 'baseUrl'
    | 'timeoutMs'
    | 'maxRetries'
    | 'backoffBaseMs'
    | 'backoffFactor'
    | 'backoffMaxMs'
    | 'delayMinMs'
    | 'delayMaxMs'
    | 'debug'
>;

export type PortalHttpClient = Pick<AxiosInstance, 'request'>;

export interface TransportDependencies {
    gate: AdmissionGate;
    logger: CategoryLogger;
    client?: PortalHttpClient;
    jar?: CookieJar;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
    now?: () => number;
}

export interface RequestOptions {
    params?: Record<string, string>;
    // Caller's total time budget for this logical call, retries included
    budgetMs?: number;
}

interface PortalRequest extends RequestOptions {
    method: 'GET' | 'POST';
    path: string;
    form?: URLSearchParams;
}

type AttemptResult =
    | { ok: true; body: string }
    | { ok: false; reason: 'timeout' | 'transport'; message: string; status?: number };

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

/**
 * Wait before retry number `retry` (0-based): base * factor^retry, capped
 */
export function backoffDelay(retry: number, settings: TransportSettings): number {
    return Math.min(settings.backoffBaseMs * Math.pow(settings.backoffFactor, retry), settings.backoffMaxMs);
}

export function politenessDelay(settings: TransportSettings, random: () => number = Math.random): number {
    return settings.delayMinMs + random() * (settings.delayMaxMs - settings.delayMinMs);
}

export class ResilientTransport {
    readonly jar: CookieJar;
    private readonly client: PortalHttpClient;
    private readonly gate: AdmissionGate;
    private readonly logger: CategoryLogger;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;
    private readonly now: () => number;

    constructor(
        private readonly settings: TransportSettings,
        deps: TransportDependencies
    ) {
        this.gate = deps.gate;
        this.logger = deps.logger;
        this.sleep = deps.sleep ?? sleep;
        this.random = deps.random ?? Math.random;
        this.now = deps.now ?? Date.now;
        this.jar = deps.jar ?? new CookieJar();
        this.client =
            deps.client ??
            wrapper(axios).create({
                timeout: settings.timeoutMs,
                maxRedirects: 10,
                // Status codes are classified here, not by axios
                validateStatus: () => true,
                responseType: 'text',
                transitional: { clarifyTimeoutError: true },
                jar: this.jar,
                withCredentials: true,
                headers: getDefaultRequestHeaders(),
            });
    }

    get(path: string, options: RequestOptions = {}): Promise<string> {
        return this.request({ ...options, method: 'GET', path });
    }

    post(path: string, form: URLSearchParams, options: RequestOptions = {}): Promise<string> {
        return this.request({ ...options, method: 'POST', path, form });
    }

    private resolveUrl(path: string): string {
        return path.startsWith('http') ? path : `${this.settings.baseUrl}${path}`;
    }

    private async request(request: PortalRequest): Promise<string> {
        const url = this.resolveUrl(request.path);
        const deadline = request.budgetMs === undefined ? Infinity : this.now() + request.budgetMs;
        const maxAttempts = this.settings.maxRetries + 1;
        let lastFailure: Extract<AttemptResult, { ok: false }> | undefined;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (lastFailure) {
                const wait = backoffDelay(attempt - 2, this.settings);
                if (this.now() + wait >= deadline) {
                    throw await this.budgetExhausted(url, attempt - 1);
                }
                await this.logger.warn(`Portal request failed, retrying in ${Math.round(wait)}ms`, undefined, {
                    url,
                    attempt: attempt - 1,
                    reason: lastFailure.message,
                });
                await this.sleep(wait);
            }

            const result = await this.gate.run(() => this.attempt(request, url, deadline, attempt));
            if (result.ok) {
                return result.body;
            }
            lastFailure = result;
        }

        const attempts = maxAttempts;
        const context = { url, attempts, status: lastFailure?.status };

        if (lastFailure?.reason === 'timeout') {
            const error = new PortalTimeoutError(`Request to ${url} timed out after ${attempts} attempts`, attempts);
            await this.logger.error('Portal request timed out', error, context);
            throw error;
        }

        const error = new TransportFailureError(
            `Request to ${url} failed after ${attempts} attempts: ${lastFailure?.message ?? 'unknown error'}`,
            attempts,
            lastFailure?.status
        );
        await this.logger.error('Portal request failed', error, context);
        throw error;
    }

    /**
     * One network attempt, run while holding a gate slot
     */
    private async attempt(request: PortalRequest, url: string, deadline: number, attempt: number): Promise<AttemptResult> {
        await this.sleep(politenessDelay(this.settings, this.random));

        const remaining = deadline - this.now();
        if (remaining <= 0) {
            throw await this.budgetExhausted(url, attempt - 1);
        }

        if (this.settings.debug) {
            console.log(`Making ${request.method} request to ${url} (attempt ${attempt})`);
        }

        const config: AxiosRequestConfig = {
            method: request.method,
            url,
            params: request.params,
            timeout: Math.min(this.settings.timeoutMs, remaining),
        };

        if (request.form) {
            config.data = request.form.toString();
            config.headers = {
                'Content-Type': 'application/x-www-form-urlencoded',
                Origin: this.settings.baseUrl,
                Referer: url,
            };
        }

        try {
            const response = await this.client.request<unknown>(config);
            const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');

            const marker = findCaptchaMarker(body);
            if (marker) {
                const error = new CaptchaRequiredError(url);
                await this.logger.error('Captcha detected in portal response', error, {
                    url,
                    marker,
                    status: response.status,
                });
                throw error;
            }

            if (response.status === 429 || response.status >= 500) {
                return {
                    ok: false,
                    reason: 'transport',
                    status: response.status,
                    message: `HTTP ${response.status}`,
                };
            }

            if (response.status >= 400) {
                const error = new TransportFailureError(
                    `Request to ${url} was rejected with status ${response.status}`,
                    attempt,
                    response.status
                );
                await this.logger.error('Portal rejected request', error, { url, status: response.status });
                throw error;
            }

            return { ok: true, body };
        } catch (error) {
            if (error instanceof PortalError) {
                throw error;
            }

            const message = error instanceof Error ? error.message : String(error);
            const code = errorCode(error);
            return {
                ok: false,
                reason: code !== undefined && TIMEOUT_CODES.has(code) ? 'timeout' : 'transport',
                message: code ? `${code}: ${message}` : message,
            };
        }
    }

    private async budgetExhausted(url: string, attempts: number): Promise<PortalTimeoutError> {
        const error = new PortalTimeoutError(`Time budget for ${url} exhausted after ${attempts} attempts`, attempts);
        await this.logger.error('Portal request budget exhausted', error, { url, attempts });
        return error;
    }
}

export default ResilientTransport;
