/**
 * AlertService - Centralized error logging and notification service
 *
 * This service provides:
 * 1. Standardized error logging with severity levels and categories
 * 2. Deduplication of similar errors within a time window
 * 3. SNS notification for errors that cross their alert threshold
 */
import { SNSClient, PublishCommand } from '@aws-sdk/client-sns';
import TtlCache from './TtlCache';

// Error severity levels
export enum Severity {
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
    CRITICAL = 'CRITICAL',
}

// Alert categories for grouping similar errors
export enum AlertCategory {
    NETWORK = 'NET',
    PORTAL = 'PORTAL',
    PARSING = 'PARSE',
    CACHE = 'CACHE',
    SYSTEM = 'SYS',
}

// Error context to provide additional information
export type ErrorContext = Record<string, unknown>;

interface ErrorCacheEntry {
    count: number;
    firstSeen: number;
    lastSeen: number;
    lastReported: number;
}

export interface CategoryLogger {
    info(message: string, context?: ErrorContext): Promise<void>;
    warn(message: string, error?: Error, context?: ErrorContext): Promise<void>;
    error(message: string, error?: Error, context?: ErrorContext): Promise<void>;
}

export interface AlertServiceOptions {
    stage?: string;
    alertTopicArn?: string;
    snsClient?: SNSClient;
    now?: () => number;
}

// Remember errors for 15 minutes
const ERROR_CACHE_TTL_SECONDS = 15 * 60;
// Only report duplicate errors after 10 occurrences or 5 minutes
const ERROR_REPORT_THRESHOLD = 10;
const ERROR_REPORT_INTERVAL_MS = 5 * 60 * 1000;

/**
 * Generate a key for an error based on message and category
 */
export function generateErrorKey(message: string, category: AlertCategory): string {
    // Strip out dynamic values that might make errors seem different
    const normalizedMessage = message
        .replace(/\b\d{4}-\d{2}-\d{2}\b/g, 'DATE')
        .replace(/\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g, 'DATE')
        .replace(/\b\d{2}:\d{2}:\d{2}\b/g, 'TIME')
        .replace(/[0-9]{3,}/g, 'NUMBER')
        .replace(/\s+/g, ' ')
        .trim();

    return `${category}:${normalizedMessage}`;
}

export class AlertService {
    private readonly stage: string;
    private readonly alertTopicArn?: string;
    private readonly now: () => number;
    private readonly errorCache: TtlCache<ErrorCacheEntry>;
    private snsClient?: SNSClient;

    constructor(options: AlertServiceOptions = {}) {
        this.stage = options.stage ?? 'dev';
        this.alertTopicArn = options.alertTopicArn;
        this.now = options.now ?? Date.now;
        this.snsClient = options.snsClient;
        this.errorCache = new TtlCache<ErrorCacheEntry>({ name: 'error-cache', now: this.now });
    }

    /**
     * Log an error and potentially trigger an alert
     *
     * @param message The error message
     * @param error Optional Error object for stack trace
     * @param context Optional context about the error
     */
    async logError(
        severity: Severity,
        category: AlertCategory,
        message: string,
        error?: Error,
        context?: ErrorContext
    ): Promise<void> {
        if (severity === Severity.INFO) {
            console.log(`[${category}] ${message}`, context ?? '');
            return;
        } else if (severity === Severity.WARNING) {
            console.warn(`[${category}] ${message}`, error?.message || '', context ?? '');
        } else {
            console.error(`[${category}] ${message}`, error?.message || '', error?.stack || '', context ?? '');
        }

        const errorKey = generateErrorKey(message, category);
        const entry = this.recordOccurrence(errorKey);
        const now = this.now();

        const exceedsThreshold = entry.count >= ERROR_REPORT_THRESHOLD;
        const exceedsTimeInterval = now - entry.lastReported > ERROR_REPORT_INTERVAL_MS;

        // Send alerts for:
        // 1. All CRITICAL errors immediately
        // 2. ERROR level when they exceed threshold or time interval
        // 3. WARNING level only when they exceed a higher threshold
        if (
            severity === Severity.CRITICAL ||
            (severity === Severity.ERROR && (exceedsThreshold || exceedsTimeInterval)) ||
            (severity === Severity.WARNING && entry.count >= ERROR_REPORT_THRESHOLD * 2)
        ) {
            const sent = await this.sendAlert(severity, category, message, entry.count, context);
            if (sent) {
                entry.lastReported = now;
            }
        }
    }

    /**
     * Create a scoped logger for a specific category
     */
    forCategory(category: AlertCategory): CategoryLogger {
        return {
            info: (message, context) => this.logError(Severity.INFO, category, message, undefined, context),
            warn: (message, error, context) => this.logError(Severity.WARNING, category, message, error, context),
            error: (message, error, context) => this.logError(Severity.ERROR, category, message, error, context),
        };
    }

    /**
     * Occurrence count for an error key within the dedup window
     */
    occurrences(message: string, category: AlertCategory): number {
        return this.errorCache.get(generateErrorKey(message, category))?.count ?? 0;
    }

    private recordOccurrence(errorKey: string): ErrorCacheEntry {
        const now = this.now();
        const existing = this.errorCache.get(errorKey);

        const entry: ErrorCacheEntry = existing
            ? { ...existing, count: existing.count + 1, lastSeen: now }
            : { count: 1, firstSeen: now, lastSeen: now, lastReported: 0 };

        // Writes keep the same object so lastReported updates land in the cache
        this.errorCache.set(errorKey, entry, ERROR_CACHE_TTL_SECONDS);
        return entry;
    }

    /**
     * Send an alert notification via SNS. Returns whether a notification went out.
     */
    private async sendAlert(
        severity: Severity,
        category: AlertCategory,
        message: string,
        count: number,
        context?: ErrorContext
    ): Promise<boolean> {
        if (!this.alertTopicArn) {
            return false;
        }

        try {
            if (!this.snsClient) {
                this.snsClient = new SNSClient({ region: process.env.AWS_REGION || 'ap-south-1' });
            }

            // Subject must be printable ASCII and under 100 chars
            const prefix = `[CaseSearch ${this.stage}] ${severity} ${category}: `;
            const sanitizedMessage = message
                .replace(/[^\x20-\x7E]/g, '')
                .substring(0, Math.max(0, 100 - prefix.length));

            await this.snsClient.send(
                new PublishCommand({
                    TopicArn: this.alertTopicArn,
                    Subject: prefix + (sanitizedMessage || '[No message provided]'),
                    Message: JSON.stringify(
                        {
                            timestamp: new Date(this.now()).toISOString(),
                            severity,
                            category,
                            message,
                            count,
                            context,
                            stage: this.stage,
                        },
                        null,
                        2
                    ),
                    MessageAttributes: {
                        severity: { DataType: 'String', StringValue: severity },
                        category: { DataType: 'String', StringValue: category },
                    },
                })
            );
            return true;
        } catch (error) {
            // Don't use the alert service here to avoid infinite loops
            console.error('Failed to send alert notification:', error);
            return false;
        }
    }
}

export default AlertService;
