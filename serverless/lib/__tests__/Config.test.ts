import { DEFAULT_CONFIG, loadConfig } from '../Config';

describe('loadConfig', () => {
    it('uses the defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('reads every option from the environment', () => {
        const config = loadConfig({
            PORTAL_URL: 'https://portal.test/',
            PORTAL_TIMEOUT_MS: '5000',
            PORTAL_MAX_RETRIES: '0',
            PORTAL_BACKOFF_BASE_MS: '50',
            PORTAL_BACKOFF_FACTOR: '3',
            PORTAL_BACKOFF_MAX_MS: '400',
            PORTAL_CONCURRENCY_LIMIT: '2',
            PORTAL_DELAY_MIN_MS: '10',
            PORTAL_DELAY_MAX_MS: '20',
            CACHE_TTL_STATES: '120',
            CACHE_TTL_COMMISSIONS: '60',
            DEFAULT_PAGE_SIZE: '10',
            MAX_PAGE_SIZE: '50',
            ALERT_TOPIC_ARN: 'arn:aws:sns:ap-south-1:000000000000:test-topic',
            SERVICE_NAME: 'case-search-test',
            SERVICE_VERSION: '2.1.0',
            STAGE: 'prod',
            DEBUG: 'true',
        });

        expect(config).toEqual({
            baseUrl: 'https://portal.test',
            timeoutMs: 5000,
            maxRetries: 0,
            backoffBaseMs: 50,
            backoffFactor: 3,
            backoffMaxMs: 400,
            concurrencyLimit: 2,
            delayMinMs: 10,
            delayMaxMs: 20,
            cacheTtlStatesSeconds: 120,
            cacheTtlCommissionsSeconds: 60,
            defaultPageSize: 10,
            maxPageSize: 50,
            alertTopicArn: 'arn:aws:sns:ap-south-1:000000000000:test-topic',
            serviceName: 'case-search-test',
            version: '2.1.0',
            stage: 'prod',
            debug: true,
        });
    });

    it('falls back to defaults for unusable numbers', () => {
        const config = loadConfig({
            PORTAL_TIMEOUT_MS: 'soon',
            PORTAL_MAX_RETRIES: '-1',
            PORTAL_CONCURRENCY_LIMIT: '2.5',
            PORTAL_BACKOFF_FACTOR: '0.5',
        });

        expect(config.timeoutMs).toBe(30000);
        expect(config.maxRetries).toBe(3);
        expect(config.concurrencyLimit).toBe(4);
        expect(config.backoffFactor).toBe(2);
    });

    it('keeps the delay window and page sizes ordered', () => {
        const config = loadConfig({
            PORTAL_DELAY_MIN_MS: '800',
            PORTAL_DELAY_MAX_MS: '100',
            DEFAULT_PAGE_SIZE: '30',
            MAX_PAGE_SIZE: '10',
        });

        expect(config.delayMaxMs).toBe(800);
        expect(config.maxPageSize).toBe(30);
    });

    it('treats blank strings as unset', () => {
        const config = loadConfig({ ALERT_TOPIC_ARN: '  ', STAGE: '', DEBUG: 'no' });

        expect(config.alertTopicArn).toBeUndefined();
        expect(config.stage).toBe('dev');
        expect(config.debug).toBe(false);
    });
});
