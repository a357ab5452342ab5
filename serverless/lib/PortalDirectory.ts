/**
 * Cache-backed access to the portal's state and commission lists.
 *
 * Both lists change rarely, so they are held in TTL caches. Concurrent misses for the same
 * key share a single in-flight fetch; a failed fetch is never cached, and an empty list counts
 * as a failed fetch.
 */
import { CommissionInfo, StateInfo } from '../../shared/types';
import { CategoryLogger } from './AlertService';
import { PortalConfig } from './Config';
import { EmptyListingError } from './PortalErrors';
import ResilientTransport from './ResilientTransport';
import { parseCommissionOptions, parseStateOptions } from './ResultNormalizer';
import TtlCache from './TtlCache';

export const STATES_PATH = '/advance-case-search';
export const COMMISSIONS_PATH = '/advance-case-search/commissions';

export const STATES_CACHE_KEY = 'portal:states';
export const COMMISSIONS_CACHE_KEY_PREFIX = 'portal:commissions:';

export type DirectorySettings = Pick<PortalConfig, 'cacheTtlStatesSeconds' | 'cacheTtlCommissionsSeconds'>;

export interface DirectoryCaches {
    states: TtlCache<StateInfo[]>;
    commissions: TtlCache<CommissionInfo[]>;
}

/**
 * Read-through loader over one cache that collapses concurrent misses per key
 */
export class SingleFlightLoader<T> {
    private readonly inFlight = new Map<string, Promise<T>>();

    constructor(
        private readonly cache: TtlCache<T>,
        private readonly ttlSeconds: number
    ) {}

    get pending(): number {
        return this.inFlight.size;
    }

    async load(key: string, fetcher: () => Promise<T>): Promise<T> {
        const cached = this.cache.get(key);
        if (cached !== undefined) {
            return cached;
        }

        const pending = this.inFlight.get(key);
        if (pending) {
            return pending;
        }

        const request = fetcher()
            .then(value => {
                this.cache.set(key, value, this.ttlSeconds);
                return value;
            })
            .finally(() => {
                this.inFlight.delete(key);
            });

        this.inFlight.set(key, request);
        return request;
    }
}

export class PortalDirectory {
    private readonly states: SingleFlightLoader<StateInfo[]>;
    private readonly commissions: SingleFlightLoader<CommissionInfo[]>;

    constructor(
        private readonly transport: ResilientTransport,
        caches: DirectoryCaches,
        settings: DirectorySettings,
        private readonly logger: CategoryLogger
    ) {
        this.states = new SingleFlightLoader(caches.states, settings.cacheTtlStatesSeconds);
        this.commissions = new SingleFlightLoader(caches.commissions, settings.cacheTtlCommissionsSeconds);
    }

    fetchStates(): Promise<StateInfo[]> {
        return this.states.load(STATES_CACHE_KEY, async () => {
            const html = await this.transport.get(STATES_PATH);
            const states = parseStateOptions(html);
            if (states.length === 0) {
                const error = new EmptyListingError('states');
                await this.logger.warn('Portal returned no states', error);
                throw error;
            }
            await this.logger.info(`Fetched ${states.length} states from portal`);
            return states;
        });
    }

    fetchCommissions(stateId: string): Promise<CommissionInfo[]> {
        return this.commissions.load(`${COMMISSIONS_CACHE_KEY_PREFIX}${stateId}`, async () => {
            const html = await this.transport.get(COMMISSIONS_PATH, { params: { state_id: stateId } });
            const commissions = parseCommissionOptions(html, stateId);
            if (commissions.length === 0) {
                const error = new EmptyListingError('commissions', stateId);
                await this.logger.warn('Portal returned no commissions', error, { stateId });
                throw error;
            }
            await this.logger.info(`Fetched ${commissions.length} commissions from portal`, { stateId });
            return commissions;
        });
    }
}

export default PortalDirectory;
