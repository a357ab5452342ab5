/**
 * Maps free-text state and commission names to the portal's internal IDs.
 *
 * Matching is two-tier and deterministic:
 * 1. exact, case-insensitive name match
 * 2. otherwise the first name (in portal order) that contains the query, or is contained by it
 *
 * There is no edit-distance scoring. When neither tier matches, NotFoundError carries every
 * known name so callers can offer suggestions.
 */
import { CommissionInfo, ResolvedIds, StateInfo } from '../../shared/types';
import { CategoryLogger } from './AlertService';
import { NotFoundError } from './PortalErrors';

export interface DirectorySource {
    fetchStates(): Promise<StateInfo[]>;
    fetchCommissions(stateId: string): Promise<CommissionInfo[]>;
}

function normalizeName(value: string): string {
    return value.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * Exact match first, then substring match in either direction; undefined when neither hits
 */
export function matchByName<T>(items: T[], query: string, nameOf: (item: T) => string): T | undefined {
    const needle = normalizeName(query);
    if (!needle) {
        return undefined;
    }

    const exact = items.find(item => normalizeName(nameOf(item)) === needle);
    if (exact) {
        return exact;
    }

    return items.find(item => {
        const name = normalizeName(nameOf(item));
        return name.length > 0 && (name.includes(needle) || needle.includes(name));
    });
}

export class IdentityResolver {
    constructor(
        private readonly directory: DirectorySource,
        private readonly logger: CategoryLogger
    ) {}

    async resolveState(stateText: string): Promise<StateInfo> {
        const states = await this.directory.fetchStates();
        const state = matchByName(states, stateText, item => item.stateText);

        if (!state) {
            throw new NotFoundError(
                'state',
                stateText,
                states.map(item => item.stateText)
            );
        }

        return state;
    }

    async resolveCommission(stateId: string, commissionText: string): Promise<CommissionInfo> {
        const commissions = await this.directory.fetchCommissions(stateId);
        const commission = matchByName(commissions, commissionText, item => item.commissionText);

        if (!commission) {
            throw new NotFoundError(
                'commission',
                commissionText,
                commissions.map(item => item.commissionText)
            );
        }

        return commission;
    }

    async resolve(stateText: string, commissionText: string): Promise<ResolvedIds> {
        await this.logger.info(`Resolving IDs for state='${stateText}', commission='${commissionText}'`);

        const state = await this.resolveState(stateText);
        const commission = await this.resolveCommission(state.stateId, commissionText);

        return {
            stateId: state.stateId,
            commissionId: commission.commissionId,
        };
    }
}

export default IdentityResolver;
