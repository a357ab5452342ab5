import { CaseSearchRequest, CaseSearchResult, CommissionInfo, ResolvedIds, StateInfo } from '../../shared/types';
import CaseSearchProcessor, { CaseSearchOptions } from './CaseSearchProcessor';
import IdentityResolver from './IdentityResolver';
import PortalDirectory from './PortalDirectory';

/**
 * The four operations the API handlers call. Every method may reject with a PortalError:
 * CaptchaRequiredError, PortalTimeoutError, TransportFailureError or NotFoundError.
 */
export interface PortalClient {
    fetchStates(): Promise<StateInfo[]>;
    fetchCommissions(stateId: string): Promise<CommissionInfo[]>;
    searchCases(request: CaseSearchRequest, options?: CaseSearchOptions): Promise<CaseSearchResult>;
    resolveStateAndCommissionIds(stateText: string, commissionText: string): Promise<ResolvedIds>;
}

export class CommissionPortalClient implements PortalClient {
    constructor(
        private readonly directory: PortalDirectory,
        private readonly resolver: IdentityResolver,
        private readonly processor: CaseSearchProcessor
    ) {}

    fetchStates(): Promise<StateInfo[]> {
        return this.directory.fetchStates();
    }

    fetchCommissions(stateId: string): Promise<CommissionInfo[]> {
        return this.directory.fetchCommissions(stateId);
    }

    searchCases(request: CaseSearchRequest, options?: CaseSearchOptions): Promise<CaseSearchResult> {
        return this.processor.search(request, options);
    }

    resolveStateAndCommissionIds(stateText: string, commissionText: string): Promise<ResolvedIds> {
        return this.resolver.resolve(stateText, commissionText);
    }
}

export default CommissionPortalClient;
