import { CaseSearchRequest, CaseSearchResult, SearchType, isSearchType } from '../../shared/types';
import { formatDayFirstDate, parseIsoDate } from '../../shared/DateTimeUtils';
import { CategoryLogger } from './AlertService';
import { IdentityResolver } from './IdentityResolver';
import { InvalidSearchError } from './PortalErrors';
import ResilientTransport from './ResilientTransport';
import { extractTotalCount, parseCaseRows } from './ResultNormalizer';

export const SEARCH_PATH = '/advance-case-search';

// Portal form field searched for each search type
export const SEARCH_FIELDS: Readonly<Record<SearchType, string>> = {
    case_number: 'case_no',
    complainant: 'complainant_name',
    respondent: 'respondent_name',
    complainant_advocate: 'complainant_advocate_name',
    respondent_advocate: 'respondent_advocate_name',
    industry_type: 'industry_type',
    judge: 'judge_name',
};

// The search endpoint serves every commission tier and order type through one form;
// this service only ever searches district commissions' daily orders by filing date.
export const FIXED_SEARCH_CONSTRAINTS: Readonly<Record<string, string>> = {
    commission_type: 'DCDRC',
    order_type: 'daily_orders',
    date_type: 'filing_date',
};

export interface CaseSearchOptions {
    budgetMs?: number;
}

/**
 * Total for the page: the portal's own count when it shows one, otherwise an estimate.
 * A full page suggests at least one more result beyond it.
 */
export function estimateTotalCount(rowCount: number, page: number, perPage: number): number {
    if (rowCount === perPage) {
        return perPage * page + 1;
    }
    return rowCount + perPage * (page - 1);
}

function toPortalDate(value: string | undefined, field: string): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const date = parseIsoDate(value);
    if (!date) {
        throw new InvalidSearchError(`${field} must be a YYYY-MM-DD date`, field);
    }
    return formatDayFirstDate(date);
}

export function buildSearchForm(request: CaseSearchRequest, stateId: string, commissionId: string): URLSearchParams {
    const form = new URLSearchParams();
    form.append('state_id', stateId);
    form.append('commission_id', commissionId);

    for (const [field, value] of Object.entries(FIXED_SEARCH_CONSTRAINTS)) {
        form.append(field, value);
    }

    form.append('search_by', SEARCH_FIELDS[request.searchType]);
    form.append('search_value', request.searchValue);

    const fromDate = toPortalDate(request.dateFrom, 'dateFrom');
    const toDate = toPortalDate(request.dateTo, 'dateTo');
    if (fromDate) form.append('from_date', fromDate);
    if (toDate) form.append('to_date', toDate);

    form.append('page', String(request.page));
    form.append('per_page', String(request.perPage));

    return form;
}

function validateRequest(request: CaseSearchRequest): void {
    if (!isSearchType(request.searchType)) {
        throw new InvalidSearchError(`Unsupported search type '${request.searchType}'`, 'searchType');
    }
    if (!Number.isInteger(request.page) || request.page < 1) {
        throw new InvalidSearchError('page must be a positive integer', 'page');
    }
    if (!Number.isInteger(request.perPage) || request.perPage < 1) {
        throw new InvalidSearchError('perPage must be a positive integer', 'perPage');
    }

    toPortalDate(request.dateFrom, 'dateFrom');
    toPortalDate(request.dateTo, 'dateTo');
    // Valid YYYY-MM-DD strings order lexically
    if (request.dateFrom && request.dateTo && request.dateTo < request.dateFrom) {
        throw new InvalidSearchError('dateTo must be on or after dateFrom', 'dateTo');
    }
}

export class CaseSearchProcessor {
    constructor(
        private readonly resolver: IdentityResolver,
        private readonly transport: ResilientTransport,
        private readonly baseUrl: string,
        private readonly logger: CategoryLogger,
        private readonly parseLogger: CategoryLogger
    ) {}

    async search(request: CaseSearchRequest, options: CaseSearchOptions = {}): Promise<CaseSearchResult> {
        validateRequest(request);

        await this.logger.info(
            `Searching cases: type=${request.searchType}, state=${request.state}, ` +
                `commission=${request.commission}, value=${request.searchValue}, page=${request.page}`
        );

        const { stateId, commissionId } = await this.resolver.resolve(request.state, request.commission);
        const form = buildSearchForm(request, stateId, commissionId);

        const html = await this.transport.post(SEARCH_PATH, form, { budgetMs: options.budgetMs });
        const { cases, failures } = parseCaseRows(html, this.baseUrl);

        if (failures.length > 0) {
            await this.parseLogger.warn(`Dropped ${failures.length} malformed result rows`, failures[0], {
                searchType: request.searchType,
                page: request.page,
                rows: failures.map(failure => failure.rowIndex),
            });
        }

        const totalCount = extractTotalCount(html) ?? estimateTotalCount(cases.length, request.page, request.perPage);

        console.log(`Search returned ${cases.length} cases (total ${totalCount}) for page ${request.page}`);

        return { cases, totalCount };
    }
}

export default CaseSearchProcessor;
