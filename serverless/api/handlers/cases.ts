import { CaseRecord, CaseRecordResponse, CaseSearchRequest, CaseSearchResponse, SearchType } from '../../../shared/types';
import { successResponse, portalErrorResponse } from '../../lib/apiResponse';
import { CaseSearchOptions } from '../../lib/CaseSearchProcessor';
import { PortalClient } from '../../lib/CommissionPortalClient';
import { PortalConfig } from '../../lib/Config';
import { InvalidSearchError } from '../../lib/PortalErrors';
import { Handler, HandlerContext, HandlerEvent } from './types';

// Time kept back from the Lambda deadline to build and return the response
export const RESPONSE_RESERVE_MS = 1000;

export type PageSettings = Pick<PortalConfig, 'defaultPageSize' | 'maxPageSize'>;

export interface CaseHandlers {
    searchByCaseNumber: Handler;
    searchByComplainant: Handler;
    searchByRespondent: Handler;
    searchByComplainantAdvocate: Handler;
    searchByRespondentAdvocate: Handler;
    searchByIndustryType: Handler;
    searchByJudge: Handler;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(body: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        throw new InvalidSearchError('Request body must be valid JSON');
    }

    if (!isRecord(parsed)) {
        throw new InvalidSearchError('Request body must be a JSON object');
    }
    return parsed;
}

function requiredString(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidSearchError(`${field} is required`, field);
    }
    return value.trim();
}

function optionalDate(body: Record<string, unknown>, field: string): string | undefined {
    const value = body[field];
    if (value === undefined || value === null || value === '') {
        return undefined;
    }
    if (typeof value !== 'string' || !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        throw new InvalidSearchError(`${field} must be a YYYY-MM-DD date`, field);
    }
    return value;
}

function optionalInteger(body: Record<string, unknown>, field: string, fallback: number): number {
    const value = body[field];
    if (value === undefined || value === null || value === '') {
        return fallback;
    }

    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
        throw new InvalidSearchError(`${field} must be an integer`, field);
    }
    return parsed;
}

/**
 * Search parameters from the JSON body of a POST, or from the query string of a GET
 */
function searchParameters(event: HandlerEvent): Record<string, unknown> {
    if (event.body) {
        return parseBody(event.body);
    }
    return event.queryStringParameters ?? {};
}

export function parseSearchRequest(
    searchType: SearchType,
    event: HandlerEvent,
    settings: PageSettings
): CaseSearchRequest {
    const body = searchParameters(event);

    const page = optionalInteger(body, 'page', 1);
    if (page < 1) {
        throw new InvalidSearchError('page must be at least 1', 'page');
    }

    const perPage = optionalInteger(body, 'per_page', settings.defaultPageSize);
    if (perPage < 1 || perPage > settings.maxPageSize) {
        throw new InvalidSearchError(`per_page must be between 1 and ${settings.maxPageSize}`, 'per_page');
    }

    const dateFrom = optionalDate(body, 'date_from');
    const dateTo = optionalDate(body, 'date_to');
    if (dateFrom && dateTo && dateTo < dateFrom) {
        throw new InvalidSearchError('date_to must be on or after date_from', 'date_to');
    }

    return {
        searchType,
        state: requiredString(body, 'state'),
        commission: requiredString(body, 'commission'),
        searchValue: requiredString(body, 'search_value'),
        dateFrom,
        dateTo,
        page,
        perPage,
    };
}

/**
 * The caller budget for one search: whatever the Lambda has left, minus the response reserve
 */
export function searchOptions(context?: HandlerContext): CaseSearchOptions {
    if (!context) {
        return {};
    }
    return { budgetMs: Math.max(0, context.getRemainingTimeInMillis() - RESPONSE_RESERVE_MS) };
}

export function toCaseRecordResponse(record: CaseRecord): CaseRecordResponse {
    return {
        case_number: record.caseNumber,
        case_stage: record.caseStage,
        filing_date: record.filingDate,
        complainant: record.complainant,
        complainant_advocate: record.complainantAdvocate,
        respondent: record.respondent,
        respondent_advocate: record.respondentAdvocate,
        document_link: record.documentLink,
    };
}

export function createCaseHandlers(client: PortalClient, settings: PageSettings): CaseHandlers {
    const searchHandler =
        (searchType: SearchType): Handler =>
        async (event, context) => {
            try {
                const request = parseSearchRequest(searchType, event, settings);
                const result = await client.searchCases(request, searchOptions(context));

                const response: CaseSearchResponse = {
                    cases: result.cases.map(toCaseRecordResponse),
                    total_count: result.totalCount,
                    page: request.page,
                    per_page: request.perPage,
                    total_pages: Math.ceil(result.totalCount / request.perPage),
                };
                return successResponse(response);
            } catch (error) {
                console.error(`Error in ${searchType} search handler:`, error);
                return portalErrorResponse(error);
            }
        };

    return {
        searchByCaseNumber: searchHandler('case_number'),
        searchByComplainant: searchHandler('complainant'),
        searchByRespondent: searchHandler('respondent'),
        searchByComplainantAdvocate: searchHandler('complainant_advocate'),
        searchByRespondentAdvocate: searchHandler('respondent_advocate'),
        searchByIndustryType: searchHandler('industry_type'),
        searchByJudge: searchHandler('judge'),
    };
}
