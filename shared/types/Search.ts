import { CaseRecord } from './CaseRecord';

export const SEARCH_TYPES = [
    'case_number',
    'complainant',
    'respondent',
    'complainant_advocate',
    'respondent_advocate',
    'industry_type',
    'judge',
] as const;

export type SearchType = (typeof SEARCH_TYPES)[number];

export interface CaseSearchRequest {
    searchType: SearchType;
    state: string;
    commission: string;
    searchValue: string;
    dateFrom?: string; // YYYY-MM-DD
    dateTo?: string; // YYYY-MM-DD
    page: number;
    perPage: number;
}

export interface CaseSearchResult {
    cases: CaseRecord[];
    totalCount: number;
}

// Wire format returned by the case search handlers
export interface CaseSearchResponse {
    cases: CaseRecordResponse[];
    total_count: number;
    page: number;
    per_page: number;
    total_pages: number;
}

export interface CaseRecordResponse {
    case_number: string;
    case_stage: string;
    filing_date: string;
    complainant: string;
    complainant_advocate: string;
    respondent: string;
    respondent_advocate: string;
    document_link: string;
}

export function isSearchType(value: string): value is SearchType {
    return SEARCH_TYPES.some(type => type === value);
}
