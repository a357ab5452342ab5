/**
 * Turns portal HTML into typed records.
 *
 * Column positions live only here (CASE_COLUMNS), so a layout change on the portal touches
 * this module and nothing else. A malformed row is dropped and handed back to the caller to
 * report; it never aborts the rest of the page.
 */
import * as cheerio from 'cheerio';
import { CaseRecord, CommissionInfo, StateInfo } from '../../shared/types';
import { formatIsoDate, parseDayFirstDate } from '../../shared/DateTimeUtils';
import { ParseFailureError } from './PortalErrors';

type CaseTextField = Exclude<keyof CaseRecord, 'documentLink'>;

// Position of each text field in a result row; the last cell also carries the document link
export const CASE_COLUMNS: Readonly<Record<CaseTextField, number>> = {
    caseNumber: 0,
    caseStage: 1,
    filingDate: 2,
    complainant: 3,
    complainantAdvocate: 4,
    respondent: 5,
    respondentAdvocate: 6,
};

const MIN_CELLS = Object.keys(CASE_COLUMNS).length;

const RESULT_TABLE_SELECTOR = 'table#caseSearchResults, table.case-results';
const SUMMARY_SELECTOR = '#totalRecords, .total-records, .results-summary';
const STATE_SELECT_SELECTOR = 'select#stateId, select[name="state_id"]';
const COMMISSION_SELECT_SELECTOR = 'select#commissionId, select[name="commission_id"]';

export interface ParsedCaseRows {
    cases: CaseRecord[];
    failures: ParseFailureError[];
}

function cleanText(value: string): string {
    return value.replace(/\s+/g, ' ').trim();
}

/**
 * ISO date when the portal text parses as a day-first date, otherwise the trimmed text
 */
export function normalizeFilingDate(raw: string): string {
    const trimmed = raw.trim();
    const parsed = parseDayFirstDate(trimmed);
    return parsed ? formatIsoDate(parsed) : trimmed;
}

/**
 * Absolute document URL, or '' when there is nothing usable to link to
 */
export function resolveDocumentLink(href: string | null | undefined, baseUrl: string): string {
    const trimmed = href?.trim() ?? '';
    if (!trimmed) {
        return '';
    }

    if (/^https?:\/\//i.test(trimmed)) {
        return trimmed;
    }

    try {
        const resolved = new URL(trimmed, `${baseUrl}/`);
        return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : '';
    } catch {
        return '';
    }
}

export function parseCaseRows(html: string, baseUrl: string): ParsedCaseRows {
    const $ = cheerio.load(html);
    const cases: CaseRecord[] = [];
    const failures: ParseFailureError[] = [];

    // Unmarked pages fall back to the first table whose header row spans every case column
    let resultTable = $(RESULT_TABLE_SELECTOR).first();
    if (resultTable.length === 0) {
        resultTable = $('table')
            .filter((_, table) => $(table).find('tr').first().children('th').length >= MIN_CELLS)
            .first();
    }
    const rows = resultTable.find('tr');

    rows.each((rowIndex, row) => {
        const cells = $(row).children('td');

        // Header rows carry th cells only
        if (cells.length === 0) {
            return;
        }

        if (cells.length < MIN_CELLS) {
            const failure = new ParseFailureError(
                `Row ${rowIndex} has ${cells.length} cells, expected at least ${MIN_CELLS}`,
                rowIndex
            );
            failures.push(failure);
            return;
        }

        const cell = (field: CaseTextField): string => cleanText(cells.eq(CASE_COLUMNS[field]).text());
        const href = cells.last().find('a[href]').first().attr('href');

        cases.push({
            caseNumber: cell('caseNumber'),
            caseStage: cell('caseStage'),
            filingDate: normalizeFilingDate(cell('filingDate')),
            complainant: cell('complainant'),
            complainantAdvocate: cell('complainantAdvocate'),
            respondent: cell('respondent'),
            respondentAdvocate: cell('respondentAdvocate'),
            documentLink: resolveDocumentLink(href, baseUrl),
        });
    });

    return { cases, failures };
}

/**
 * First integer in the on-page result summary, or null when the page shows none
 */
export function extractTotalCount(html: string): number | null {
    const $ = cheerio.load(html);
    const summary = cleanText($(SUMMARY_SELECTOR).first().text());

    const match = summary.match(/\d[\d,]*/);
    if (!match) {
        return null;
    }

    const total = parseInt(match[0].replace(/,/g, ''), 10);
    return Number.isNaN(total) ? null : total;
}

/**
 * Options of the named dropdown, or of every dropdown when the markup is a bare option list
 */
function parseOptions(html: string, selectSelector: string): Array<{ text: string; value: string }> {
    const $ = cheerio.load(html);
    const options: Array<{ text: string; value: string }> = [];

    const select = $(selectSelector).first();
    const optionElements = select.length > 0 ? select.find('option') : $('option');

    optionElements.each((_, option) => {
        const value = ($(option).attr('value') ?? '').trim();
        const text = cleanText($(option).text());
        // Placeholder entries ("Select State") have no value
        if (value && text) {
            options.push({ text, value });
        }
    });

    return options;
}

export function parseStateOptions(html: string): StateInfo[] {
    return parseOptions(html, STATE_SELECT_SELECTOR).map(option => ({
        stateText: option.text,
        stateId: option.value,
    }));
}

export function parseCommissionOptions(html: string, stateId: string): CommissionInfo[] {
    return parseOptions(html, COMMISSION_SELECT_SELECTOR).map(option => ({
        commissionText: option.text,
        commissionId: option.value,
        stateId,
    }));
}
