/**
 * Tests for CaseSearchProcessor
 */
import { CaseSearchRequest } from '../../../shared/types';
import CaseSearchProcessor, { buildSearchForm, estimateTotalCount, SEARCH_PATH } from '../CaseSearchProcessor';
import IdentityResolver, { DirectorySource } from '../IdentityResolver';
import { InvalidSearchError, NotFoundError } from '../PortalErrors';
import { createMockLogger, MockLogger } from './support/logger';
import { createTestTransport, htmlResponse, TEST_BASE_URL } from './support/transport';

const RESULTS_HTML = `
    <div class="results-summary">2 records found</div>
    <table id="caseSearchResults">
        <thead>
            <tr><th>Case</th><th>Stage</th><th>Filed</th><th>Complainant</th><th>Advocate</th>
                <th>Respondent</th><th>Advocate</th><th>Order</th></tr>
        </thead>
        <tbody>
            <tr><td>CC/1/2023</td><td>Admitted</td><td>10/01/2023</td><td>Meera Das</td><td>P. Kumar</td>
                <td>Zenith Appliances</td><td>L. Shah</td><td><a href="/orders/cc-1-2023.pdf">Order</a></td></tr>
            <tr><td>CC/1/2023-A</td><td>Disposed</td><td>11-01-2023</td><td>Meera Das</td><td></td>
                <td>Zenith Service Centre</td><td></td><td></td></tr>
        </tbody>
    </table>`;

function resultsPage(rowCount: number): string {
    const rows = Array.from(
        { length: rowCount },
        (_, index) =>
            `<tr><td>CC/${index + 1}/2023</td><td>Pending</td><td>01/02/2023</td><td>A</td><td>B</td><td>C</td><td>D</td></tr>`
    ).join('');
    return `<table id="caseSearchResults">${rows}</table>`;
}

const baseRequest: CaseSearchRequest = {
    searchType: 'case_number',
    state: 'KARNATAKA',
    commission: 'District X',
    searchValue: 'CC/1/2023',
    page: 1,
    perPage: 20,
};

describe('estimateTotalCount', () => {
    it('assumes another page after a full page', () => {
        expect(estimateTotalCount(10, 1, 10)).toBe(11);
    });

    it('counts exactly on a short page', () => {
        expect(estimateTotalCount(3, 2, 10)).toBe(13);
        expect(estimateTotalCount(0, 1, 10)).toBe(0);
    });
});

describe('buildSearchForm', () => {
    it('adds the fixed constraints and the field for the search type', () => {
        const form = buildSearchForm(
            { ...baseRequest, searchType: 'respondent_advocate', dateFrom: '2023-01-05', dateTo: '2023-02-28' },
            '11',
            '501'
        );

        expect(Object.fromEntries(form)).toEqual({
            state_id: '11',
            commission_id: '501',
            commission_type: 'DCDRC',
            order_type: 'daily_orders',
            date_type: 'filing_date',
            search_by: 'respondent_advocate_name',
            search_value: 'CC/1/2023',
            from_date: '05/01/2023',
            to_date: '28/02/2023',
            page: '1',
            per_page: '20',
        });
    });

    it('leaves out dates that were not given', () => {
        const form = buildSearchForm(baseRequest, '11', '501');

        expect(form.has('from_date')).toBe(false);
        expect(form.has('to_date')).toBe(false);
    });
});

describe('CaseSearchProcessor', () => {
    let request: jest.Mock;
    let directory: { [K in keyof DirectorySource]: jest.Mock };
    let logger: MockLogger;
    let parseLogger: MockLogger;
    let processor: CaseSearchProcessor;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => {});

        request = jest.fn();
        directory = {
            fetchStates: jest.fn().mockResolvedValue([{ stateText: 'KARNATAKA', stateId: '11' }]),
            fetchCommissions: jest
                .fn()
                .mockResolvedValue([{ commissionText: 'District X', commissionId: '501', stateId: '11' }]),
        };
        logger = createMockLogger();
        parseLogger = createMockLogger();

        const transport = createTestTransport(request);
        processor = new CaseSearchProcessor(
            new IdentityResolver(directory, logger),
            transport,
            TEST_BASE_URL,
            logger,
            parseLogger
        );
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('returns the parsed rows and the summary total for a case number search', async () => {
        request.mockResolvedValueOnce(htmlResponse(RESULTS_HTML));

        const result = await processor.search(baseRequest);

        expect(result.totalCount).toBe(2);
        expect(result.cases).toEqual([
            {
                caseNumber: 'CC/1/2023',
                caseStage: 'Admitted',
                filingDate: '2023-01-10',
                complainant: 'Meera Das',
                complainantAdvocate: 'P. Kumar',
                respondent: 'Zenith Appliances',
                respondentAdvocate: 'L. Shah',
                documentLink: 'https://portal.test/orders/cc-1-2023.pdf',
            },
            {
                caseNumber: 'CC/1/2023-A',
                caseStage: 'Disposed',
                filingDate: '2023-01-11',
                complainant: 'Meera Das',
                complainantAdvocate: '',
                respondent: 'Zenith Service Centre',
                respondentAdvocate: '',
                documentLink: '',
            },
        ]);

        const [config] = request.mock.calls[0];
        expect(config).toMatchObject({ method: 'POST', url: `${TEST_BASE_URL}${SEARCH_PATH}` });
        expect(new URLSearchParams(config.data).get('search_by')).toBe('case_no');
        expect(new URLSearchParams(config.data).get('commission_id')).toBe('501');
    });

    it('estimates the total when the page has no summary', async () => {
        request.mockResolvedValueOnce(htmlResponse(resultsPage(10)));

        const result = await processor.search({ ...baseRequest, perPage: 10 });

        expect(result.cases).toHaveLength(10);
        expect(result.totalCount).toBe(11);
    });

    it('counts the rows of a short later page', async () => {
        request.mockResolvedValueOnce(htmlResponse(resultsPage(3)));

        const result = await processor.search({ ...baseRequest, page: 2, perPage: 10 });

        expect(result.totalCount).toBe(13);
    });

    it('reports dropped rows without failing the search', async () => {
        request.mockResolvedValueOnce(
            htmlResponse(resultsPage(1).replace('</table>', '<tr><td>broken</td></tr></table>'))
        );

        const result = await processor.search(baseRequest);

        expect(result.cases).toHaveLength(1);
        expect(logger.warn).not.toHaveBeenCalled();
        expect(parseLogger.warn).toHaveBeenCalledWith(
            'Dropped 1 malformed result rows',
            expect.objectContaining({ code: 'parse_failure', rowIndex: 1 }),
            { searchType: 'case_number', page: 1, rows: [1] }
        );
    });

    it('rejects an unknown commission before searching', async () => {
        await expect(processor.search({ ...baseRequest, commission: 'Nowhere' })).rejects.toBeInstanceOf(
            NotFoundError
        );
        expect(request).not.toHaveBeenCalled();
    });

    it('validates dates before touching the portal', async () => {
        await expect(processor.search({ ...baseRequest, dateFrom: '2023-02-30' })).rejects.toMatchObject({
            field: 'dateFrom',
        });
        await expect(
            processor.search({ ...baseRequest, dateFrom: '2023-03-01', dateTo: '2023-02-01' })
        ).rejects.toBeInstanceOf(InvalidSearchError);
        expect(directory.fetchStates).not.toHaveBeenCalled();
    });

    it('rejects a non-positive page', async () => {
        await expect(processor.search({ ...baseRequest, page: 0 })).rejects.toMatchObject({
            code: 'invalid_search',
            field: 'page',
        });
    });
});
