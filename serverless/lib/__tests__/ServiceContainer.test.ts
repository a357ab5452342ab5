import AlertService from '../AlertService';
import { DEFAULT_CONFIG, PortalConfig } from '../Config';
import ServiceContainer from '../ServiceContainer';

const STATES_HTML = '<select id="stateId"><option value="11">KARNATAKA</option></select>';
const COMMISSIONS_HTML = '<select id="commissionId"><option value="501">District X</option></select>';

const config: PortalConfig = {
    ...DEFAULT_CONFIG,
    baseUrl: 'https://portal.test',
    maxRetries: 0,
    delayMinMs: 0,
    delayMaxMs: 0,
    cacheTtlStatesSeconds: 100,
    cacheTtlCommissionsSeconds: 10,
};

describe('ServiceContainer', () => {
    let clock: number;
    let request: jest.Mock;
    let container: ServiceContainer;

    beforeEach(() => {
        clock = 0;
        request = jest.fn(async (options: { url: string }) => ({
            status: 200,
            data: options.url.endsWith('/commissions') ? COMMISSIONS_HTML : STATES_HTML,
        }));
        container = new ServiceContainer(config, {
            client: { request },
            sleep: async () => {},
            now: () => clock,
            alertService: new AlertService({ stage: 'test' }),
        });
        jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('wires the client through to the shared transport and caches', async () => {
        await expect(container.client.resolveStateAndCommissionIds('karnataka', 'district x')).resolves.toEqual({
            stateId: '11',
            commissionId: '501',
        });
        await container.client.fetchStates();

        expect(request).toHaveBeenCalledTimes(2);
        expect(container.gate.limit).toBe(DEFAULT_CONFIG.concurrencyLimit);
    });

    it('sweeps expired entries on maintenance', async () => {
        await container.client.resolveStateAndCommissionIds('KARNATAKA', 'District X');
        clock += 11_000;

        expect(container.sweep()).toEqual({
            removed: 1,
            states: { totalEntries: 1, activeEntries: 1, expiredEntries: 0 },
            commissions: { totalEntries: 0, activeEntries: 0, expiredEntries: 0 },
            gate: { limit: 4, active: 0, waiting: 0 },
        });
    });

    it('reports portal calls in flight', async () => {
        let respond: () => void = () => {};
        request.mockImplementationOnce(
            () =>
                new Promise(resolve => {
                    respond = () => resolve({ status: 200, data: STATES_HTML });
                })
        );

        const pending = container.client.fetchStates();
        await new Promise(resolve => setImmediate(resolve));

        expect(container.sweep().gate).toEqual({ limit: 4, active: 1, waiting: 0 });

        respond();
        await pending;
        expect(container.sweep().gate).toEqual({ limit: 4, active: 0, waiting: 0 });
    });

    it('clears both caches', async () => {
        await container.client.fetchStates();
        container.clearCaches();
        await container.client.fetchStates();

        expect(request).toHaveBeenCalledTimes(2);
    });
});
