import { CategoryLogger } from '../../AlertService';

export type MockLogger = { [K in keyof CategoryLogger]: jest.Mock<Promise<void>> };

export function createMockLogger(): MockLogger {
    return {
        info: jest.fn(async () => {}),
        warn: jest.fn(async () => {}),
        error: jest.fn(async () => {}),
    };
}
