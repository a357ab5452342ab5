// jest.setup.ts

// Set NODE_ENV to test for consistent test environment
process.env.NODE_ENV = 'test';

// No alert topic unless a test configures one
delete process.env.ALERT_TOPIC_ARN;

// Mock SNS for testing to avoid actual AWS calls
jest.mock('@aws-sdk/client-sns', () => ({
    SNSClient: jest.fn().mockImplementation(() => ({
        send: jest.fn().mockResolvedValue({ MessageId: 'test-message-id' }),
    })),
    PublishCommand: jest.fn(),
}));
