import dotenv from 'dotenv';

// Load test environment variables
dotenv.config({ path: '.env.test' });

// Set test timeouts
jest.setTimeout(10000);

// Mock New Relic to avoid requiring a specific Node version and agent init
jest.mock('newrelic', () => ({
  recordMetric: jest.fn(),
  noticeError: jest.fn(),
  addCustomAttribute: jest.fn(),
  incrementMetric: jest.fn(),
}));

// Mock logger in tests to reduce noise; each createLogger call gets its own spies
jest.mock('../src/utils/logger', () => {
  const mockLogger = () => ({
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    trace: jest.fn(),
    fatal: jest.fn(),
  });
  return {
    logger: mockLogger(),
    createLogger: jest.fn(() => mockLogger()),
    setLogLevel: jest.fn(),
  };
});

// Hardware bindings are native; no test touches real GPIO or a real PLC
jest.mock('onoff', () => ({ Gpio: jest.fn() }));
jest.mock('node-snap7', () => ({ S7Client: jest.fn() }));
