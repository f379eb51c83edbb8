import { describe, test, expect, jest, afterEach } from '@jest/globals';
import { createConsoleLogger } from '../../src/observability/index.js';

describe('createConsoleLogger()', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should tag lines with level and module', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => {});
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createConsoleLogger('orchestrator');
    logger.info('Dispatching query', { queryId: 'q_1' });
    logger.warn('Slow service');

    expect(log).toHaveBeenCalledWith('[INFO] [orchestrator] Dispatching query', '{"queryId":"q_1"}');
    expect(warn).toHaveBeenCalledWith('[WARN] [orchestrator] Slow service', '');
  });
});
