/**
 * Tests for Store Error Handler
 *
 * Validates that store failures come back as values with logged context
 */

import { withStoreErrorHandling } from '../../../src/data';
import { createMockLogger } from '../../helpers/logger';

describe('Store Error Handler', () => {
  it('should return the value when the operation succeeds', async () => {
    const logger = createMockLogger();
    const operation = jest.fn().mockResolvedValue(['record']);

    const result = await withStoreErrorHandling(
      operation,
      { operationName: 'queryActivities', sessionId: 'test-session' },
      logger
    );

    expect(result).toEqual({ ok: true, value: ['record'] });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should return a classified failure instead of throwing', async () => {
    const logger = createMockLogger();
    const error = new Error('Requested resource not found');
    error.name = 'ResourceNotFoundException';

    const result = await withStoreErrorHandling(
      () => Promise.reject(error),
      { operationName: 'appendActivity', sessionId: 'test-session', backend: 'DynamoDB' },
      logger
    );

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'StoreUnavailable',
        message: 'Requested resource not found',
        code: 'ResourceNotFoundException',
      },
    });
  });

  it('should log the failure with full context at error level by default', async () => {
    const logger = createMockLogger();

    await withStoreErrorHandling(
      () => Promise.reject(new Error('boom')),
      { operationName: 'appendActivity', sessionId: 'test-session', backend: 'memory' },
      logger
    );

    expect(logger.error).toHaveBeenCalledWith('Store operation failed: appendActivity', {
      sessionId: 'test-session',
      event: 'store_operation_failed',
      operation: 'appendActivity',
      backend: 'memory',
      failureKind: 'Unknown',
      errorCode: 'Error',
      error: 'boom',
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log at warn level when asked to', async () => {
    const logger = createMockLogger();

    await withStoreErrorHandling(
      () => Promise.reject(new Error('boom')),
      { operationName: 'queryActivities', logLevel: 'warn' },
      logger
    );

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });
});
