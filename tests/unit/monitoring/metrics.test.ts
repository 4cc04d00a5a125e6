import { PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { MetricsEmitter } from '../../../src/monitoring/metrics';
import { createMockLogger } from '../../helpers/logger';

function createEmitter(enabled: boolean = true) {
  const sender = { send: jest.fn().mockResolvedValue({}), destroy: jest.fn() };
  const logger = createMockLogger();
  const emitter = new MetricsEmitter(
    { region: 'us-east-1', namespace: 'Test/Namespace', enabled },
    logger,
    sender
  );
  return { sender, logger, emitter };
}

describe('MetricsEmitter', () => {
  it('should emit tracked activity with the storage dimension', async () => {
    const { sender, emitter } = createEmitter();

    await emitter.emitActivityTracked('DynamoDB');

    const command = sender.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutMetricDataCommand);
    expect(command.input).toEqual({
      Namespace: 'Test/Namespace',
      MetricData: [
        {
          MetricName: 'ActivityTracked',
          Value: 1,
          Unit: StandardUnit.Count,
          Timestamp: expect.any(Date),
          Dimensions: [{ Name: 'Storage', Value: 'DynamoDB' }],
        },
      ],
    });
  });

  it('should emit model latency in milliseconds', async () => {
    const { sender, emitter } = createEmitter();

    await emitter.emitModelLatency(420, 'test-model');

    const [datum] = sender.send.mock.calls[0][0].input.MetricData;
    expect(datum.MetricName).toBe('ModelLatency');
    expect(datum.Value).toBe(420);
    expect(datum.Unit).toBe(StandardUnit.Milliseconds);
    expect(datum.Dimensions).toEqual([{ Name: 'ModelId', Value: 'test-model' }]);
  });

  it('should skip emission when disabled', async () => {
    const { sender, emitter } = createEmitter(false);

    await emitter.emitError('MODEL_BACKEND_ERROR');

    expect(sender.send).not.toHaveBeenCalled();
  });

  it('should log and swallow emission failures', async () => {
    const { sender, logger, emitter } = createEmitter();
    sender.send.mockRejectedValue(new Error('AccessDenied'));

    await expect(emitter.emitError()).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to emit metric',
      { event: 'metric_emission_failed', metricName: 'Errors' },
      expect.any(Error)
    );
  });
});
