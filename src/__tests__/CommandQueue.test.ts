import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DetectionSource, Field, OverrideCategory } from '../enums.js';
import { CommandQueue } from '../state/CommandQueue.js';
import { ReconciliationEngine } from '../state/ReconciliationEngine.js';
import { createSnapshot } from '../state/Snapshot.js';
import { MockClient, MockLogger, createMockClient, createMockLogger } from './testUtils.js';

const DEVICE = 'office';

describe('CommandQueue', () => {
  let client: MockClient;
  let logger: MockLogger;
  let engine: ReconciliationEngine;
  let queue: CommandQueue;

  beforeEach(() => {
    client = createMockClient();
    logger = createMockLogger();
    engine = new ReconciliationEngine({}, logger);
    engine.registerDevice(DEVICE);
    queue = new CommandQueue(DEVICE, client, engine, logger, { minRequestDelayMs: 0 });
  });

  it('sends a command in the controller form and resolves with no events', async () => {
    await expect(queue.enqueueCommand({ pow: 'on', mode: 'cool', stemp: '22', f_dir: 'both' })).resolves.toEqual([]);
    expect(client.applySettings).toHaveBeenCalledWith({ pow: '1', mode: '0200', stemp: '22', f_dir: '3d' });
    expect(logger.info).toHaveBeenCalledWith(
      `[CommandQueue][ENQUEUE] ${DEVICE}: {"pow":"on","mode":"cool","stemp":"22","f_dir":"both"}`,
    );
  });

  it('records the intent before the command goes out', async () => {
    const seen: Field[][] = [];
    client.applySettings.mockImplementation(async () => {
      seen.push(engine.pendingIntents(DEVICE, Date.now()).map(intent => intent.field));
      return null;
    });
    await queue.enqueueCommand({ mode: 'heat' });
    expect(seen).toEqual([[Field.Power, Field.HvacMode]]);
  });

  it('checks the command response for external changes', async () => {
    engine.onPoll(DEVICE, createSnapshot({ pow: 'off', mode: 'cool', stemp: '24' }, Date.now()), Date.now());
    client.applySettings.mockResolvedValue({ ret: 'OK', pow: '1', mode: '0200', stemp: '22.0' });

    const events = await queue.enqueueCommand({ pow: 'on' });

    expect(events).toHaveLength(1);
    expect(events[0]?.category).toBe(OverrideCategory.Temperature);
    expect(events[0]?.source).toBe(DetectionSource.CommandTime);
    expect(events[0]?.divergences).toEqual([
      { field: Field.TargetTemperature, expected: '24', actual: '22', source: DetectionSource.CommandTime },
    ]);
    expect(engine.currentConfirmedState(DEVICE).values.pow).toBe('off');
  });

  it('emits executed with the command and its events', async () => {
    const executed = vi.fn();
    queue.on('executed', executed);
    await queue.enqueueCommand({ f_rate: '3' });
    expect(executed).toHaveBeenCalledWith({ command: { f_rate: '3' }, events: [] });
  });

  it('merges a command into one still waiting in the queue', async () => {
    const first = queue.enqueueCommand({ pow: 'on' });
    const second = queue.enqueueCommand({ stemp: '22' });
    const third = queue.enqueueCommand({ f_rate: '3', stemp: '23' });

    expect(queue.length).toBe(1);
    await Promise.all([first, second, third]);

    expect(client.applySettings).toHaveBeenCalledTimes(2);
    expect(client.applySettings).toHaveBeenNthCalledWith(1, { pow: '1' });
    expect(client.applySettings).toHaveBeenNthCalledWith(2, { stemp: '23', f_rate: '0500' });
    await expect(second).resolves.toEqual([]);
  });

  it('keeps the minimum delay between commands', async () => {
    queue = new CommandQueue(DEVICE, client, engine, logger, { minRequestDelayMs: 500 });
    const first = queue.enqueueCommand({ pow: 'on' });
    const second = queue.enqueueCommand({ stemp: '22' });

    await first;
    expect(client.applySettings).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(500);
    await second;
    expect(client.applySettings).toHaveBeenCalledTimes(2);
  });

  it('retries a failed command and then succeeds', async () => {
    client.applySettings.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(null);
    const retry = vi.fn();
    queue.on('retry', retry);

    const promise = queue.enqueueCommand({ pow: 'off' });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toEqual([]);
    expect(client.applySettings).toHaveBeenCalledTimes(2);
    expect(retry).toHaveBeenCalledWith({ command: { pow: 'off' }, retryCount: 2, error: new Error('socket hang up') });
  });

  it('gives up after three attempts', async () => {
    client.applySettings.mockRejectedValue(new Error('socket hang up'));
    const maxRetriesReached = vi.fn();
    queue.on('maxRetriesReached', maxRetriesReached);

    const promise = queue.enqueueCommand({ pow: 'off' });
    const assertion = expect(promise).rejects.toThrow('socket hang up');
    await vi.runAllTimersAsync();
    await assertion;

    expect(client.applySettings).toHaveBeenCalledTimes(3);
    expect(maxRetriesReached).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      `[CommandQueue][FAIL] ${DEVICE}: command failed after 3 attempts: {"pow":"off"}`,
    );
  });

  it('rejects waiting commands on clear', async () => {
    client.applySettings.mockReturnValue(new Promise(() => undefined));
    void queue.enqueueCommand({ pow: 'on' });
    const waiting = queue.enqueueCommand({ stemp: '22' });

    queue.clear();

    await expect(waiting).rejects.toThrow(`Command queue for ${DEVICE} was cleared`);
    expect(queue.length).toBe(0);
  });
});
