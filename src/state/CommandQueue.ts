import { EventEmitter } from 'events';
import { DeviceClient } from '../DeviceClient.js';
import { SnapshotOrigin } from '../enums.js';
import { EngineLogger } from '../logger.js';
import { RawDeviceSettings, normalizeSettings, toDeviceSettings } from '../normalize.js';
import { DEFAULT_MIN_REQUEST_DELAY_MS } from '../settings.js';
import { toError } from '../utils.js';
import { OverrideEvent, ReconciliationEngine } from './ReconciliationEngine.js';
import { SettingsMap, createSnapshot } from './Snapshot.js';

type Command = SettingsMap;

interface Waiter {
  resolve: (events: OverrideEvent[]) => void;
  reject: (error: Error) => void;
}

interface QueuedCommand {
  command: Command;
  waiters: Waiter[];   // every caller whose command was merged into this one
  enqueuedAt: number;
  attempt: number;
}

// Event payload types
export interface CommandExecutedEvent {
  command: Command;
  events: OverrideEvent[];
}

export interface CommandRetryEvent {
  command: Command;
  retryCount: number;
  error: Error;
}

export interface CommandMaxRetriesReachedEvent {
  command: Command;
  error: Error;
}

const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;
const COMMAND_MERGE_WINDOW_MS = 500;

export interface CommandQueueOptions {
  minRequestDelayMs?: number;
  temperatureStep?: number;
}

/**
 * Serializes the commands of one device. Each send is preceded by recording its intent
 * with the engine, so a poll racing the command is already protected.
 *
 * Emits `executed`, `retry` and `maxRetriesReached`.
 */
export class CommandQueue extends EventEmitter {
  private queue: QueuedCommand[] = [];
  private isProcessing = false;
  private lastSentAt = 0;
  private readonly minRequestDelayMs: number;
  private readonly temperatureStep: number | undefined;

  constructor(
    private readonly deviceId: string,
    private readonly client: DeviceClient,
    private readonly engine: ReconciliationEngine,
    private readonly log: EngineLogger,
    options: CommandQueueOptions = {},
  ) {
    super();
    this.minRequestDelayMs = options.minRequestDelayMs ?? DEFAULT_MIN_REQUEST_DELAY_MS;
    this.temperatureStep = options.temperatureStep;
  }

  get length(): number {
    return this.queue.length;
  }

  /**
   * Queues a command. A command arriving within the merge window of the last waiting one
   * is folded into it, later keys winning.
   * @returns The override events detected from the command's own response, if any.
   */
  public enqueueCommand(command: Command): Promise<OverrideEvent[]> {
    return new Promise((resolve, reject) => {
      const now = Date.now();
      const waiter: Waiter = { resolve, reject };

      const tail = this.queue[this.queue.length - 1];
      if (tail && tail.attempt === 1 && now - tail.enqueuedAt < COMMAND_MERGE_WINDOW_MS) {
        const merged = { ...tail.command, ...command };
        this.log.info(
          `[CommandQueue][MERGE] ${this.deviceId}: ${JSON.stringify(tail.command)} + ${JSON.stringify(command)} → ` +
          `${JSON.stringify(merged)}`,
        );
        tail.command = merged;
        tail.enqueuedAt = now;
        tail.waiters.push(waiter);
        return;
      }

      this.queue.push({ command, waiters: [waiter], enqueuedAt: now, attempt: 1 });
      this.log.info(`[CommandQueue][ENQUEUE] ${this.deviceId}: ${JSON.stringify(command)}`);
      if (!this.isProcessing) {
        this.isProcessing = true;
        this.run();
      }
    });
  }

  /** Rejects everything still waiting. */
  public clear(): void {
    const pending = this.queue;
    this.queue = [];
    const error = new Error(`Command queue for ${this.deviceId} was cleared`);
    for (const item of pending) {
      item.waiters.forEach(waiter => waiter.reject(error));
    }
  }

  private run(): void {
    this.drain().catch((error: unknown) => {
      this.isProcessing = false;
      this.log.error(`[CommandQueue] ${this.deviceId}: queue processing failed: ${toError(error).message}`);
    });
  }

  private async drain(): Promise<void> {
    for (let item = this.queue.shift(); item; item = this.queue.shift()) {
      const wait = this.lastSentAt === 0 ? 0 : this.minRequestDelayMs - (Date.now() - this.lastSentAt);
      if (wait > 0) {
        this.log.debug(`[CommandQueue] ${this.deviceId}: holding command for ${wait}ms (minRequestDelay).`);
        await new Promise(resolve => setTimeout(resolve, wait));
      }
      if (!(await this.send(item))) {
        return; // a retry is scheduled and resumes draining
      }
    }
    this.isProcessing = false;
  }

  /**
   * Sends one command. Resolves false when the command was put back for another attempt.
   */
  private async send(item: QueuedCommand): Promise<boolean> {
    const { command, attempt } = item;
    this.log.info(`[CommandQueue][TX] ${this.deviceId}: attempt #${attempt} for ${JSON.stringify(command)}`);

    try {
      this.engine.onCommandIssued(this.deviceId, command, Date.now());
      const response = await this.client.applySettings(toDeviceSettings(command));
      this.lastSentAt = Date.now();
      this.log.info(`[CommandQueue][ACK] ${this.deviceId}: ${JSON.stringify(command)}`);

      const events = response ? this.checkResponse(response) : [];
      this.emit('executed', { command, events } satisfies CommandExecutedEvent);
      item.waiters.forEach(waiter => waiter.resolve(events));
      return true;
    } catch (error) {
      const err = toError(error);
      this.log.error(`[CommandQueue][ERROR] ${this.deviceId}: attempt ${attempt} failed for ${JSON.stringify(command)}: ${err.message}`);

      if (attempt < MAX_RETRIES) {
        this.log.info(`[CommandQueue][RETRY#${attempt + 1}] ${this.deviceId}: next attempt in ${RETRY_DELAY_MS}ms.`);
        this.emit('retry', { command, retryCount: attempt + 1, error: err } satisfies CommandRetryEvent);
        this.queue.unshift({ ...item, attempt: attempt + 1 });
        setTimeout(() => this.run(), RETRY_DELAY_MS);
        return false;
      }

      this.log.error(`[CommandQueue][FAIL] ${this.deviceId}: command failed after ${MAX_RETRIES} attempts: ${JSON.stringify(command)}`);
      this.emit('maxRetriesReached', { command, error: err } satisfies CommandMaxRetriesReachedEvent);
      item.waiters.forEach(waiter => waiter.reject(err));
      return true;
    }
  }

  // Controllers that re-read their status after a write give us an early look at the unit
  private checkResponse(response: RawDeviceSettings): OverrideEvent[] {
    const { values } = normalizeSettings(response, { temperatureStep: this.temperatureStep });
    const receivedAt = Date.now();
    return this.engine.onCommandResult(
      this.deviceId,
      createSnapshot(values, receivedAt, SnapshotOrigin.CommandResponse),
      receivedAt,
    );
  }
}
