import { EventEmitter } from 'events';
import { DeviceClient } from './DeviceClient.js';
import { SnapshotOrigin } from './enums.js';
import { EngineLogger, consoleLogger } from './logger.js';
import { normalizeSettings } from './normalize.js';
import {
  DEFAULT_QUICK_REFRESH_DELAY_MS,
  DEFAULT_UPDATE_INTERVAL_SECONDS,
  DeviceConfig,
  EngineSettings,
} from './settings.js';
import {
  CommandQueue,
  CommandExecutedEvent,
  CommandMaxRetriesReachedEvent,
} from './state/CommandQueue.js';
import { OverrideEvent, ReconciliationEngine } from './state/ReconciliationEngine.js';
import { SettingsSnapshot, SnapshotInput, createSnapshot } from './state/Snapshot.js';
import { toError } from './utils.js';

/**
 * DeviceCoordinator drives the engine for one device: it polls the device, routes commands
 * through a serialized queue, and schedules a confirming poll after each command.
 *
 * Emits `override` (OverrideEvent) for this device and `stateUpdated` (SettingsSnapshot)
 * after every successful poll.
 */
export class DeviceCoordinator extends EventEmitter {
  public readonly deviceId: string;
  private readonly settings: EngineSettings;
  private readonly log: EngineLogger;
  private readonly commandQueue: CommandQueue;
  private readonly ownsRegistration: boolean;

  // Adaptive polling
  private ttl: number;
  private readonly originalTtl: number;
  private consecutiveFailedPolls = 0;
  private isPollingDegraded = false;
  private readonly maxConsecutiveFailedPolls = 4; // e.g., 4 * 30s default interval = 2 minutes
  private readonly degradedTtl = 60000; // 60 seconds
  private readonly quickRefreshDelayMs: number;

  private quickRefreshTimer: NodeJS.Timeout | null = null;
  private pollingTimer: NodeJS.Timeout | null = null;
  private isUpdating = false;
  private running = false;

  private readonly onEngineOverride = (event: OverrideEvent): void => {
    if (event.deviceId === this.deviceId) {
      this.emit('override', event);
    }
  };

  constructor(
    config: DeviceConfig,
    private readonly client: DeviceClient,
    private readonly engine: ReconciliationEngine,
    log?: EngineLogger,
  ) {
    super();
    this.deviceId = config.id;
    this.log = log ?? consoleLogger;

    const updateInterval = config.updateInterval || DEFAULT_UPDATE_INTERVAL_SECONDS;
    this.ownsRegistration = !engine.hasDevice(config.id);
    this.settings = this.ownsRegistration
      ? engine.registerDevice(config.id, { ...config, updateInterval })
      : engine.settingsFor(config.id);

    this.ttl = updateInterval * 1000;
    this.originalTtl = this.ttl;
    this.quickRefreshDelayMs = config.quickRefreshDelay ?? DEFAULT_QUICK_REFRESH_DELAY_MS;

    this.commandQueue = new CommandQueue(config.id, client, engine, this.log, {
      minRequestDelayMs: config.minRequestDelay,
      temperatureStep: this.settings.temperatureStep,
    });
    this.commandQueue.on('executed', (event: CommandExecutedEvent) => {
      this.log.debug(`[DeviceCoordinator] ${this.deviceId}: command executed: ${JSON.stringify(event.command)}. Scheduling quick refresh.`);
      this.scheduleQuickRefresh();
    });
    this.commandQueue.on('maxRetriesReached', (event: CommandMaxRetriesReachedEvent) => {
      this.log.error(`[DeviceCoordinator] ${this.deviceId}: command failed after max retries: ${JSON.stringify(event.command)}, Error: ${event.error.message}`);
    });

    this.engine.on('override', this.onEngineOverride);
  }

  get pollingIntervalMs(): number {
    return this.ttl;
  }

  get pollingDegraded(): boolean {
    return this.isPollingDegraded;
  }

  /**
   * Starts the polling loop with an immediate first poll.
   */
  public start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.updateDeviceState().catch((error: unknown) => {
      this.log.error(`[DeviceCoordinator] ${this.deviceId}: initial poll failed: ${toError(error).message}`);
    });
  }

  /**
   * Polls the device once and feeds the result to the engine.
   * A poll already in flight makes this a no-op.
   */
  public async updateDeviceState(isQuickRefresh = false): Promise<OverrideEvent[]> {
    if (this.isUpdating) {
      this.log.debug(`[DeviceCoordinator] ${this.deviceId}: update already in progress. Skipping.`);
      return [];
    }
    this.isUpdating = true;
    if (this.settings.debug) {
      this.log.debug(`[DeviceCoordinator] ${this.deviceId}: ${isQuickRefresh ? 'performing quick refresh' : 'performing regular state update'}.`);
    }

    let events: OverrideEvent[] = [];
    try {
      const raw = await this.client.fetchSettings();
      if (raw) {
        const normalized = normalizeSettings(raw, { temperatureStep: this.settings.temperatureStep });
        if (normalized.unknownKeys.length > 0 && this.settings.debug) {
          this.log.debug(`[DeviceCoordinator] ${this.deviceId}: ignoring untracked keys ${normalized.unknownKeys.join(', ')}`);
        }
        for (const { field, value } of normalized.rejected) {
          this.log.warn(`[DeviceCoordinator] ${this.deviceId}: could not interpret ${field}="${value}", leaving it out of this poll`);
        }

        const now = Date.now();
        events = this.engine.onPoll(this.deviceId, createSnapshot(normalized.values, now, SnapshotOrigin.Poll), now);
        this.emit('stateUpdated', this.engine.currentConfirmedState(this.deviceId));
        this.recordPollSuccess();
      } else {
        this.log.warn(`[DeviceCoordinator] ${this.deviceId}: failed to get device settings. State not updated.`);
        this.recordPollFailure();
      }
    } catch (error) {
      this.log.error(`[DeviceCoordinator] ${this.deviceId}: error updating device state: ${toError(error).message}`);
      this.recordPollFailure();
    } finally {
      this.isUpdating = false;
      // A quick refresh leaves the regular schedule alone, so it cannot push the confirming poll out
      if (this.running && !(isQuickRefresh && this.pollingTimer)) {
        this.scheduleRefresh();
      }
    }
    return events;
  }

  /**
   * Sends settings to the device through the command queue.
   * Keys outside the tracked fields and values that cannot be interpreted are dropped.
   */
  public applySettings(fields: SnapshotInput): Promise<OverrideEvent[]> {
    const { values: command, rejected } = normalizeSettings(fields, { temperatureStep: this.settings.temperatureStep });
    for (const { field, value } of rejected) {
      this.log.warn(`[DeviceCoordinator] ${this.deviceId}: dropping ${field}="${value}" from command, the value is not understood`);
    }
    if (Object.keys(command).length === 0) {
      this.log.info(`[DeviceCoordinator] ${this.deviceId}: no changes to apply.`);
      return Promise.resolve([]);
    }
    return this.commandQueue.enqueueCommand(command);
  }

  public getConfirmedState(): SettingsSnapshot {
    return this.engine.currentConfirmedState(this.deviceId);
  }

  public getCommandQueue(): CommandQueue {
    return this.commandQueue;
  }

  /**
   * Stops polling, drops listeners and pending commands, and releases the device.
   */
  public cleanup(): void {
    this.running = false;
    if (this.quickRefreshTimer) {
      clearTimeout(this.quickRefreshTimer);
      this.quickRefreshTimer = null;
    }
    if (this.pollingTimer) {
      clearTimeout(this.pollingTimer);
      this.pollingTimer = null;
    }

    this.engine.off('override', this.onEngineOverride);
    this.commandQueue.clear();
    this.commandQueue.removeAllListeners();
    if (this.ownsRegistration) {
      this.engine.unregisterDevice(this.deviceId);
    }
    this.client.cleanup?.();
    this.removeAllListeners();
  }

  private recordPollSuccess(): void {
    this.consecutiveFailedPolls = 0;
    if (this.isPollingDegraded) {
      this.log.info(`[DeviceCoordinator] ${this.deviceId}: polling restored to normal interval.`);
      this.ttl = this.originalTtl;
      this.isPollingDegraded = false;
    }
  }

  private recordPollFailure(): void {
    this.consecutiveFailedPolls++;
    if (this.consecutiveFailedPolls >= this.maxConsecutiveFailedPolls && !this.isPollingDegraded) {
      this.log.warn(
        `[DeviceCoordinator] ${this.deviceId}: max consecutive failed polls (${this.consecutiveFailedPolls}) reached. ` +
        'Degrading polling interval.',
      );
      this.ttl = this.degradedTtl;
      this.isPollingDegraded = true;
    }
  }

  private scheduleQuickRefresh(): void {
    if (this.quickRefreshTimer) {
      clearTimeout(this.quickRefreshTimer);
    }
    this.quickRefreshTimer = setTimeout(() => {
      this.quickRefreshTimer = null;
      this.updateDeviceState(true).catch((error: unknown) => {
        this.log.error(`[DeviceCoordinator] ${this.deviceId}: error during quick refresh: ${toError(error).message}`);
      });
    }, this.quickRefreshDelayMs);
    this.quickRefreshTimer.unref();
  }

  private scheduleRefresh(): void {
    if (this.pollingTimer) {
      clearTimeout(this.pollingTimer);
    }
    this.pollingTimer = setTimeout(() => {
      this.pollingTimer = null;
      // updateDeviceState reschedules in its finally block, which keeps the loop going
      this.updateDeviceState(false).catch((error: unknown) => {
        this.log.error(`[DeviceCoordinator] ${this.deviceId}: error during scheduled refresh: ${toError(error).message}`);
      });
    }, this.ttl);
    this.pollingTimer.unref();
  }
}
