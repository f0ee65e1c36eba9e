// filepath: src/state/ReconciliationEngine.ts
import { EventEmitter } from 'events';
import { ALL_FIELDS, DetectionSource, Field, OverrideCategory, SnapshotOrigin } from '../enums.js';
import { DuplicateDeviceError, UnknownDeviceError } from '../errors.js';
import { EngineLogger, consoleLogger } from '../logger.js';
import { normalizeSettings } from '../normalize.js';
import { DeviceOverrides, EngineSettings, PACKAGE_NAME, ReconcilerConfig, resolveEngineSettings } from '../settings.js';
import { generateUUID } from '../utils.js';
import { CommandIntent, CommandLedger } from './CommandLedger.js';
import { ConfirmedStateStore } from './ConfirmedStateStore.js';
import { Debouncer } from './Debouncer.js';
import { ComparisonRule, Divergence, MismatchDetector, detectionSourceFor } from './MismatchDetector.js';
import { OverrideClassifier } from './OverrideClassifier.js';
import { ProtectionPolicy } from './ProtectionPolicy.js';
import { SettingsSnapshot, SnapshotInput, createSnapshot } from './Snapshot.js';

/**
 * A classified, debounced report that something other than us changed the device.
 */
export interface OverrideEvent {
  readonly id: string;
  readonly deviceId: string;
  readonly category: OverrideCategory;
  readonly source: DetectionSource;
  readonly divergences: readonly Divergence[];
  readonly timestamp: number;
}

export interface ReconciliationEngineOptions extends ReconcilerConfig {
  comparisonRules?: Partial<Record<Field, ComparisonRule>>;
}

/**
 * Everything the engine knows about one device. Created in full on registration.
 */
interface DeviceRecord {
  readonly deviceId: string;
  readonly settings: EngineSettings;
  readonly confirmed: ConfirmedStateStore;
  readonly ledger: CommandLedger;
  readonly detector: MismatchDetector;
  readonly policy: ProtectionPolicy;
  readonly debouncer: Debouncer;
  lastAcceptedAt: number | null;
}

function describeDivergences(divergences: readonly Divergence[]): string {
  return divergences.map(d => `${d.field}: ${d.expected} → ${d.actual}`).join(', ');
}

/**
 * Decides, from polls and command traffic, whether a device was changed behind our back.
 *
 * Every entry point runs synchronously to completion, so calls for one device never
 * interleave inside a reconciliation pass. Time is always supplied by the caller.
 *
 * Emits `override` with each admitted {@link OverrideEvent}, after state has been updated.
 */
export class ReconciliationEngine extends EventEmitter {
  private readonly devices = new Map<string, DeviceRecord>();
  private readonly classifier = new OverrideClassifier();
  private readonly log: EngineLogger;

  constructor(private readonly config: ReconciliationEngineOptions = {}, log?: EngineLogger) {
    super();
    this.log = log ?? consoleLogger;
  }

  public registerDevice(deviceId: string, overrides: DeviceOverrides = {}): EngineSettings {
    if (this.devices.has(deviceId)) {
      throw new DuplicateDeviceError(deviceId);
    }
    const settings = resolveEngineSettings(this.config, overrides);
    const detector = new MismatchDetector(
      { temperatureTolerance: settings.temperatureTolerance },
      this.config.comparisonRules,
      this.log,
    );
    this.devices.set(deviceId, {
      deviceId,
      settings,
      confirmed: new ConfirmedStateStore(),
      ledger: new CommandLedger(settings.protectionWindowMs),
      detector,
      policy: new ProtectionPolicy(
        (field, expected, actual) => detector.matches(field, expected, actual),
        this.log,
        settings.debug,
      ),
      debouncer: new Debouncer(settings.debounceCooldownMs),
      lastAcceptedAt: null,
    });
    if (settings.debug) {
      this.log.debug(`[ReconciliationEngine] Registered ${deviceId}: ${JSON.stringify(settings)}`);
    }
    return settings;
  }

  public unregisterDevice(deviceId: string): boolean {
    return this.devices.delete(deviceId);
  }

  public hasDevice(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  public deviceIds(): string[] {
    return [...this.devices.keys()];
  }

  public settingsFor(deviceId: string): EngineSettings {
    return this.record(deviceId).settings;
  }

  /**
   * Records what we are about to ask the device for. Targets are normalized the way polls are,
   * so `{ pow: true }` and `{ pow: '1' }` both expect `on`. Unknown keys and values that cannot be
   * interpreted record nothing.
   */
  public onCommandIssued(deviceId: string, fields: SnapshotInput, now: number): void {
    const record = this.record(deviceId);
    const { values: targets, rejected } = normalizeSettings(fields, { temperatureStep: record.settings.temperatureStep });
    for (const { field, value } of rejected) {
      this.log.warn(`[ReconciliationEngine] ${deviceId}: not tracking command ${field}="${value}", the value is not understood`);
    }
    for (const field of ALL_FIELDS) {
      const target = targets[field];
      if (target === undefined) {
        continue;
      }
      const intent = record.ledger.recordIntent(field, target, now);
      if (record.settings.debug) {
        this.log.debug(
          `[ReconciliationEngine] ${deviceId}: intent #${intent.sequence} ${intent.field} → ${intent.target}` +
          ` (protected for ${record.ledger.windowFor(intent.field)}ms)`,
        );
      }
    }
  }

  /**
   * Early detection from the settings a command call returned. Never advances confirmed state.
   */
  public onCommandResult(deviceId: string, snapshot: SettingsSnapshot, now: number): OverrideEvent[] {
    const record = this.record(deviceId);
    if (!record.settings.commandTimeDetection) {
      return [];
    }
    const response = snapshot.origin === SnapshotOrigin.CommandResponse
      ? snapshot
      : createSnapshot(snapshot.values, snapshot.timestamp, SnapshotOrigin.CommandResponse);
    if (this.isStale(record, response)) {
      return [];
    }

    const events = this.reconcile(record, response, now);
    this.publish(events);
    return events;
  }

  /**
   * Primary detection path. Compares the poll against confirmed state, then makes it the
   * new confirmed state and retires the intents it confirms.
   */
  public onPoll(deviceId: string, snapshot: SettingsSnapshot, now: number): OverrideEvent[] {
    const record = this.record(deviceId);
    const poll = snapshot.origin === SnapshotOrigin.Poll
      ? snapshot
      : createSnapshot(snapshot.values, snapshot.timestamp, SnapshotOrigin.Poll);
    if (this.isStale(record, poll)) {
      return [];
    }

    const events = this.reconcile(record, poll, now);

    record.confirmed.update(poll);
    record.lastAcceptedAt = poll.timestamp;
    this.retireConfirmedIntents(record, now);

    this.publish(events);
    return events;
  }

  public currentConfirmedState(deviceId: string): SettingsSnapshot {
    return this.record(deviceId).confirmed.toSnapshot();
  }

  public pendingIntents(deviceId: string, now: number): CommandIntent[] {
    return this.record(deviceId).ledger.activeIntents(now);
  }

  private record(deviceId: string): DeviceRecord {
    const record = this.devices.get(deviceId);
    if (!record) {
      throw new UnknownDeviceError(deviceId);
    }
    return record;
  }

  private isStale(record: DeviceRecord, snapshot: SettingsSnapshot): boolean {
    if (record.lastAcceptedAt !== null && snapshot.timestamp < record.lastAcceptedAt) {
      this.log.warn(
        `[ReconciliationEngine] ${record.deviceId}: discarding ${snapshot.origin} snapshot from ${snapshot.timestamp}, ` +
        `older than last accepted poll at ${record.lastAcceptedAt}`,
      );
      return true;
    }
    return false;
  }

  private reconcile(record: DeviceRecord, snapshot: SettingsSnapshot, now: number): OverrideEvent[] {
    const divergences = record.detector.detect(snapshot, record.confirmed);
    if (divergences.length === 0) {
      return [];
    }

    const real = record.policy.filter(divergences, record.ledger, record.confirmed, now);
    const category = this.classifier.classify(real);
    if (category === undefined) {
      return [];
    }

    const source = detectionSourceFor(snapshot.origin);
    const event: OverrideEvent = Object.freeze({
      id: generateUUID(`${category}:${source}:${now}`, `${PACKAGE_NAME}:${record.deviceId}`),
      deviceId: record.deviceId,
      category,
      source,
      divergences: Object.freeze([...real]),
      timestamp: now,
    });

    if (!record.debouncer.admit(event, now)) {
      if (record.settings.debug) {
        this.log.debug(`[ReconciliationEngine] ${record.deviceId}: debounced ${category} override (${describeDivergences(real)})`);
      }
      return [];
    }

    this.log.info(
      `[ReconciliationEngine][OVERRIDE] ${record.deviceId}: ${category} changed outside our control ` +
      `via ${source} (${describeDivergences(real)})`,
    );
    return [event];
  }

  private retireConfirmedIntents(record: DeviceRecord, now: number): void {
    for (const intent of record.ledger.activeIntents(now)) {
      const confirmedValue = record.confirmed.read(intent.field);
      if (confirmedValue !== undefined && record.detector.matches(intent.field, confirmedValue, intent.target)) {
        record.ledger.clear(intent.field);
        if (record.settings.debug) {
          this.log.debug(
            `[ReconciliationEngine] ${record.deviceId}: intent #${intent.sequence} ${intent.field} → ${intent.target} confirmed`,
          );
        }
      }
    }
  }

  private publish(events: readonly OverrideEvent[]): void {
    for (const event of events) {
      this.emit('override', event);
    }
  }
}
