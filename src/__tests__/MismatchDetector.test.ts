import { describe, it, expect, beforeEach } from 'vitest';
import { DetectionSource, Field, SnapshotOrigin } from '../enums.js';
import { ConfirmedStateStore } from '../state/ConfirmedStateStore.js';
import { MismatchDetector, temperatureMatch } from '../state/MismatchDetector.js';
import { createSnapshot } from '../state/Snapshot.js';
import { MockLogger, createMockLogger } from './testUtils.js';

describe('temperatureMatch', () => {
  it('treats readings within the tolerance as equal', () => {
    expect(temperatureMatch('24', '23.5', { temperatureTolerance: 0.5 })).toBe(true);
    expect(temperatureMatch('24', '23', { temperatureTolerance: 0.5 })).toBe(false);
    expect(temperatureMatch('24', '24.0', { temperatureTolerance: 0 })).toBe(true);
  });

  it('compares non-numeric readings exactly', () => {
    expect(temperatureMatch('--', '--', { temperatureTolerance: 0.5 })).toBe(true);
    expect(temperatureMatch('--', '24', { temperatureTolerance: 0.5 })).toBe(false);
  });
});

describe('MismatchDetector', () => {
  let confirmed: ConfirmedStateStore;
  let logger: MockLogger;

  beforeEach(() => {
    confirmed = new ConfirmedStateStore();
    confirmed.update(createSnapshot({ pow: 'on', mode: 'cool', stemp: '24', f_rate: 'auto' }, 1000));
    logger = createMockLogger();
  });

  it('reports fields that differ, tagged with the snapshot source', () => {
    const detector = new MismatchDetector({ temperatureTolerance: 0.5 }, {}, logger);
    const divergences = detector.detect(createSnapshot({ pow: 'on', stemp: '22', f_rate: '3' }, 2000), confirmed);
    expect(divergences).toEqual([
      { field: Field.TargetTemperature, expected: '24', actual: '22', source: DetectionSource.Poll },
      { field: Field.FanRate, expected: 'auto', actual: '3', source: DetectionSource.Poll },
    ]);
  });

  it('tags command responses as command-time detections', () => {
    const detector = new MismatchDetector({ temperatureTolerance: 0.5 }, {}, logger);
    const divergences = detector.detect(
      createSnapshot({ mode: 'heat' }, 2000, SnapshotOrigin.CommandResponse),
      confirmed,
    );
    expect(divergences).toEqual([
      { field: Field.HvacMode, expected: 'cool', actual: 'heat', source: DetectionSource.CommandTime },
    ]);
  });

  it('never reports a field that was never confirmed', () => {
    const detector = new MismatchDetector({ temperatureTolerance: 0.5 }, {}, logger);
    expect(detector.detect(createSnapshot({ f_dir: 'both' }, 2000), confirmed)).toEqual([]);
  });

  it('absorbs rounding within the temperature tolerance', () => {
    const detector = new MismatchDetector({ temperatureTolerance: 0.5 }, {}, logger);
    expect(detector.detect(createSnapshot({ stemp: '23.5' }, 2000), confirmed)).toEqual([]);
  });

  it('keeps going when one comparison rule throws', () => {
    const detector = new MismatchDetector(
      { temperatureTolerance: 0.5 },
      { [Field.TargetTemperature]: () => { throw new Error('bad reading'); } },
      logger,
    );
    const divergences = detector.detect(createSnapshot({ stemp: '18', pow: 'off' }, 2000), confirmed);
    expect(divergences).toEqual([
      { field: Field.Power, expected: 'on', actual: 'off', source: DetectionSource.Poll },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('[MismatchDetector] Comparison rule for stemp failed on "24" vs "18": bad reading');
  });

  it('falls back to strict equality in matches() when the rule throws', () => {
    const detector = new MismatchDetector(
      { temperatureTolerance: 0.5 },
      { [Field.TargetTemperature]: () => { throw new Error('bad reading'); } },
      logger,
    );
    expect(detector.compare(Field.TargetTemperature, '24', '24')).toBeUndefined();
    expect(detector.matches(Field.TargetTemperature, '24', '24')).toBe(true);
    expect(detector.matches(Field.TargetTemperature, '24', '23.5')).toBe(false);
  });
});
