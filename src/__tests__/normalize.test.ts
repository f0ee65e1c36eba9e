import { describe, it, expect } from 'vitest';
import { FanDirection, FanRate, Field, HvacMode, PowerState } from '../enums.js';
import { normalizeSettings, toDeviceSettings } from '../normalize.js';

describe('normalizeSettings', () => {
  it('normalizes the traditional key-value form', () => {
    const result = normalizeSettings({ pow: '1', mode: 'cool', stemp: '23.0', f_rate: 'quiet', f_dir: 'vertical' });
    expect(result.values).toEqual({
      [Field.Power]: PowerState.On,
      [Field.HvacMode]: HvacMode.Cool,
      [Field.TargetTemperature]: '23',
      [Field.FanRate]: FanRate.Quiet,
      [Field.FanDirection]: FanDirection.Vertical,
    });
    expect(result.unknownKeys).toEqual([]);
    expect(result.rejected).toEqual([]);
  });

  it('translates firmware 2.8.0 mode and fan codes', () => {
    const result = normalizeSettings({ pow: 'on', mode: '0500', f_rate: '0a00' });
    expect(result.values[Field.HvacMode]).toBe(HvacMode.Dry);
    expect(result.values[Field.FanRate]).toBe(FanRate.Auto);

    expect(normalizeSettings({ f_rate: '0700' }).values[Field.FanRate]).toBe(FanRate.Level5);
    expect(normalizeSettings({ mode: '0000' }).values[Field.HvacMode]).toBe(HvacMode.Fan);
  });

  it('accepts booleans and numbers for power', () => {
    expect(normalizeSettings({ pow: true }).values[Field.Power]).toBe(PowerState.On);
    expect(normalizeSettings({ pow: 0 }).values[Field.Power]).toBe(PowerState.Off);
  });

  it('maps 3d swing to both', () => {
    expect(normalizeSettings({ f_dir: '3d' }).values[Field.FanDirection]).toBe(FanDirection.Both);
  });

  it('rounds target temperature to the configured step', () => {
    expect(normalizeSettings({ stemp: '23.3' }).values[Field.TargetTemperature]).toBe('23.5');
    expect(normalizeSettings({ stemp: 23.5 }, { temperatureStep: 1 }).values[Field.TargetTemperature]).toBe('24');
  });

  it('leaves out placeholders and empty values without rejecting them', () => {
    const result = normalizeSettings({ pow: '1', stemp: '--', f_rate: null, f_dir: undefined });
    expect(result.values).toEqual({ [Field.Power]: PowerState.On });
    expect(result.rejected).toEqual([]);
  });

  it('reports values it cannot interpret and keeps the rest', () => {
    const result = normalizeSettings({ pow: 'maybe', mode: 'turbo', stemp: 'warm', f_rate: '3' });
    expect(result.values).toEqual({ [Field.FanRate]: FanRate.Level3 });
    expect(result.rejected).toEqual([
      { field: Field.Power, value: 'maybe' },
      { field: Field.HvacMode, value: 'turbo' },
      { field: Field.TargetTemperature, value: 'warm' },
    ]);
  });

  it('reports untracked keys separately', () => {
    const result = normalizeSettings({ pow: '0', htemp: '21', otemp: '8', shum: '--' });
    expect(result.unknownKeys).toEqual(['htemp', 'otemp', 'shum']);
    expect(result.values).toEqual({ [Field.Power]: PowerState.Off });
  });

  it('reports mode off for a unit that is switched off', () => {
    const result = normalizeSettings({ pow: '0', mode: '0200' });
    expect(result.values[Field.HvacMode]).toBe(HvacMode.Off);
  });

  it('derives power from a mode given on its own', () => {
    expect(normalizeSettings({ mode: 'heat' }).values).toEqual({ [Field.HvacMode]: HvacMode.Heat, [Field.Power]: PowerState.On });
    expect(normalizeSettings({ mode: 'off' }).values).toEqual({ [Field.HvacMode]: HvacMode.Off, [Field.Power]: PowerState.Off });
  });
});

describe('toDeviceSettings', () => {
  it('renders engine values in the controller form', () => {
    expect(toDeviceSettings({
      [Field.Power]: PowerState.On,
      [Field.HvacMode]: HvacMode.Cool,
      [Field.TargetTemperature]: '22.5',
      [Field.FanRate]: FanRate.Level3,
      [Field.FanDirection]: FanDirection.Both,
    })).toEqual({ pow: '1', mode: '0200', stemp: '22.5', f_rate: '0500', f_dir: '3d' });
  });

  it('sends mode off as power off', () => {
    expect(toDeviceSettings({ [Field.HvacMode]: HvacMode.Off })).toEqual({ pow: '0' });
    expect(toDeviceSettings({ [Field.Power]: PowerState.Off, [Field.FanDirection]: FanDirection.Vertical }))
      .toEqual({ pow: '0', f_dir: 'vertical' });
  });

  it('produces settings that normalize back to the same values', () => {
    const values = { [Field.Power]: PowerState.On, [Field.HvacMode]: HvacMode.Heat, [Field.FanRate]: FanRate.Quiet };
    expect(normalizeSettings(toDeviceSettings(values)).values).toEqual(values);
  });
});
