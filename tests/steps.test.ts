import { describe, expect, it } from 'vitest';
import { StorageError, StructuralError } from '../src/errors.js';
import { assertMappingComplete, buildStepMapping, buildStepRecord, calculateCRate, registerSteps } from '../src/steps.js';
import { MemoryStore, frameOf, localIso, silentLogger } from './helpers.js';

describe('calculateCRate', () => {
  it('divides the absolute current by the nominal capacity', () => {
    expect(calculateCRate(2, 4)).toBe(0.5);
    expect(calculateCRate(-3, 1.5)).toBe(2);
  });

  it('is 0 without a usable capacity or current', () => {
    expect(calculateCRate(1, 0)).toBe(0);
    expect(calculateCRate(1, -2)).toBe(0);
    expect(calculateCRate(1, null)).toBe(0);
    expect(calculateCRate(null, 2)).toBe(0);
  });
});

describe('buildStepRecord', () => {
  const row = {
    step_number: '1',
    step_type: ' CC_Chg ',
    start_time: '2024-01-01T10:00:00',
    end_time: '2024-01-01T11:00:00',
    current: '1.5',
    voltage_start: '3.0',
    voltage_end: '4.2',
    capacity: '1.5',
    energy: '5.5',
    temperature: '24.0',
  };

  it('derives type, duration and c-rate', () => {
    const record = buildStepRecord(9, row, 3);
    expect(record).toMatchObject({
      experiment_id: 9,
      step_number: 1,
      step_type: 'charge',
      original_step_type: 'CC_Chg',
      start_time: localIso(2024, 1, 1, 10, 0, 0),
      end_time: localIso(2024, 1, 1, 11, 0, 0),
      duration: 3600,
      voltage_start: 3,
      voltage_end: 4.2,
      current: 1.5,
      c_rate: 0.5,
      temperature_avg: 24,
      temperature_min: 24,
      temperature_max: 24,
    });
    expect(record?.data_meta).toBe(row);
  });

  it('prefers temperatures measured in the detail log', () => {
    const temps = new Map([[1, { avg: 26, min: 25, max: 27 }]]);
    expect(buildStepRecord(9, row, 3, temps)).toMatchObject({ temperature_avg: 26, temperature_min: 25, temperature_max: 27 });
  });

  it('uses an explicit duration column first', () => {
    expect(buildStepRecord(9, { ...row, duration: '12.5' }, 3)?.duration).toBe(12.5);
  });

  it('stores c_rate 0 for a nominal capacity of 0', () => {
    expect(buildStepRecord(9, row, 0)?.c_rate).toBe(0);
  });

  it('maps unknown labels to unknown and keeps the original', () => {
    expect(buildStepRecord(9, { ...row, step_type: 'Pulse' }, 3)).toMatchObject({ step_type: 'unknown', original_step_type: 'Pulse' });
  });

  it('rejects rows without a step number or type', () => {
    expect(buildStepRecord(9, { ...row, step_type: null }, 3)).toBeNull();
    expect(buildStepRecord(9, { ...row, step_number: '1.5' }, 3)).toBeNull();
  });
});

describe('registerSteps', () => {
  const rows = frameOf(
    ['Step_Index,Step_Type,Current', '1,CC_Chg,1', '2,Rest,0', '2,Rest,0', ',CC_DChg,-1', '3,,0'].join('\n')
  ).rows;

  it('stores each valid step number once and returns ids', async () => {
    const store = new MemoryStore();
    const steps = await registerSteps(store, 5, rows, 2, { logger: silentLogger });
    expect(steps.map((s) => [s.step_number, s.step_type, s.c_rate])).toEqual([
      [1, 'charge', 0.5],
      [2, 'rest', 0],
    ]);
    expect(steps.every((s) => typeof s.id === 'number')).toBe(true);
    expect(store.steps).toHaveLength(2);
  });

  it('writes nothing when no row is usable', async () => {
    const store = new MemoryStore();
    expect(await registerSteps(store, 5, [{ step_number: null }], 2, { logger: silentLogger })).toEqual([]);
    expect(store.calls.insertSteps).toBeUndefined();
  });

  it('fails closed after one retry', async () => {
    const store = new MemoryStore().failTimes('insertSteps', 2);
    await expect(registerSteps(store, 5, rows, 2, { logger: silentLogger })).rejects.toBeInstanceOf(StorageError);
    expect(store.reconnects).toBe(1);
    expect(store.steps).toHaveLength(0);
  });

  it('recovers when the retry succeeds', async () => {
    const store = new MemoryStore().failTimes('insertSteps', 1);
    expect(await registerSteps(store, 5, rows, 2, { logger: silentLogger })).toHaveLength(2);
  });
});

describe('step mapping', () => {
  it('skips steps without an id', () => {
    const mapping = buildStepMapping([
      { id: 10, step_number: 1 },
      { id: null, step_number: 2 },
    ]);
    expect([...mapping]).toEqual([[1, 10]]);
  });

  it('names the selected steps that have no id', () => {
    const mapping = new Map([
      [1, 10],
      [2, 11],
    ]);
    expect(() => assertMappingComplete(mapping, [1, 2])).not.toThrow();
    try {
      assertMappingComplete(mapping, [7, 1, 3, 3]);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(StructuralError);
      if (e instanceof StructuralError) {
        expect(e.missing).toEqual(['3', '7']);
        expect(e.message).toBe('step mapping incomplete: no step id for step number(s) 3, 7');
      }
    }
  });
});
