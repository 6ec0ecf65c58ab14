import { describe, expect, it } from 'vitest';
import { StructuralError } from '../src/errors.js';
import { buildMeasurement, ingestMeasurements, prepareMeasurementFrame } from '../src/measurements.js';
import { MemoryStore, frameOf, localIso, silentLogger } from './helpers.js';

const HEADER = 'Step_Index,Step_Time,Voltage,Current';

function detail(...lines: string[]) {
  return frameOf([HEADER, ...lines].join('\n'));
}

describe('prepareMeasurementFrame', () => {
  it('returns the integer join key per row', () => {
    expect(prepareMeasurementFrame(detail('1,0,3.7,1', '2.0,1,3.7,1'))).toEqual([1, 2]);
  });

  it('names missing required columns', () => {
    expect(() => prepareMeasurementFrame(frameOf('Step_Index,Step_Time\n1,0'))).toThrow(
      'detail data is missing required column(s): voltage, current'
    );
  });

  it('rejects a step number that is not an integer', () => {
    expect(() => prepareMeasurementFrame(detail('1,0,3.7,1', 'x,1,3.7,1'))).toThrow(StructuralError);
  });
});

describe('buildMeasurement', () => {
  const base = { execution_time: '1', voltage: '3.71234', current: '-1.00049' };

  it('rounds and fills defaults for blank optional fields', () => {
    expect(buildMeasurement({ ...base, temperature: null, capacity: null, energy: null, soc: null }, 7)).toEqual({
      step_id: 7,
      execution_time: 1,
      timestamp: null,
      voltage: 3.712,
      current: -1,
      temperature: 25,
      capacity: 0,
      energy: 0,
      soc: null,
    });
  });

  it('rounds temperature and soc to one decimal', () => {
    const m = buildMeasurement({ ...base, temperature: '25.26', soc: '80.04', timestamp: '2024-01-01T10:00:05' }, 7);
    expect(m).toMatchObject({ temperature: 25.3, soc: 80, timestamp: localIso(2024, 1, 1, 10, 0, 5) });
  });

  it('rejects rows with a field that cannot be coerced', () => {
    expect(buildMeasurement({ ...base, voltage: 'x' }, 7)).toBeNull();
    expect(buildMeasurement({ ...base, voltage: null }, 7)).toBeNull();
    expect(buildMeasurement({ ...base, capacity: 'abc' }, 7)).toBeNull();
  });
});

describe('ingestMeasurements', () => {
  it('skips rows of steps outside the mapping', async () => {
    const store = new MemoryStore();
    const frame = detail('1,0,3.7,1', '1,1,3.7,1', '2,0,3.8,1', '3,0,3.9,1', '3,1,3.9,1');
    const summary = await ingestMeasurements(store, 1, frame, new Map([[1, 10], [2, 20]]), { logger: silentLogger });
    expect(summary).toEqual({
      total: 5,
      saved: 3,
      errors: 0,
      skipped: 2,
      batches: 1,
      failedBatches: 0,
      cancelled: false,
      lastTimestamp: null,
    });
    expect(store.measurements.map((m) => m.step_id)).toEqual([10, 10, 20]);
  });

  it('keeps committed batches when a later batch fails', async () => {
    const store = new MemoryStore();
    store.rejectMeasurements = (rows) => rows.some((r) => r.step_id === 20);
    const frame = detail('1,0,3.7,1', '1,1,3.7,1', '2,0,3.8,1', '2,1,3.8,1', '1,2,3.7,1');
    const summary = await ingestMeasurements(store, 1, frame, new Map([[1, 10], [2, 20]]), {
      batchSize: 2,
      logger: silentLogger,
    });
    expect(summary).toMatchObject({ total: 5, saved: 3, errors: 2, batches: 3, failedBatches: 1 });
    expect(summary.saved + summary.errors).toBeLessThanOrEqual(summary.total);
    expect(store.measurements).toHaveLength(3);
    expect(store.calls.insertMeasurements).toBe(4);
  });

  it('counts rows that fail coercion as errors', async () => {
    const store = new MemoryStore();
    const summary = await ingestMeasurements(store, 1, detail('1,0,3.7,1', '1,1,n/a,1'), new Map([[1, 10]]), {
      logger: silentLogger,
    });
    expect(summary).toMatchObject({ saved: 1, errors: 1 });
  });

  it('reports the latest timestamp among committed rows only', async () => {
    const store = new MemoryStore();
    store.rejectMeasurements = (rows) => rows.some((r) => r.step_id === 20);
    const frame = frameOf(
      [
        'Date_Time,Step_Index,Step_Time,Voltage,Current',
        '2024-03-01T08:00:00,1,0,3.7,1',
        '2024-03-01T08:00:05,1,5,3.7,1',
        '2024-03-01T08:00:10,1,10,bad,1',
        '2024-03-01T08:00:15,2,0,3.8,1',
      ].join('\n')
    );
    const summary = await ingestMeasurements(store, 1, frame, new Map([[1, 10], [2, 20]]), {
      batchSize: 3,
      logger: silentLogger,
    });
    expect(summary).toMatchObject({ saved: 2, errors: 2, failedBatches: 1 });
    expect(summary.lastTimestamp).toBe(localIso(2024, 3, 1, 8, 0, 5));
  });

  it('stops requesting batches once cancelled', async () => {
    const store = new MemoryStore();
    const controller = new AbortController();
    const frame = detail('1,0,3.7,1', '1,1,3.7,1', '1,2,3.7,1', '1,3,3.7,1', '1,4,3.7,1');
    const progress: number[] = [];
    const summary = await ingestMeasurements(store, 1, frame, new Map([[1, 10]]), {
      batchSize: 2,
      signal: controller.signal,
      onBatch: (p) => {
        progress.push(p.batch);
        controller.abort();
      },
      logger: silentLogger,
    });
    expect(progress).toEqual([1]);
    expect(summary).toMatchObject({ saved: 2, batches: 1, cancelled: true });
  });

  it('fails before writing when the join key is bad', async () => {
    const store = new MemoryStore();
    await expect(
      ingestMeasurements(store, 1, detail('1,0,3.7,1', '1.5,1,3.7,1'), new Map([[1, 10]]), { logger: silentLogger })
    ).rejects.toThrow(StructuralError);
    expect(store.calls.insertMeasurements).toBeUndefined();
  });

  it('rejects a batch size below one', async () => {
    await expect(
      ingestMeasurements(new MemoryStore(), 1, detail('1,0,3.7,1'), new Map([[1, 10]]), { batchSize: 0, logger: silentLogger })
    ).rejects.toThrow(RangeError);
  });
});
