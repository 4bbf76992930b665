import { describe, it, expect } from 'vitest';
import { CylinderReading, CylinderReadings, EngineData } from '../../src/models/engine';
import { ModelValidationError } from '../../src/errors';

describe('CylinderReading', () => {
  it('keeps number and value', () => {
    const reading = new CylinderReading(1, 1200.5);
    expect(reading.number).toBe(1);
    expect(reading.value).toBe(1200.5);
  });

  it('rejects cylinder numbers below 1', () => {
    expect(() => new CylinderReading(6, 1200)).not.toThrow();
    expect(() => new CylinderReading(0, 1200)).toThrow(ModelValidationError);
    expect(() => new CylinderReading(-1, 1200)).toThrow('Cylinder number must be >= 1');
    expect(() => new CylinderReading(1.5, 1200)).toThrow('Cylinder number must be >= 1');
  });

  it('accepts zero and negative temperatures', () => {
    expect(new CylinderReading(1, 0).value).toBe(0);
    expect(new CylinderReading(1, -10.5).value).toBe(-10.5);
  });

  it('rejects non-finite temperatures', () => {
    expect(() => new CylinderReading(1, NaN)).toThrow('Temperature value must be numeric');
    expect(() => new CylinderReading(1, Infinity)).toThrow('Temperature value must be numeric');
  });
});

describe('CylinderReadings', () => {
  const r1 = new CylinderReading(1, 1200.0);
  const r2 = new CylinderReading(2, 1250.5);
  const r3 = new CylinderReading(3, 1180.0);

  it('handles an empty collection', () => {
    const readings = new CylinderReadings();
    expect(readings.length).toBe(0);
    expect([...readings]).toEqual([]);
    expect(readings.hottest()).toBeNull();
    expect(readings.coolest()).toBeNull();
    expect(readings.difference()).toBeNull();
  });

  it('handles a single reading', () => {
    const readings = new CylinderReadings([r1]);
    expect(readings.length).toBe(1);
    expect(readings.at(0)).toBe(r1);
    expect(readings.hottest()).toBe(r1);
    expect(readings.coolest()).toBe(r1);
    expect(readings.difference()).toBe(0);
  });

  it('finds hottest, coolest and spread', () => {
    const readings = new CylinderReadings([r1, r2, r3]);
    expect(readings.hottest()?.number).toBe(2);
    expect(readings.coolest()?.number).toBe(3);
    expect(readings.difference()).toBe(70.5);
  });

  it('returns the first reading on ties', () => {
    const a = new CylinderReading(1, 1200);
    const b = new CylinderReading(2, 1200);
    const readings = new CylinderReadings([a, b]);
    expect(readings.hottest()).toBe(a);
    expect(readings.coolest()).toBe(a);
    expect(readings.difference()).toBe(0);
  });

  it('iterates in insertion order', () => {
    const readings = new CylinderReadings([r2, r1]);
    const seen: number[] = [];
    for (const reading of readings) seen.push(reading.number);
    expect(seen).toEqual([2, 1]);
  });

  it('throws RangeError for an index out of bounds', () => {
    const readings = new CylinderReadings([r1, r2]);
    expect(readings.at(1)).toBe(r2);
    expect(() => readings.at(2)).toThrow(RangeError);
  });

  it('does not share the source array', () => {
    const source = [r1];
    const readings = new CylinderReadings(source);
    source.push(r2);
    expect(readings.length).toBe(1);
  });

  it('builds numbered readings from values, keeping gaps', () => {
    const readings = CylinderReadings.fromValues([1300, null, 1320]);
    expect(readings.toArray().map(r => [r.number, r.value])).toEqual([[1, 1300], [3, 1320]]);
    expect(readings.byNumber(2)).toBeNull();
    expect(readings.byNumber(3)?.value).toBe(1320);
    expect(readings.highestCylinder).toBe(3);
  });
});

describe('EngineData', () => {
  it('defaults every channel to null and cylinders to empty', () => {
    const engine = new EngineData();
    expect(engine.rpm).toBeNull();
    expect(engine.manifoldPressure).toBeNull();
    expect(engine.oilPressure).toBeNull();
    expect(engine.oilTemperature).toBeNull();
    expect(engine.fuelPressure).toBeNull();
    expect(engine.fuelFlow).toBeNull();
    expect(engine.volts).toBeNull();
    expect(engine.amps).toBeNull();
    expect(engine.gForce).toBeNull();
    expect(engine.outsideAirTemperature).toBeNull();
    expect(engine.egts.length).toBe(0);
    expect(engine.chts.length).toBe(0);
  });

  it('keeps zero and negative values', () => {
    const engine = new EngineData({ rpm: 0, gForce: -0.5, oilTemperature: -10 });
    expect(engine.rpm).toBe(0);
    expect(engine.gForce).toBe(-0.5);
    expect(engine.oilTemperature).toBe(-10);
  });

  it('exposes cylinder helpers through egts', () => {
    const engine = new EngineData({ egts: CylinderReadings.fromValues([1200, 1250, 1180]) });
    expect(engine.egts.hottest()?.number).toBe(2);
    expect(engine.egts.coolest()?.number).toBe(3);
    expect(engine.egts.difference()).toBe(70);
  });

  it('serializes to and from the plain shape', () => {
    const engine = new EngineData({
      rpm: 2400,
      manifoldPressure: 25.5,
      chts: CylinderReadings.fromValues([380, 390]),
      volts: 14.2,
    });
    const json = engine.toJSON();
    expect(json).toEqual({
      rpm: 2400,
      manifoldPressure: 25.5,
      oilTemperature: null,
      oilPressure: null,
      fuelPressure: null,
      fuelFlow: null,
      volts: 14.2,
      amps: null,
      gForce: null,
      outsideAirTemperature: null,
      egts: [],
      chts: [{ number: 1, value: 380 }, { number: 2, value: 390 }],
    });

    const back = EngineData.fromJSON(json);
    expect(back.rpm).toBe(2400);
    expect(back.chts.byNumber(2)?.value).toBe(390);
  });
});
