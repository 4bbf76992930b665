import { describe, it, expect } from 'vitest';
import { CylinderReadings, EngineData } from '../src/models/engine';
import {
  celsiusToFahrenheit,
  convertEngineTemperatures,
  fahrenheitToCelsius,
  kpaToPsi,
  resolveOutputUnit,
  roundTo,
} from '../src/units';
import * as aerotrace from '../src';

describe('units', () => {
  it('converts temperatures to one decimal', () => {
    expect(fahrenheitToCelsius(212)).toBe(100);
    expect(fahrenheitToCelsius(100)).toBe(37.8);
    expect(celsiusToFahrenheit(100)).toBe(212);
    expect(celsiusToFahrenheit(-40)).toBe(-40);
  });

  it('converts pressure', () => {
    expect(kpaToPsi(100)).toBe(14.5);
  });

  it('rounds to the given decimals', () => {
    expect(roundTo(1.26, 1)).toBe(1.3);
    expect(roundTo(13.999, 2)).toBe(14);
  });

  it('resolves original against the device unit', () => {
    expect(resolveOutputUnit('original', 'celsius')).toBe('celsius');
    expect(resolveOutputUnit('fahrenheit', 'celsius')).toBe('fahrenheit');
  });

  it('converts only temperature channels', () => {
    const engine = new EngineData({
      rpm: 2400,
      oilTemperature: 212,
      outsideAirTemperature: 32,
      egts: CylinderReadings.fromValues([1400]),
    });

    const celsius = convertEngineTemperatures(engine, 'celsius');
    expect(celsius.rpm).toBe(2400);
    expect(celsius.oilTemperature).toBe(100);
    expect(celsius.outsideAirTemperature).toBe(0);
    expect(celsius.egts.at(0).value).toBe(760);
    expect(engine.oilTemperature).toBe(212);

    expect(convertEngineTemperatures(engine, 'fahrenheit')).toBe(engine);
  });

  it('exports the conversions from the package entry', () => {
    expect(aerotrace.roundTo).toBe(roundTo);
    expect(aerotrace.celsiusToFahrenheit).toBe(celsiusToFahrenheit);
  });
});
