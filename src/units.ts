// Unit conversion helpers

import { CylinderReading, CylinderReadings, EngineData } from './models/engine';
import type { SourceTemperatureUnit, TemperatureUnit } from './types';

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function fahrenheitToCelsius(value: number): number {
  return roundTo((value - 32) * 5 / 9, 1);
}

export function celsiusToFahrenheit(value: number): number {
  return roundTo((value * 9 / 5) + 32, 1);
}

export function kpaToPsi(value: number): number {
  return roundTo(value * 0.145038, 1);
}

export function kpaToInHg(value: number): number {
  return roundTo(value * 0.2953, 1);
}

export function barToPsi(value: number): number {
  return roundTo(value * 14.5038, 1);
}

/** Convert a device temperature to Fahrenheit. */
export function toFahrenheit(value: number, unit: SourceTemperatureUnit): number {
  return unit === 'celsius' ? celsiusToFahrenheit(value) : value;
}

/**
 * Resolve the requested output unit against the unit the device recorded in.
 */
export function resolveOutputUnit(
  requested: TemperatureUnit,
  source: SourceTemperatureUnit
): SourceTemperatureUnit {
  return requested === 'original' ? source : requested;
}

/**
 * Copy of the engine data with temperatures expressed in `unit`.
 * The standardized model always holds Fahrenheit.
 */
export function convertEngineTemperatures(engine: EngineData, unit: SourceTemperatureUnit): EngineData {
  if (unit === 'fahrenheit') return engine;

  const convert = (value: number | null) => value === null ? null : fahrenheitToCelsius(value);
  const convertReadings = (readings: CylinderReadings) =>
    new CylinderReadings(readings.toArray().map(r => new CylinderReading(r.number, fahrenheitToCelsius(r.value))));

  return new EngineData({
    ...engine,
    egts: convertReadings(engine.egts),
    chts: convertReadings(engine.chts),
    oilTemperature: convert(engine.oilTemperature),
    outsideAirTemperature: convert(engine.outsideAirTemperature),
  });
}
