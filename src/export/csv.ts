// CSV export of a single session

import type { EngineData, ScalarChannel } from '../models/engine';
import type { FlightSession } from '../models/session';
import type { SourceTemperatureUnit } from '../types';
import { convertEngineTemperatures } from '../units';

const SCALAR_COLUMNS: Array<[string, ScalarChannel]> = [
  ['OILT', 'oilTemperature'],
  ['OILP', 'oilPressure'],
  ['FUELP', 'fuelPressure'],
  ['FF', 'fuelFlow'],
  ['VOLTS', 'volts'],
  ['AMPS', 'amps'],
  ['G', 'gForce'],
  ['OAT', 'outsideAirTemperature'],
];

const pad = (n: number) => n.toString().padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
         `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

function formatValue(value: number | null): string {
  return value === null ? '' : String(value);
}

export function csvHeader(cylinders: number): string[] {
  const numbered = (prefix: string) => Array.from({ length: cylinders }, (_, i) => `${prefix}${i + 1}`);
  return ['TIMESTAMP', 'RPM', 'MAP', ...numbered('EGT'), ...numbered('CHT'), ...SCALAR_COLUMNS.map(([name]) => name)];
}

function csvRow(timestamp: Date | null, engine: EngineData, cylinders: number): string[] {
  const cylinderCells = (readings: EngineData['egts']) =>
    Array.from({ length: cylinders }, (_, i) => formatValue(readings.byNumber(i + 1)?.value ?? null));

  return [
    timestamp ? formatTimestamp(timestamp) : '',
    formatValue(engine.rpm),
    formatValue(engine.manifoldPressure),
    ...cylinderCells(engine.egts),
    ...cylinderCells(engine.chts),
    ...SCALAR_COLUMNS.map(([, channel]) => formatValue(engine[channel])),
  ];
}

export function sessionToCsv(session: FlightSession, unit: SourceTemperatureUnit = 'fahrenheit'): string {
  const cylinders = session.cylinderCount;
  const lines: string[] = [csvHeader(cylinders).join(',')];

  for (const record of session.records) {
    const engine = convertEngineTemperatures(record.engine, unit);
    lines.push(csvRow(record.timestamp, engine, cylinders).join(','));
  }

  return lines.join('\n') + '\n';
}
