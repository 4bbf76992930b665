// CGR-30P data log parser
// Turns the instrument's CSV export into sessions of standardized EngineData

import { FormatError } from '../errors';
import { CylinderReading, CylinderReadings, EngineData, TEMPERATURE_CHANNELS } from '../models/engine';
import type { EngineDataInit, ScalarChannel } from '../models/engine';
import { FlightSession } from '../models/session';
import type { TelemetryLog } from '../models/session';
import type { EmsParser } from '../registry';
import type { ParseOptions, SourceTemperatureUnit } from '../types';
import { barToPsi, kpaToInHg, kpaToPsi, toFahrenheit } from '../units';
import {
  classifyColumn,
  isMissingValue,
  isSessionMarker,
  metadataKeyFor,
  parseUnit,
} from './channels';
import type { ColumnSpec, ColumnUnit, MetadataKey } from './channels';
import { isBlankRow, parseCsv } from './csv';
import { combine, parseDate, parseDateTime, parseTime } from './timestamps';

export const DEFAULT_SESSION_GAP_SECS = 300;
const DEFAULT_MODEL = 'CGR-30P';
const DETECT_BYTES = 64 * 1024;
const DETECT_ROWS = 50;
const MIDNIGHT_ROLLOVER_MS = 12 * 3600 * 1000;
const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

interface HeaderRow {
  rowIndex: number;
  columns: ColumnSpec[];
}

type Metadata = Partial<Record<MetadataKey, string>>;

export function findHeaderRow(rows: string[][], limit = rows.length): HeaderRow | null {
  for (let i = 0; i < Math.min(rows.length, limit); i++) {
    const columns = rows[i].map((cell, index) => classifyColumn(cell, index));
    const hasTime = columns.some(c => c.role?.kind === 'time' || c.role?.kind === 'datetime');
    const hasChannel = columns.some(c => c.role?.kind === 'scalar' || c.role?.kind === 'cylinder');
    if (hasTime && hasChannel) return { rowIndex: i, columns };
  }
  return null;
}

export function looksLikeCgr30p(data: Uint8Array): boolean {
  const head = data.subarray(0, DETECT_BYTES);
  if (head.includes(0)) return false;

  const rows = parseCsv(new TextDecoder('utf-8').decode(head));
  return findHeaderRow(rows, DETECT_ROWS) !== null;
}

function parseMetadataLine(row: string[], metadata: Metadata): void {
  const first = row[0].trim();
  let key: string;
  let value: string;

  const colon = first.indexOf(':');
  if (colon > 0) {
    key = first.slice(0, colon);
    value = [first.slice(colon + 1), ...row.slice(1)].join(',').trim();
  } else if (row.length >= 2) {
    key = first;
    value = row.slice(1).join(',').trim();
  } else {
    return;
  }

  const name = metadataKeyFor(key);
  if (name && value !== '' && metadata[name] === undefined) {
    metadata[name] = value;
  }
}

function parseNumber(cell: string): number | null {
  const text = cell.trim();
  if (!NUMERIC.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function normalizeValue(
  channel: ScalarChannel | 'egts' | 'chts',
  value: number,
  unit: ColumnUnit,
  defaultTemperatureUnit: SourceTemperatureUnit
): number {
  if (TEMPERATURE_CHANNELS.has(channel)) {
    const source: SourceTemperatureUnit = unit === 'celsius' || unit === 'fahrenheit' ? unit : defaultTemperatureUnit;
    return toFahrenheit(value, source);
  }
  if (channel === 'manifoldPressure') {
    return unit === 'kpa' ? kpaToInHg(value) : value;
  }
  if (unit === 'kpa') return kpaToPsi(value);
  if (unit === 'bar') return barToPsi(value);
  return value;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function finishSession(session: FlightSession): void {
  const times = session.records
    .map(r => r.timestamp?.getTime())
    .filter((t): t is number => t !== undefined);

  session.startTime = times.length > 0 ? new Date(times[0]) : null;

  const steps: number[] = [];
  for (let i = 1; i < times.length; i++) {
    const step = (times[i] - times[i - 1]) / 1000;
    if (step > 0) steps.push(step);
  }
  session.intervalSecs = steps.length > 0 ? Math.max(1, Math.round(median(steps))) : 1;
}

export function parseCgr30pText(text: string, options: ParseOptions = {}): TelemetryLog {
  const gapMs = (options.sessionGapSecs ?? DEFAULT_SESSION_GAP_SECS) * 1000;
  const rows = parseCsv(text);
  const header = findHeaderRow(rows);
  if (!header) {
    throw new FormatError('No column header row found in CGR-30P log');
  }

  const metadata: Metadata = {};
  for (const row of rows.slice(0, header.rowIndex)) {
    if (!isBlankRow(row)) parseMetadataLine(row, metadata);
  }

  const metadataUnit = metadata.temperatureUnit ? parseUnit(metadata.temperatureUnit) : null;
  const sourceUnit: SourceTemperatureUnit = metadataUnit === 'celsius' ? 'celsius' : 'fahrenheit';
  const downloadTime = metadata.downloadTime
    ? parseDateTime(metadata.downloadTime) ?? dateOnly(metadata.downloadTime)
    : null;

  const logWarnings: string[] = [];
  const columns = selectColumns(header.columns, logWarnings);
  const timeColumns = {
    datetime: header.columns.find(c => c.role?.kind === 'datetime'),
    date: header.columns.find(c => c.role?.kind === 'date'),
    time: header.columns.find(c => c.role?.kind === 'time'),
  };

  const logDate = metadata.flightDate ? parseDate(metadata.flightDate) : null;
  if (!timeColumns.datetime && !timeColumns.date && !logDate) {
    logWarnings.push('Time column without a date; timestamps unavailable');
  }

  const sessions: FlightSession[] = [];
  let current: FlightSession | null = null;
  let previousTime: number | null = null;
  let warned = new Set<string>();
  let dayOffset = 0;

  const openSession = (): FlightSession => {
    const session = new FlightSession(sessions.length + 1);
    sessions.push(session);
    warned = new Set<string>();
    return session;
  };

  const warnOnce = (session: FlightSession, key: string, message: string) => {
    if (warned.has(key)) return;
    warned.add(key);
    session.warnings.push(message);
  };

  for (const row of rows.slice(header.rowIndex + 1)) {
    if (isBlankRow(row)) continue;

    if (isSessionMarker(row[0])) {
      current = null;
      continue;
    }

    const cell = (spec: ColumnSpec | undefined) => spec ? (row[spec.index] ?? '') : '';

    let timestamp: Date | null = null;
    let timestampCell = '';
    if (timeColumns.datetime) {
      timestampCell = cell(timeColumns.datetime);
      timestamp = parseDateTime(timestampCell);
    } else if (timeColumns.date && timeColumns.time) {
      timestampCell = `${cell(timeColumns.date)} ${cell(timeColumns.time)}`;
      const date = parseDate(cell(timeColumns.date));
      const time = parseTime(cell(timeColumns.time));
      timestamp = date && time ? combine(date, time) : null;
    } else if (timeColumns.time && logDate) {
      // Time-only logs take their date from the preamble and roll over at midnight
      timestampCell = cell(timeColumns.time);
      const time = parseTime(timestampCell);
      if (time) {
        timestamp = combine(logDate, time);
        timestamp.setDate(timestamp.getDate() + dayOffset);
        if (previousTime !== null && previousTime - timestamp.getTime() > MIDNIGHT_ROLLOVER_MS) {
          dayOffset += 1;
          timestamp.setDate(timestamp.getDate() + 1);
        }
      }
    }

    if (timestamp !== null && previousTime !== null) {
      const step = timestamp.getTime() - previousTime;
      if (step < 0 || step > gapMs) current = null;
    }

    const session: FlightSession = current ?? openSession();
    current = session;

    if (timestamp === null && timestampCell.trim() !== '') {
      warnOnce(session, '#timestamp', `Unparseable timestamp "${timestampCell.trim()}"`);
    }
    if (timestamp !== null) previousTime = timestamp.getTime();

    const init: EngineDataInit = {};
    const cylinders: Record<'egts' | 'chts', CylinderReading[]> = { egts: [], chts: [] };

    for (const spec of columns) {
      const raw = cell(spec);
      if (isMissingValue(raw)) continue;

      const parsed = parseNumber(raw);
      if (parsed === null) {
        warnOnce(session, spec.name, `Non-numeric value "${raw.trim()}" in column ${spec.name}`);
        continue;
      }

      const role = spec.role;
      if (role?.kind === 'scalar') {
        init[role.channel] = normalizeValue(role.channel, parsed, spec.unit, sourceUnit);
      } else if (role?.kind === 'cylinder') {
        const value = normalizeValue(role.channel, parsed, spec.unit, sourceUnit);
        cylinders[role.channel].push(new CylinderReading(role.cylinder, value));
      }
    }

    const byNumber = (a: CylinderReading, b: CylinderReading) => a.number - b.number;
    session.records.push({
      timestamp,
      engine: new EngineData({
        ...init,
        egts: new CylinderReadings(cylinders.egts.sort(byNumber)),
        chts: new CylinderReadings(cylinders.chts.sort(byNumber)),
      }),
    });
  }

  sessions.forEach(finishSession);

  return {
    emsType: 'cgr30p',
    model: metadata.model ?? DEFAULT_MODEL,
    aircraftId: metadata.aircraftId ?? null,
    downloadTime,
    sourceUnit,
    sessions,
    warnings: logWarnings,
  };
}

function dateOnly(text: string): Date | null {
  const date = parseDate(text);
  return date ? combine(date, { hour: 0, minute: 0, second: 0 }) : null;
}

/**
 * Channel columns to read; the first column wins when a channel repeats.
 */
function selectColumns(all: ColumnSpec[], warnings: string[]): ColumnSpec[] {
  const seen = new Set<string>();
  const selected: ColumnSpec[] = [];
  const unknown: string[] = [];
  const duplicate: string[] = [];

  for (const spec of all) {
    const role = spec.role;
    if (role === null) {
      if (spec.name !== '') unknown.push(spec.name);
      continue;
    }
    if (role.kind !== 'scalar' && role.kind !== 'cylinder') continue;

    const key = role.kind === 'scalar' ? role.channel : `${role.channel}${role.cylinder}`;
    if (seen.has(key)) {
      duplicate.push(spec.name);
      continue;
    }
    seen.add(key);
    selected.push(spec);
  }

  if (unknown.length > 0) {
    warnings.push(`Ignoring unknown columns: ${unknown.join(', ')}`);
  }
  if (duplicate.length > 0) {
    warnings.push(`Ignoring duplicate columns: ${duplicate.join(', ')}`);
  }
  return selected;
}

export const cgr30pParser: EmsParser = {
  type: 'cgr30p',
  product: 'Electronics International CGR-30P',
  input: 'CSV data log',
  detect: looksLikeCgr30p,
  parse: (data, options) => parseCgr30pText(new TextDecoder('utf-8').decode(data), options),
};
