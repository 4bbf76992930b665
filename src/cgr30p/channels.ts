// Column-name lookup for CGR-30P data logs
// The alias table lives in channels.json; names are compared after normalizeName()

import { z } from 'zod';
import { SCALAR_CHANNELS } from '../models/engine';
import type { CylinderChannel, ScalarChannel } from '../models/engine';
import channelTable from './channels.json';

const aliasList = z.array(z.string().min(1));

const ChannelTableSchema = z.object({
  timeColumns: aliasList,
  dateColumns: aliasList,
  dateTimeColumns: aliasList,
  channels: z.record(z.enum(SCALAR_CHANNELS), aliasList),
  cylinders: z.object({ egts: aliasList, chts: aliasList }),
  metadata: z.object({
    aircraftId: aliasList,
    model: aliasList,
    downloadTime: aliasList,
    flightDate: aliasList,
    temperatureUnit: aliasList,
  }),
  sessionMarkers: aliasList,
  missingValues: z.array(z.string()),
});

const table = ChannelTableSchema.parse(channelTable);

export type MetadataKey = keyof typeof table.metadata;

export type ColumnUnit = 'fahrenheit' | 'celsius' | 'psi' | 'kpa' | 'bar' | 'inhg' | null;

export type ColumnRole =
  | { kind: 'time' }
  | { kind: 'date' }
  | { kind: 'datetime' }
  | { kind: 'scalar'; channel: ScalarChannel }
  | { kind: 'cylinder'; channel: CylinderChannel; cylinder: number };

export interface ColumnSpec {
  index: number;
  name: string;
  unit: ColumnUnit;
  role: ColumnRole | null;
}

const UNIT_SUFFIX = /\s*[([]\s*([^)\]]*?)\s*[)\]]\s*$/;

const UNIT_ALIASES: Record<string, Exclude<ColumnUnit, null>> = {
  f: 'fahrenheit', degf: 'fahrenheit', fahrenheit: 'fahrenheit',
  c: 'celsius', degc: 'celsius', celsius: 'celsius',
  psi: 'psi',
  kpa: 'kpa',
  bar: 'bar',
  inhg: 'inhg', in: 'inhg',
};

/** Lowercase and strip everything but letters and digits. */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function parseUnit(raw: string): ColumnUnit {
  return UNIT_ALIASES[normalizeName(raw)] ?? null;
}

const scalarLookup = new Map<string, ScalarChannel>();
for (const channel of SCALAR_CHANNELS) {
  for (const alias of table.channels[channel] ?? []) {
    scalarLookup.set(alias, channel);
  }
}

const cylinderPatterns: Array<[CylinderChannel, RegExp]> = (['egts', 'chts'] as const).map(channel => {
  const prefixes = [...table.cylinders[channel]].sort((a, b) => b.length - a.length);
  return [channel, new RegExp(`^(?:${prefixes.join('|')})([1-9][0-9]?)$`)];
});

export function classifyColumn(rawName: string, index: number): ColumnSpec {
  const unitMatch = UNIT_SUFFIX.exec(rawName);
  const unit = unitMatch ? parseUnit(unitMatch[1]) : null;
  const name = unitMatch ? rawName.slice(0, unitMatch.index) : rawName;
  const key = normalizeName(name);

  return { index, name: name.trim(), unit, role: roleFor(key) };
}

function roleFor(key: string): ColumnRole | null {
  if (table.dateTimeColumns.includes(key)) return { kind: 'datetime' };
  if (table.timeColumns.includes(key)) return { kind: 'time' };
  if (table.dateColumns.includes(key)) return { kind: 'date' };

  const scalar = scalarLookup.get(key);
  if (scalar) return { kind: 'scalar', channel: scalar };

  for (const [channel, pattern] of cylinderPatterns) {
    const match = pattern.exec(key);
    if (match) return { kind: 'cylinder', channel, cylinder: parseInt(match[1], 10) };
  }
  return null;
}

export function metadataKeyFor(rawKey: string): MetadataKey | null {
  const key = normalizeName(rawKey);
  for (const [name, aliases] of Object.entries(table.metadata)) {
    if (aliases.includes(key) && isMetadataKey(name)) return name;
  }
  return null;
}

function isMetadataKey(name: string): name is MetadataKey {
  return name in table.metadata;
}

export function isSessionMarker(cell: string): boolean {
  return table.sessionMarkers.includes(normalizeName(cell));
}

export function isMissingValue(cell: string): boolean {
  return table.missingValues.includes(cell.trim().toLowerCase());
}
