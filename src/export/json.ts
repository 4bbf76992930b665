// Standardized JSON document: serialization, schema and validation
//
// The document always holds the standardized units (Fahrenheit, PSI, inHg)
// whatever the device recorded in.

import { z } from 'zod';
import { FormatError } from '../errors';
import { EngineData } from '../models/engine';
import { FlightSession } from '../models/session';
import type { TelemetryLog } from '../models/session';

export const FORMAT_NAME = 'aerotrace';
export const FORMAT_VERSION = 1;

const nullableNumber = z.number().finite().nullable();
const isoDate = z.string().datetime({ offset: true });

const CylinderReadingSchema = z.object({
  number: z.number().int().min(1),
  value: z.number().finite(),
});

export const EngineDataSchema = z.object({
  rpm: nullableNumber,
  manifoldPressure: nullableNumber,
  oilTemperature: nullableNumber,
  oilPressure: nullableNumber,
  fuelPressure: nullableNumber,
  fuelFlow: nullableNumber,
  volts: nullableNumber,
  amps: nullableNumber,
  gForce: nullableNumber,
  outsideAirTemperature: nullableNumber,
  egts: z.array(CylinderReadingSchema),
  chts: z.array(CylinderReadingSchema),
});

const TelemetryRecordSchema = z.object({
  timestamp: isoDate.nullable(),
  engine: EngineDataSchema,
});

const FlightSessionSchema = z.object({
  sessionNumber: z.number().int().min(1),
  startTime: isoDate.nullable(),
  intervalSecs: z.number().int(),
  warnings: z.array(z.string()),
  records: z.array(TelemetryRecordSchema),
});

export const StandardizedLogSchema = z.object({
  format: z.literal(FORMAT_NAME),
  version: z.literal(FORMAT_VERSION),
  emsType: z.enum(['cgr30p', 'jpi-edm']),
  model: z.string(),
  aircraftId: z.string().nullable(),
  downloadTime: isoDate.nullable(),
  sourceUnit: z.enum(['celsius', 'fahrenheit']),
  warnings: z.array(z.string()),
  sessions: z.array(FlightSessionSchema),
});

export type StandardizedLog = z.infer<typeof StandardizedLogSchema>;

const iso = (date: Date | null) => date ? date.toISOString() : null;
const fromIso = (text: string | null) => text === null ? null : new Date(text);

export function toStandardizedDocument(log: TelemetryLog): StandardizedLog {
  return {
    format: FORMAT_NAME,
    version: FORMAT_VERSION,
    emsType: log.emsType,
    model: log.model,
    aircraftId: log.aircraftId,
    downloadTime: iso(log.downloadTime),
    sourceUnit: log.sourceUnit,
    warnings: [...log.warnings],
    sessions: log.sessions.map(session => ({
      sessionNumber: session.sessionNumber,
      startTime: iso(session.startTime),
      intervalSecs: session.intervalSecs,
      warnings: [...session.warnings],
      records: session.records.map(record => ({
        timestamp: iso(record.timestamp),
        engine: record.engine.toJSON(),
      })),
    })),
  };
}

export function toStandardizedJson(log: TelemetryLog, indent = 2): string {
  return JSON.stringify(toStandardizedDocument(log), null, indent) + '\n';
}

/**
 * Validate a standardized JSON document and rebuild the log it describes.
 */
export function parseStandardizedJson(text: string): TelemetryLog {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new FormatError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const result = StandardizedLogSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new FormatError(`Invalid standardized document at ${path}: ${issue.message}`);
  }

  const doc = result.data;
  return {
    emsType: doc.emsType,
    model: doc.model,
    aircraftId: doc.aircraftId,
    downloadTime: fromIso(doc.downloadTime),
    sourceUnit: doc.sourceUnit,
    warnings: doc.warnings,
    sessions: doc.sessions.map(s => {
      const session = new FlightSession(s.sessionNumber);
      session.startTime = fromIso(s.startTime);
      session.intervalSecs = s.intervalSecs;
      session.warnings = s.warnings;
      session.records = s.records.map(r => ({
        timestamp: fromIso(r.timestamp),
        engine: EngineData.fromJSON(r.engine),
      }));
      return session;
    }),
  };
}
