// Recording sessions and whole-log containers

import type { EngineData } from './engine';
import type { EmsType, SourceTemperatureUnit } from '../types';

export const DEFAULT_INTERVAL_SECS = 6;

export interface TelemetryRecord {
  timestamp: Date | null;
  engine: EngineData;
}

export class FlightSession {
  readonly sessionNumber: number;

  startTime: Date | null = null;
  intervalSecs: number = DEFAULT_INTERVAL_SECS;
  records: TelemetryRecord[] = [];
  warnings: string[] = [];

  constructor(sessionNumber: number) {
    this.sessionNumber = sessionNumber;
  }

  get interval(): number {
    return this.intervalSecs <= 0 ? DEFAULT_INTERVAL_SECS : this.intervalSecs;
  }

  get durationHours(): number {
    if (this.records.length === 0) return 0;
    return (this.records.length * this.interval) / 3600;
  }

  get valid(): boolean {
    return this.startTime !== null && this.records.length > 0;
  }

  get empty(): boolean {
    return this.records.length === 0;
  }

  get hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  /** Highest EGT/CHT cylinder number seen in any record. */
  get cylinderCount(): number {
    let count = 0;
    for (const record of this.records) {
      count = Math.max(count, record.engine.egts.highestCylinder, record.engine.chts.highestCylinder);
    }
    return count;
  }
}

export interface TelemetryLog {
  emsType: EmsType;
  model: string;
  aircraftId: string | null;
  downloadTime: Date | null;
  sourceUnit: SourceTemperatureUnit;
  sessions: FlightSession[];
  /** Problems that concern the whole file rather than one session. */
  warnings: string[];
}
