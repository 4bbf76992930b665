// Shared type definitions for AeroTrace

export type TemperatureUnit = 'original' | 'celsius' | 'fahrenheit';

/** Unit a device recorded its temperatures in. */
export type SourceTemperatureUnit = 'celsius' | 'fahrenheit';

export type EmsType = 'cgr30p' | 'jpi-edm';

export type OutputFormat = 'csv' | 'json' | 'zip';

export interface EmsTypeInfo {
  type: EmsType;
  product: string;
  input: string;
}

export interface ParseOptions {
  /** Split CSV logs into a new session when timestamps jump by more than this. */
  sessionGapSecs?: number;
}

export interface SessionSummary {
  number: number;
  startTime: Date | null;
  durationHours: number;
  recordCount: number;
  warningCount: number;
}

export interface LogSummary {
  emsType: EmsType;
  aircraftId: string | null;
  model: string;
  downloadTime: Date | null;
  sessionCount: number;
  sessions: SessionSummary[];
}
