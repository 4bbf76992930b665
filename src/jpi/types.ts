// Header records of a JPI EDM download

/** `$C`: instrument model and feature flags. */
export interface EdmConfig {
  model: number;
  flagsLow: number;
  flagsHigh: number;
}

/** `$A`: alarm thresholds as programmed on the instrument, in device units. */
export interface AlarmLimits {
  highVolts: number; // tenths of a volt
  lowVolts: number;
  egtSpread: number;
  maxCht: number;
  maxChtCoolingRate: number;
  maxTit: number;
  highOilTemperature: number;
  lowOilTemperature: number;
}

/** `$F`: fuel totalizer settings. */
export interface FuelConfig {
  emptyWarning: number;
  capacity: number;
  warningLevel: number;
  kFactors: [number, number];
}

/** `$D`: one entry of the flight index. */
export interface FlightIndex {
  flightNumber: number;
  dataWords: number;
  dataLength: number;
}

/** `$T`: when the download was taken; two-digit year. */
export interface DownloadStamp {
  month: number;
  day: number;
  year: number;
  hour: number;
  minute: number;
}

export interface ParsedHeader {
  tailNumber: string | null;
  config: EdmConfig | null;
  alarmLimits: AlarmLimits | null;
  fuelConfig: FuelConfig | null;
  flights: FlightIndex[];
  downloadStamp: DownloadStamp | null;
  binaryOffset: number;
}
