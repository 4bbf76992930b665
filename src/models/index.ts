export {
  CylinderReading,
  CylinderReadings,
  EngineData,
  SCALAR_CHANNELS,
  TEMPERATURE_CHANNELS,
} from './engine';
export type {
  EngineDataInit,
  EngineDataJson,
  CylinderReadingJson,
  ScalarChannel,
  CylinderChannel,
  EngineChannel,
} from './engine';
export { FlightSession, DEFAULT_INTERVAL_SECS } from './session';
export type { TelemetryRecord, TelemetryLog } from './session';
