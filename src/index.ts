// AeroTrace - standardized engine monitoring telemetry
// Parse EMS data files into unit-normalized EngineData records

export {
  parseEmsData,
  parseEmsFile,
  detectEmsType,
  listEmsTypes,
  getParser,
  isEmsType,
} from './registry';
export type { EmsParser, ParseEmsOptions } from './registry';
export * from './models';
export * from './export';
export { JpiEdmParser } from './jpi/parser';
export { parseCgr30pText, DEFAULT_SESSION_GAP_SECS } from './cgr30p/parser';
export {
  HeaderParseError,
  ChecksumError,
  FormatError,
  UnsupportedFormatError,
  ModelValidationError,
  ConfigError,
  isAeroTraceError,
} from './errors';
export {
  roundTo,
  fahrenheitToCelsius,
  celsiusToFahrenheit,
  convertEngineTemperatures,
  resolveOutputUnit,
} from './units';
export type {
  TemperatureUnit,
  SourceTemperatureUnit,
  EmsType,
  EmsTypeInfo,
  OutputFormat,
  ParseOptions,
  LogSummary,
  SessionSummary,
} from './types';
