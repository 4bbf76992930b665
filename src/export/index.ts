export { sessionToCsv, csvHeader, formatTimestamp } from './csv';
export {
  toStandardizedDocument,
  toStandardizedJson,
  parseStandardizedJson,
  StandardizedLogSchema,
  EngineDataSchema,
  FORMAT_NAME,
  FORMAT_VERSION,
} from './json';
export type { StandardizedLog } from './json';
export { buildSessionArchive } from './archive';
export type { ArchiveResult } from './archive';
export { sessionFilename, logFilename, safeAircraftId } from './filenames';
export { summarize } from './summary';
