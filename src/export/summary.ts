import type { TelemetryLog } from '../models/session';
import type { LogSummary } from '../types';

export function summarize(log: TelemetryLog): LogSummary {
  return {
    emsType: log.emsType,
    aircraftId: log.aircraftId,
    model: log.model,
    downloadTime: log.downloadTime,
    sessionCount: log.sessions.length,
    sessions: log.sessions.map(s => ({
      number: s.sessionNumber,
      startTime: s.startTime,
      durationHours: s.durationHours,
      recordCount: s.records.length,
      warningCount: s.warnings.length,
    })),
  };
}
