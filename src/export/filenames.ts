import type { FlightSession, TelemetryLog } from '../models/session';

const pad = (n: number) => n.toString().padStart(2, '0');

export function safeAircraftId(aircraftId: string | null): string {
  const safe = (aircraftId ?? '').replace(/[^a-zA-Z0-9]/g, '');
  return safe === '' ? 'unknown' : safe;
}

export function sessionFilename(log: TelemetryLog, session: FlightSession, extension = 'csv'): string {
  let datePart = '';
  if (session.startTime) {
    const d = session.startTime;
    datePart = `_${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  }
  return `${safeAircraftId(log.aircraftId)}_flight_${session.sessionNumber}${datePart}.${extension}`;
}

export function logFilename(log: TelemetryLog, suffix: string): string {
  return `${safeAircraftId(log.aircraftId)}_${suffix}`;
}
