// ZIP archive of every valid session as CSV

import JSZip from 'jszip';
import type { TelemetryLog } from '../models/session';
import type { TemperatureUnit } from '../types';
import { resolveOutputUnit } from '../units';
import { sessionToCsv } from './csv';
import { logFilename, sessionFilename } from './filenames';

export interface ArchiveResult {
  filename: string;
  entries: string[];
  data: Uint8Array;
}

export async function buildSessionArchive(
  log: TelemetryLog,
  unit: TemperatureUnit = 'fahrenheit'
): Promise<ArchiveResult> {
  const zip = new JSZip();
  const outputUnit = resolveOutputUnit(unit, log.sourceUnit);
  const entries: string[] = [];

  for (const session of log.sessions) {
    if (!session.valid) continue;
    const filename = sessionFilename(log, session);
    zip.file(filename, sessionToCsv(session, outputUnit));
    entries.push(filename);
  }

  const data = await zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  return { filename: logFilename(log, 'flights.zip'), entries, data };
}
