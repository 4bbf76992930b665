// Command-line front end: aerotrace types | info | export

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { readAppConfig } from './config';
import type { AppConfig } from './config';
import { isAeroTraceError } from './errors';
import { buildSessionArchive } from './export/archive';
import { formatTimestamp, sessionToCsv } from './export/csv';
import { logFilename, sessionFilename } from './export/filenames';
import { toStandardizedJson } from './export/json';
import { summarize } from './export/summary';
import { logDebug, logError, logInfo, logWarn, setLogLevel } from './logger';
import type { TelemetryLog } from './models/session';
import { isEmsType, listEmsTypes, parseEmsFile } from './registry';
import type { EmsType, OutputFormat, TemperatureUnit } from './types';
import { resolveOutputUnit } from './units';

export const USAGE = `Usage: aerotrace <command> [options]

Commands:
  types                     List supported EMS types
  info <file>               Summarize an EMS data file
  export <file>             Export sessions in the standardized format

Options:
  --type <id>               EMS type (skip detection)
  --format <csv|json|zip>   Export format
  --out <dir>               Output directory
  --unit <original|celsius|fahrenheit>
                            Temperature unit for CSV output
  --help                    Show this help
`;

const FORMATS: readonly OutputFormat[] = ['csv', 'json', 'zip'];
const UNITS: readonly TemperatureUnit[] = ['original', 'celsius', 'fahrenheit'];

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], option: string): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find(a => a === value);
  if (!match) {
    throw new UsageError(`Invalid --${option} "${value}" (expected ${allowed.join(', ')})`);
  }
  return match;
}

function emsTypeOption(value: string | undefined): EmsType | undefined {
  if (value === undefined) return undefined;
  if (!isEmsType(value)) {
    throw new UsageError(`Unknown --type "${value}" (expected ${listEmsTypes().map(t => t.type).join(', ')})`);
  }
  return value;
}

function printInfo(log: TelemetryLog): void {
  const summary = summarize(log);
  console.log(`EMS type:      ${summary.emsType}`);
  console.log(`Model:         ${summary.model}`);
  console.log(`Aircraft:      ${summary.aircraftId ?? 'Unknown'}`);
  console.log(`Downloaded:    ${summary.downloadTime ? formatTimestamp(summary.downloadTime) : '-'}`);
  console.log(`Sessions:      ${summary.sessionCount}`);

  for (const s of summary.sessions) {
    const start = s.startTime ? formatTimestamp(s.startTime) : 'Unknown date';
    const warnings = s.warningCount > 0 ? `  ${s.warningCount} warning(s)` : '';
    console.log(`  #${s.number}  ${start}  ${s.durationHours.toFixed(2)} hrs  ${s.recordCount} records${warnings}`);
  }
}

async function writeOutput(dir: string, filename: string, content: string | Uint8Array): Promise<string> {
  const path = join(dir, filename);
  await writeFile(path, content);
  console.log(path);
  return path;
}

async function exportLog(
  log: TelemetryLog,
  format: OutputFormat,
  outDir: string,
  unit: TemperatureUnit
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  if (format === 'json') {
    return [await writeOutput(outDir, logFilename(log, 'flights.json'), toStandardizedJson(log))];
  }

  if (format === 'zip') {
    const archive = await buildSessionArchive(log, unit);
    logDebug(`Archive entries: ${archive.entries.join(', ')}`);
    return [await writeOutput(outDir, archive.filename, archive.data)];
  }

  const outputUnit = resolveOutputUnit(unit, log.sourceUnit);
  const written: string[] = [];
  for (const session of log.sessions) {
    if (!session.valid) {
      logWarn(`Skipping session ${session.sessionNumber}: no start time or no records`);
      continue;
    }
    written.push(await writeOutput(outDir, sessionFilename(log, session), sessionToCsv(session, outputUnit)));
  }
  return written;
}

function reportWarnings(log: TelemetryLog): void {
  for (const warning of log.warnings) {
    logWarn(warning);
  }
  for (const session of log.sessions) {
    for (const warning of session.warnings) {
      logWarn(`Session ${session.sessionNumber}: ${warning}`);
    }
  }
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        type: { type: 'string' },
        format: { type: 'string' },
        out: { type: 'string' },
        unit: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

/**
 * Run the CLI and return the process exit code.
 */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const { values, positionals } = parseCommandLine(argv);

    const [command, file] = positionals;
    if (values.help || command === undefined) {
      console.log(USAGE);
      return command === undefined && !values.help ? 1 : 0;
    }

    const config: AppConfig = readAppConfig(env);
    setLogLevel(config.logLevel);

    if (command === 'types') {
      for (const info of listEmsTypes()) {
        console.log(`${info.type.padEnd(10)} ${info.product} (${info.input})`);
      }
      return 0;
    }

    if (command !== 'info' && command !== 'export') {
      throw new UsageError(`Unknown command "${command}"`);
    }
    if (file === undefined) {
      throw new UsageError(`Missing <file> for ${command}`);
    }

    const log = await parseEmsFile(file, {
      emsType: emsTypeOption(values.type),
      sessionGapSecs: config.sessionGapSecs,
    });
    logDebug(`Parsed ${file} as ${log.emsType}`);
    reportWarnings(log);

    if (command === 'info') {
      printInfo(log);
      return 0;
    }

    const format = pick(values.format, FORMATS, 'format') ?? config.outputFormat;
    const unit = pick(values.unit, UNITS, 'unit') ?? config.temperatureUnit;
    const written = await exportLog(log, format, values.out ?? config.outputDir, unit);
    logInfo(`Wrote ${written.length} file(s)`);
    return 0;
  } catch (e) {
    if (e instanceof UsageError) {
      logError(e.message);
      console.log(USAGE);
      return 1;
    }
    if (isAeroTraceError(e)) {
      logError(e.message);
      return 1;
    }
    logError(e instanceof Error ? e.stack ?? e.message : String(e));
    return 1;
  }
}
