// EMS parser registry and format detection

import { readFile } from 'node:fs/promises';
import { UnsupportedFormatError } from './errors';
import type { TelemetryLog } from './models/session';
import type { EmsType, EmsTypeInfo, ParseOptions } from './types';
import { cgr30pParser } from './cgr30p/parser';
import { jpiEdmParser } from './jpi/parser';

export interface EmsParser extends EmsTypeInfo {
  detect(data: Uint8Array): boolean;
  parse(data: Uint8Array, options?: ParseOptions): TelemetryLog;
}

export interface ParseEmsOptions extends ParseOptions {
  /** Skip detection and use this parser. */
  emsType?: EmsType;
}

// Detection order matters: the binary signature check is cheaper and stricter
const PARSERS: readonly EmsParser[] = [jpiEdmParser, cgr30pParser];

export function listEmsTypes(): EmsTypeInfo[] {
  return PARSERS.map(({ type, product, input }) => ({ type, product, input }));
}

export function isEmsType(value: string): value is EmsType {
  return PARSERS.some(p => p.type === value);
}

export function getParser(type: EmsType): EmsParser {
  const parser = PARSERS.find(p => p.type === type);
  if (!parser) {
    throw new UnsupportedFormatError(`Unknown EMS type: ${type}`);
  }
  return parser;
}

export function detectEmsType(data: Uint8Array): EmsType | null {
  return PARSERS.find(p => p.detect(data))?.type ?? null;
}

export function parseEmsData(data: Uint8Array, options: ParseEmsOptions = {}): TelemetryLog {
  const { emsType, ...parseOptions } = options;
  const type = emsType ?? detectEmsType(data);
  if (type === null) {
    throw new UnsupportedFormatError(
      `Unrecognized EMS data; supported types: ${PARSERS.map(p => p.type).join(', ')}`
    );
  }
  return getParser(type).parse(data, parseOptions);
}

export async function parseEmsFile(path: string, options: ParseEmsOptions = {}): Promise<TelemetryLog> {
  const data = await readFile(path);
  return parseEmsData(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), options);
}
