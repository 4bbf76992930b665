// Header parser for JPI EDM downloads
// The ASCII header is a run of $-records that precedes the binary flight data

import { ChecksumError, HeaderParseError } from '../errors';
import type { AlarmLimits, DownloadStamp, EdmConfig, FlightIndex, FuelConfig, ParsedHeader } from './types';

const CR = 0x0D;
const LF = 0x0A;

export function parseHeader(data: Uint8Array): ParsedHeader {
  const result: ParsedHeader = {
    tailNumber: null,
    config: null,
    alarmLimits: null,
    fuelConfig: null,
    flights: [],
    downloadStamp: null,
    binaryOffset: 0,
  };

  const decoder = new TextDecoder('ascii');
  let pos = 0;

  while (pos < data.length) {
    const lineEnd = findLineEnd(data, pos);
    if (lineEnd === -1) break;

    const line = decoder.decode(data.subarray(pos, lineEnd));
    if (!line.startsWith('$')) break;

    parseHeaderLine(line, result);
    pos = lineEnd + 2;

    // $L closes the header block
    if (line.startsWith('$L')) {
      result.binaryOffset = pos;
      break;
    }
  }

  if (result.binaryOffset === 0) {
    throw new HeaderParseError('No $L record found - invalid file format');
  }

  return result;
}

function findLineEnd(data: Uint8Array, from: number): number {
  for (let i = from; i < data.length - 1; i++) {
    if (data[i] === CR && data[i + 1] === LF) return i;
  }
  return -1;
}

/**
 * XOR of every character between `$` and `*`.
 */
export function headerChecksum(content: string): number {
  let checksum = 0;
  for (let i = 0; i < content.length; i++) {
    checksum ^= content.charCodeAt(i);
  }
  return checksum;
}

function parseHeaderLine(line: string, result: ParsedHeader): void {
  verifyChecksum(line);

  const content = line.replace(/\*[0-9A-Fa-f]{2}$/, '');
  const recordType = content[1];
  const fields = content.slice(3).split(',').map(f => f.trim());

  switch (recordType) {
    case 'U':
      result.tailNumber = fields.join(',').trim() || null;
      break;
    case 'A':
      result.alarmLimits = parseAlarmLimits(fields);
      break;
    case 'C':
      result.config = parseConfig(fields);
      break;
    case 'D':
      result.flights.push(parseFlightIndex(fields));
      break;
    case 'F':
      result.fuelConfig = parseFuelConfig(fields);
      break;
    case 'T':
      result.downloadStamp = parseDownloadStamp(fields);
      break;
    default:
      // $P, $H, $L and anything newer carry nothing we normalize
      break;
  }
}

function verifyChecksum(line: string): void {
  const starIndex = line.indexOf('*');
  if (starIndex === -1) return;

  const expected = parseInt(line.slice(starIndex + 1, starIndex + 3), 16);
  const calculated = headerChecksum(line.slice(1, starIndex));

  if (calculated !== expected) {
    throw new ChecksumError(
      `Header checksum mismatch in ${line.slice(0, 2)}: expected ${expected.toString(16)}, got ${calculated.toString(16)}`
    );
  }
}

function int(fields: string[], index: number): number {
  return parseInt(fields[index] ?? '', 10) || 0;
}

// $A,VH,VL,DIF,CHT,CLD,TIT,OILH,OILL
function parseAlarmLimits(fields: string[]): AlarmLimits {
  const [highVolts, lowVolts, egtSpread, maxCht, maxChtCoolingRate, maxTit, highOilTemperature, lowOilTemperature] =
    Array.from({ length: 8 }, (_, i) => int(fields, i));
  return {
    highVolts,
    lowVolts,
    egtSpread,
    maxCht,
    maxChtCoolingRate,
    maxTit,
    highOilTemperature,
    lowOilTemperature,
  };
}

function parseConfig(fields: string[]): EdmConfig {
  return {
    model: int(fields, 0),
    flagsLow: int(fields, 1),
    flagsHigh: int(fields, 2),
  };
}

function parseFlightIndex(fields: string[]): FlightIndex {
  const dataWords = int(fields, 1);
  return {
    flightNumber: int(fields, 0),
    dataWords,
    dataLength: dataWords * 2,
  };
}

function parseFuelConfig(fields: string[]): FuelConfig {
  return {
    emptyWarning: int(fields, 0),
    capacity: int(fields, 1),
    warningLevel: int(fields, 2),
    kFactors: [int(fields, 3), int(fields, 4)],
  };
}

function parseDownloadStamp(fields: string[]): DownloadStamp {
  return {
    month: int(fields, 0),
    day: int(fields, 1),
    year: int(fields, 2),
    hour: int(fields, 3),
    minute: int(fields, 4),
  };
}
