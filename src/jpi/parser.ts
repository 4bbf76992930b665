// JPI EDM download parser
// Orchestrates header and flight decoding

import { HeaderParseError } from '../errors';
import type { FlightSession, TelemetryLog } from '../models/session';
import type { EmsParser } from '../registry';
import type { SourceTemperatureUnit } from '../types';
import { FlightDecoder } from './flight';
import { parseHeader } from './header-parser';
import type { AlarmLimits, EdmConfig, FlightIndex, FuelConfig, ParsedHeader } from './types';

const FAHRENHEIT_FLAG_BIT = 28;

export function looksLikeJpi(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x24 && data[1] === 0x55; // $U
}

interface DecodedFlight {
  session: FlightSession;
  sourceUnit: SourceTemperatureUnit | null;
}

export class JpiEdmParser {
  private data: DataView;
  private header: ParsedHeader;
  private flightsCache: Map<number, DecodedFlight> = new Map();

  private constructor(data: Uint8Array, header: ParsedHeader) {
    this.data = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.header = header;
  }

  static fromBytes(data: Uint8Array): JpiEdmParser {
    if (!looksLikeJpi(data)) {
      throw new HeaderParseError('Not a valid JPI file - expected $U header');
    }
    return new JpiEdmParser(data, parseHeader(data));
  }

  get tailNumber(): string | null {
    return this.header.tailNumber;
  }

  get model(): number | null {
    return this.header.config?.model ?? null;
  }

  /** e.g. "EDM-830" */
  get modelString(): string {
    return this.model ? `EDM-${this.model}` : 'Unknown';
  }

  get config(): EdmConfig | null {
    return this.header.config;
  }

  get alarmLimits(): AlarmLimits | null {
    return this.header.alarmLimits;
  }

  get fuelConfig(): FuelConfig | null {
    return this.header.fuelConfig;
  }

  /** Unit the instrument records temperatures in, from the $C flags. */
  get sourceUnit(): SourceTemperatureUnit {
    const flagsHigh = this.header.config?.flagsHigh ?? 0;
    return ((flagsHigh >> (FAHRENHEIT_FLAG_BIT - 16)) & 1) === 1 ? 'fahrenheit' : 'celsius';
  }

  get downloadTime(): Date | null {
    const ts = this.header.downloadStamp;
    if (!ts) return null;

    const year = ts.year < 50 ? 2000 + ts.year : 1900 + ts.year;
    const date = new Date(year, ts.month - 1, ts.day, ts.hour, ts.minute, 0);
    return isNaN(date.getTime()) ? null : date;
  }

  get flightIndex(): FlightIndex[] {
    return this.header.flights;
  }

  get flightCount(): number {
    return this.header.flights.length;
  }

  /** All flights, decoded lazily and cached. */
  get flights(): FlightSession[] {
    return this.header.flights.map(entry => this.decodeEntry(entry).session);
  }

  flight(flightNumber: number): FlightSession | null {
    const entry = this.header.flights.find(f => f.flightNumber === flightNumber);
    return entry ? this.decodeEntry(entry).session : null;
  }

  /**
   * Flights are normalized with their own header flags, so the log reports
   * the unit of the first flight that decoded, falling back to $C.
   */
  toTelemetryLog(): TelemetryLog {
    const decoded = this.header.flights.map(entry => this.decodeEntry(entry));
    const flightUnit = decoded.find(f => f.sourceUnit !== null)?.sourceUnit;
    return {
      emsType: 'jpi-edm',
      model: this.modelString,
      aircraftId: this.tailNumber,
      downloadTime: this.downloadTime,
      sourceUnit: flightUnit ?? this.sourceUnit,
      sessions: decoded.map(f => f.session),
      warnings: [],
    };
  }

  private decodeEntry(entry: FlightIndex): DecodedFlight {
    const cached = this.flightsCache.get(entry.flightNumber);
    if (cached) return cached;

    const decoder = new FlightDecoder(entry, this.data, this.expectedOffset(entry));
    const decoded = { session: decoder.decode(), sourceUnit: decoder.sourceUnit };
    this.flightsCache.set(entry.flightNumber, decoded);
    return decoded;
  }

  /** Flights are stored back to back in index order. */
  private expectedOffset(entry: FlightIndex): number {
    let offset = this.header.binaryOffset;
    for (const f of this.header.flights) {
      if (f === entry) break;
      offset += f.dataLength;
    }
    return offset;
  }
}

export const jpiEdmParser: EmsParser = {
  type: 'jpi-edm',
  product: 'J.P. Instruments EDM 7xx/8xx/9xx',
  input: '.JPI binary download',
  detect: looksLikeJpi,
  parse: data => JpiEdmParser.fromBytes(data).toTelemetryLog(),
};
