// Flight decoder for JPI EDM downloads
// Handles the binary delta-compressed records and normalizes them to EngineData

import { CylinderReadings, EngineData } from '../models/engine';
import { FlightSession } from '../models/session';
import { roundTo, toFahrenheit } from '../units';
import type { SourceTemperatureUnit } from '../types';
import type { FlightIndex } from './types';

// Byte positions inside the 128-field record.
// Two-byte values are [lowByte, highByte].
const FIELD_INDEX = {
  egt: [[0, 48], [1, 49], [2, 50], [3, 51], [4, 52], [5, 53]],
  cht: [8, 9, 10, 11, 12, 13],
  oilT: 15,
  oilP: 17,
  volt: 20,
  oat: 21,
  ff: 23,
  hp: 30,
  map: 40,
  rpm: [41, 42],
} as const;

const HIGH_BYTE_PAIRS: ReadonlyArray<readonly [number, number]> = [...FIELD_INDEX.egt, FIELD_INDEX.rpm];

const NUM_FIELDS = 128;
const DEFAULT_VALUE = 0xF0; // 240
export const FLIGHT_HEADER_SIZE = 28; // 14 x 16-bit words
const FAHRENHEIT_FLAG_BIT = 28;

export class FlightDecoder {
  readonly flightNumber: number;

  private data: DataView;
  private searchFrom: number;
  private dataLength: number;
  private flightStart: number = 0;
  private flags: number | null = null;
  private session: FlightSession;

  constructor(indexEntry: FlightIndex, data: DataView, searchFrom: number) {
    this.flightNumber = indexEntry.flightNumber;
    this.dataLength = indexEntry.dataLength;
    this.data = data;
    this.searchFrom = searchFrom;
    this.session = new FlightSession(indexEntry.flightNumber);
  }

  /** Temperature unit from the flight header, or null until a header has been decoded. */
  get sourceUnit(): SourceTemperatureUnit | null {
    if (this.flags === null) return null;
    return ((this.flags >>> FAHRENHEIT_FLAG_BIT) & 1) === 1 ? 'fahrenheit' : 'celsius';
  }

  decode(): FlightSession {
    const warnings = this.session.warnings;
    try {
      const flightStart = this.findFlightStart();
      if (flightStart === null) {
        warnings.push('Could not locate flight data start marker');
        return this.session;
      }
      this.flightStart = flightStart;

      if (this.flightStart + this.dataLength > this.data.byteLength) {
        warnings.push(
          `Flight data extends beyond file (start=${this.flightStart}, length=${this.dataLength}, fileSize=${this.data.byteLength})`
        );
        return this.session;
      }

      if (this.dataLength < FLIGHT_HEADER_SIZE) {
        warnings.push(`Flight data too short (${this.dataLength} bytes, need ${FLIGHT_HEADER_SIZE})`);
        return this.session;
      }

      this.decodeFlightHeader();
      this.decodeRecords();
    } catch (e) {
      warnings.push(`Parse error: ${e instanceof Error ? e.message : String(e)}`);
    }
    return this.session;
  }

  private findFlightStart(): number | null {
    const high = (this.flightNumber >> 8) & 0xFF;
    const low = this.flightNumber & 0xFF;

    for (let pos = this.searchFrom; pos <= this.data.byteLength - FLIGHT_HEADER_SIZE; pos++) {
      if (this.data.getUint8(pos) === high && this.data.getUint8(pos + 1) === low) {
        return pos;
      }
    }
    return null;
  }

  private decodeFlightHeader(): void {
    const words: number[] = [];
    for (let i = 0; i < 14; i++) {
      words.push(this.data.getUint16(this.flightStart + i * 2, false));
    }

    this.flags = (words[1] | (words[2] << 16)) >>> 0;
    this.session.intervalSecs = words[11];

    // Date: day:5, month:4, year:7
    const dateBits = words[12];
    const day = dateBits & 0x1F;
    const month = (dateBits >> 5) & 0x0F;
    const year = ((dateBits >> 9) & 0x7F) + 2000;

    // Time: secs/2:5, mins:6, hrs:5
    const timeBits = words[13];
    const secs = (timeBits & 0x1F) * 2;
    const mins = (timeBits >> 5) & 0x3F;
    const hrs = (timeBits >> 11) & 0x1F;

    const date = new Date(year, month - 1, day, hrs, mins, secs);
    if (month < 1 || month > 12 || day < 1 || isNaN(date.getTime())) {
      this.session.warnings.push('Invalid date/time in flight header');
    } else {
      this.session.startTime = date;
    }

    if (this.session.intervalSecs <= 0) {
      this.session.warnings.push(
        `Invalid recording interval (${this.session.intervalSecs}), using default of ${this.session.interval} seconds`
      );
      this.session.intervalSecs = this.session.interval;
    }
  }

  private decodeRecords(): void {
    const dataStart = this.flightStart + FLIGHT_HEADER_SIZE;
    const dataEnd = this.flightStart + this.dataLength;

    if (dataStart >= dataEnd) {
      this.session.warnings.push('No data records present after flight header');
      return;
    }

    const defaultValues: number[] = new Array(NUM_FIELDS).fill(DEFAULT_VALUE);
    defaultValues[FIELD_INDEX.hp] = 0;
    for (const [, high] of HIGH_BYTE_PAIRS) {
      defaultValues[high] = 0;
    }

    const previousValues: Array<number | null> = new Array(NUM_FIELDS).fill(null);
    const stepMs = this.session.interval * 1000;
    let currentTime = this.session.startTime?.getTime() ?? null;
    let offset = dataStart;

    while (offset < dataEnd - 5) {
      // One leading byte with no known meaning
      offset += 1;

      const decodeFlags = this.data.getUint16(offset, false);
      const decodeFlagsCheck = this.data.getUint16(offset + 2, false);
      offset += 4;

      const repeatCount = this.data.getUint8(offset);
      offset += 1;

      if (decodeFlags !== decodeFlagsCheck) {
        if (this.session.records.length === 0) {
          this.session.warnings.push(
            `Decode flags mismatch at start of data (0x${decodeFlags.toString(16)} vs 0x${decodeFlagsCheck.toString(16)})`
          );
        }
        break;
      }

      if (currentTime !== null) {
        currentTime += repeatCount * stepMs;
      }

      const fieldFlags = new Array<number>(16).fill(0);
      const signFlags = new Array<number>(16).fill(0);

      for (let i = 0; i < 16 && offset < dataEnd; i++) {
        if ((decodeFlags & (1 << i)) !== 0) {
          fieldFlags[i] = this.data.getUint8(offset++);
        }
      }

      // Groups 6 and 7 carry no sign byte
      for (let i = 0; i < 16 && offset < dataEnd; i++) {
        if ((decodeFlags & (1 << i)) !== 0 && i !== 6 && i !== 7) {
          signFlags[i] = this.data.getUint8(offset++);
        }
      }

      const isFlagged = (flags: number[], k: number) => (flags[k >> 3] & (1 << (k & 7))) !== 0;
      const negative = new Array<boolean>(NUM_FIELDS);
      for (let k = 0; k < NUM_FIELDS; k++) {
        negative[k] = isFlagged(signFlags, k);
      }
      // High bytes share the sign of their low byte
      for (const [low, high] of HIGH_BYTE_PAIRS) {
        negative[high] = negative[low];
      }

      const values = new Array<number>(NUM_FIELDS).fill(0);
      for (let k = 0; k < NUM_FIELDS; k++) {
        let value = previousValues[k];

        if (isFlagged(fieldFlags, k)) {
          if (offset >= dataEnd) break;
          const raw = this.data.getUint8(offset++);
          const diff = negative[k] ? -raw : raw;

          if (!(value === null && diff === 0)) {
            value = (value ?? defaultValues[k]) + diff;
            previousValues[k] = value;
          }
        }

        values[k] = value ?? 0;
      }

      this.session.records.push({
        timestamp: currentTime !== null ? new Date(currentTime) : null,
        engine: this.normalize(values),
      });

      if (currentTime !== null) {
        currentTime += stepMs;
      }
    }
  }

  /**
   * Zero means the sensor is absent or reported nothing.
   */
  private normalize(values: number[]): EngineData {
    const unit = this.sourceUnit ?? 'fahrenheit';
    const word = ([low, high]: readonly [number, number]) => values[low] + (values[high] << 8);
    const present = (value: number) => value === 0 ? null : value;
    const temperature = (value: number) => value === 0 ? null : toFahrenheit(value, unit);
    const tenths = (value: number) => value <= 0 ? null : roundTo(value / 10, 1);

    return new EngineData({
      rpm: present(word(FIELD_INDEX.rpm)),
      manifoldPressure: tenths(values[FIELD_INDEX.map]),
      egts: CylinderReadings.fromValues(FIELD_INDEX.egt.map(pair => temperature(word(pair)))),
      chts: CylinderReadings.fromValues(FIELD_INDEX.cht.map(index => temperature(values[index]))),
      oilTemperature: temperature(values[FIELD_INDEX.oilT]),
      oilPressure: present(values[FIELD_INDEX.oilP]),
      fuelFlow: tenths(values[FIELD_INDEX.ff]),
      volts: tenths(values[FIELD_INDEX.volt]),
      outsideAirTemperature: temperature(values[FIELD_INDEX.oat]),
    });
  }
}
