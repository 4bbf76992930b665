// Standardized engine data model shared by every EMS parser
//
// Temperatures are degrees Fahrenheit, pressures PSI (manifold pressure inHg),
// electrical values Volts / Amps, fuel flow GPH, G-force a multiplier.

import { ModelValidationError } from '../errors';

export class CylinderReading {
  readonly number: number;
  readonly value: number;

  constructor(number: number, value: number) {
    if (!Number.isInteger(number) || number < 1) {
      throw new ModelValidationError('Cylinder number must be >= 1');
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ModelValidationError('Temperature value must be numeric');
    }
    this.number = number;
    this.value = value;
  }
}

/**
 * Ordered collection of EGT or CHT readings.
 */
export class CylinderReadings implements Iterable<CylinderReading> {
  private readonly readings: CylinderReading[];

  constructor(readings: CylinderReading[] = []) {
    this.readings = [...readings];
  }

  /**
   * Build readings numbered from 1; null entries are skipped but keep their number.
   */
  static fromValues(values: Array<number | null>): CylinderReadings {
    const readings: CylinderReading[] = [];
    values.forEach((value, i) => {
      if (value !== null) readings.push(new CylinderReading(i + 1, value));
    });
    return new CylinderReadings(readings);
  }

  [Symbol.iterator](): Iterator<CylinderReading> {
    return this.readings[Symbol.iterator]();
  }

  get length(): number {
    return this.readings.length;
  }

  at(index: number): CylinderReading {
    const reading = this.readings[index];
    if (reading === undefined) {
      throw new RangeError(`Cylinder reading index ${index} out of range (length ${this.readings.length})`);
    }
    return reading;
  }

  byNumber(number: number): CylinderReading | null {
    return this.readings.find(r => r.number === number) ?? null;
  }

  toArray(): CylinderReading[] {
    return [...this.readings];
  }

  /** Highest reading; the first one wins a tie. */
  hottest(): CylinderReading | null {
    let best: CylinderReading | null = null;
    for (const reading of this.readings) {
      if (best === null || reading.value > best.value) best = reading;
    }
    return best;
  }

  /** Lowest reading; the first one wins a tie. */
  coolest(): CylinderReading | null {
    let best: CylinderReading | null = null;
    for (const reading of this.readings) {
      if (best === null || reading.value < best.value) best = reading;
    }
    return best;
  }

  /** Spread between hottest and coolest cylinder. */
  difference(): number | null {
    const hottest = this.hottest();
    const coolest = this.coolest();
    if (hottest === null || coolest === null) return null;
    return hottest.value - coolest.value;
  }

  get highestCylinder(): number {
    return this.readings.reduce((max, r) => Math.max(max, r.number), 0);
  }
}

export interface EngineDataInit {
  rpm?: number | null;
  manifoldPressure?: number | null;
  egts?: CylinderReadings;
  chts?: CylinderReadings;
  oilPressure?: number | null;
  oilTemperature?: number | null;
  fuelPressure?: number | null;
  fuelFlow?: number | null;
  volts?: number | null;
  amps?: number | null;
  gForce?: number | null;
  outsideAirTemperature?: number | null;
}

/** Scalar channels of {@link EngineData}, in export order. */
export const SCALAR_CHANNELS = [
  'rpm',
  'manifoldPressure',
  'oilTemperature',
  'oilPressure',
  'fuelPressure',
  'fuelFlow',
  'volts',
  'amps',
  'gForce',
  'outsideAirTemperature',
] as const;

export type ScalarChannel = typeof SCALAR_CHANNELS[number];

export type CylinderChannel = 'egts' | 'chts';

export type EngineChannel = ScalarChannel | CylinderChannel;

export const TEMPERATURE_CHANNELS: ReadonlySet<EngineChannel> = new Set<EngineChannel>([
  'egts', 'chts', 'oilTemperature', 'outsideAirTemperature',
]);

export interface CylinderReadingJson {
  number: number;
  value: number;
}

export type EngineDataJson = Record<ScalarChannel, number | null> & {
  egts: CylinderReadingJson[];
  chts: CylinderReadingJson[];
};

export class EngineData {
  rpm: number | null;
  manifoldPressure: number | null; // inHg

  egts: CylinderReadings;
  chts: CylinderReadings;

  oilPressure: number | null;
  oilTemperature: number | null;

  fuelPressure: number | null;
  fuelFlow: number | null; // GPH

  volts: number | null;
  amps: number | null;

  gForce: number | null;
  outsideAirTemperature: number | null;

  constructor(init: EngineDataInit = {}) {
    this.rpm = init.rpm ?? null;
    this.manifoldPressure = init.manifoldPressure ?? null;
    this.egts = init.egts ?? new CylinderReadings();
    this.chts = init.chts ?? new CylinderReadings();
    this.oilPressure = init.oilPressure ?? null;
    this.oilTemperature = init.oilTemperature ?? null;
    this.fuelPressure = init.fuelPressure ?? null;
    this.fuelFlow = init.fuelFlow ?? null;
    this.volts = init.volts ?? null;
    this.amps = init.amps ?? null;
    this.gForce = init.gForce ?? null;
    this.outsideAirTemperature = init.outsideAirTemperature ?? null;
  }

  static fromJSON(json: EngineDataJson): EngineData {
    const toReadings = (list: CylinderReadingJson[]) =>
      new CylinderReadings(list.map(r => new CylinderReading(r.number, r.value)));

    return new EngineData({
      ...json,
      egts: toReadings(json.egts),
      chts: toReadings(json.chts),
    });
  }

  toJSON(): EngineDataJson {
    const toList = (readings: CylinderReadings) =>
      readings.toArray().map(r => ({ number: r.number, value: r.value }));

    return {
      rpm: this.rpm,
      manifoldPressure: this.manifoldPressure,
      oilTemperature: this.oilTemperature,
      oilPressure: this.oilPressure,
      fuelPressure: this.fuelPressure,
      fuelFlow: this.fuelFlow,
      volts: this.volts,
      amps: this.amps,
      gForce: this.gForce,
      outsideAirTemperature: this.outsideAirTemperature,
      egts: toList(this.egts),
      chts: toList(this.chts),
    };
  }
}
