import { buildJpiFile, flightHeader, padToWords, record } from './builder';

const FAHRENHEIT_HIGH_FLAGS = 0x1000; // bit 28 of the combined flags

/**
 * Flight 1: two Fahrenheit records, 6 s apart, starting 2024-03-14 10:30:00.
 * Flight 2: decode flags that disagree, so no records.
 */
export function sampleJpiFile(): Uint8Array {
  const flight1 = padToWords([
    ...flightHeader({
      flightNumber: 1,
      flagsHigh: FAHRENHEIT_HIGH_FLAGS,
      interval: 6,
      year: 2024, month: 3, day: 14,
      hour: 10, minute: 30,
    }),
    // EGT1, CHT1, OILT, OILP, VOLT, FF, MAP, RPM lo/hi, EGT1 hi
    ...record({
      decodeFlags: 0x67,
      fieldFlags: [0x01, 0x81, 0x92, 0x07, 0x01],
      signFlags: [0x00, 0x80, 0x92, 0x00],
      data: [36, 140, 50, 180, 99, 145, 5, 112, 8, 4],
    }),
    // EGT1 +10, RPM low -100
    ...record({
      decodeFlags: 0x21,
      fieldFlags: [0x01, 0x02],
      signFlags: [0x00, 0x02],
      data: [10, 100],
    }),
  ]);

  const flight2 = padToWords([
    ...flightHeader({
      flightNumber: 2,
      interval: 6,
      year: 2024, month: 3, day: 15,
      hour: 9, minute: 0,
    }),
    ...record({ decodeFlags: 0x0001, decodeFlagsCheck: 0x0002, fieldFlags: [], signFlags: [], data: [] }),
  ]);

  return buildJpiFile(
    [
      'U,N12345',
      'A,152,130,500,450,60,1650,230,90',
      'C,830,0,4096',
      'F,5,80,10,2950,2960',
      `D,1,${flight1.length / 2}`,
      `D,2,${flight2.length / 2}`,
      'T,3,14,24,10,30',
      'L,0',
    ],
    [flight1, flight2]
  );
}

/** Flight 7, recorded in Celsius, with CHT1 at 200 °C. */
export function celsiusFlight(): number[] {
  return padToWords([
    ...flightHeader({
      flightNumber: 7,
      interval: 2,
      year: 2023, month: 12, day: 1,
      hour: 8, minute: 15, second: 20,
    }),
    ...record({
      decodeFlags: 0x02,
      fieldFlags: [0x01],
      signFlags: [0x01],
      data: [40],
    }),
  ]);
}

export function celsiusJpiFile(): Uint8Array {
  const flight = celsiusFlight();
  return buildJpiFile(['U,C-GABC', 'C,930,0,0', `D,7,${flight.length / 2}`, 'L,0'], [flight]);
}
