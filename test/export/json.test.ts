import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { buildSessionArchive } from '../../src/export/archive';
import { sessionToCsv } from '../../src/export/csv';
import { parseStandardizedJson, toStandardizedDocument, toStandardizedJson } from '../../src/export/json';
import { FormatError } from '../../src/errors';
import { sampleLog } from './fixtures';

describe('standardized JSON', () => {
  it('serializes dates as ISO strings and engine data as plain objects', () => {
    const doc = toStandardizedDocument(sampleLog());
    expect(doc.format).toBe('aerotrace');
    expect(doc.version).toBe(1);
    expect(doc.downloadTime).toBe('2024-03-14T18:00:00.000Z');
    expect(doc.sessions[1]).toEqual({
      sessionNumber: 2,
      startTime: null,
      intervalSecs: 6,
      warnings: ['Could not locate flight data start marker'],
      records: [],
    });
    expect(doc.sessions[0].records[0].engine.egts).toEqual([
      { number: 1, value: 1300 },
      { number: 2, value: 1310 },
    ]);
  });

  it('rebuilds the log it was written from', () => {
    const original = sampleLog();
    const log = parseStandardizedJson(toStandardizedJson(original));

    expect(log.aircraftId).toBe('N-12345');
    expect(log.downloadTime).toEqual(original.downloadTime);
    expect(log.sessions[0].startTime).toEqual(original.sessions[0].startTime);
    expect(log.sessions[0].records[0].engine.toJSON()).toEqual(original.sessions[0].records[0].engine.toJSON());
    expect(log.sessions[0].records[1].timestamp).toBeNull();
    expect(log.sessions[0].durationHours).toBe(original.sessions[0].durationHours);
  });

  it('names the first invalid path', () => {
    const doc = { ...toStandardizedDocument(sampleLog()), version: 2 };
    expect(() => parseStandardizedJson(JSON.stringify(doc))).toThrow(FormatError);
    expect(() => parseStandardizedJson(JSON.stringify(doc))).toThrow(/^Invalid standardized document at version:/);
  });

  it('rejects cylinder numbers below 1', () => {
    const doc = toStandardizedDocument(sampleLog());
    doc.sessions[0].records[0].engine.chts = [{ number: 0, value: 380 }];
    expect(() => parseStandardizedJson(JSON.stringify(doc)))
      .toThrow(/^Invalid standardized document at sessions\.0\.records\.0\.engine\.chts\.0\.number:/);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseStandardizedJson('{not json')).toThrow(/^Invalid JSON:/);
  });
});

describe('buildSessionArchive', () => {
  it('stores every valid session as CSV', async () => {
    const log = sampleLog();
    const archive = await buildSessionArchive(log, 'original');

    expect(archive.filename).toBe('N12345_flights.zip');
    expect(archive.entries).toEqual(['N12345_flight_1_20240314.csv']);

    const zip = await JSZip.loadAsync(archive.data);
    expect(Object.keys(zip.files)).toEqual(['N12345_flight_1_20240314.csv']);
    const file = zip.file('N12345_flight_1_20240314.csv');
    expect(await file?.async('string')).toBe(sessionToCsv(log.sessions[0], 'fahrenheit'));
  });
});
