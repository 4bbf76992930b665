import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { detectEmsType, isEmsType, listEmsTypes, parseEmsData, parseEmsFile } from '../src/registry';
import { FormatError, UnsupportedFormatError } from '../src/errors';
import { sampleJpiFile } from './jpi/fixtures';
import { encodeText, SAMPLE_LOG } from './cgr30p/fixtures';

describe('registry', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aerotrace-registry-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists the supported EMS types', () => {
    expect(listEmsTypes().map(t => t.type)).toEqual(['jpi-edm', 'cgr30p']);
    expect(isEmsType('cgr30p')).toBe(true);
    expect(isEmsType('g1000')).toBe(false);
  });

  it('detects each format', () => {
    expect(detectEmsType(sampleJpiFile())).toBe('jpi-edm');
    expect(detectEmsType(encodeText(SAMPLE_LOG))).toBe('cgr30p');
    expect(detectEmsType(encodeText('hello world'))).toBeNull();
  });

  it('parses with the detected parser', () => {
    expect(parseEmsData(encodeText(SAMPLE_LOG)).aircraftId).toBe('N456CG');
    expect(parseEmsData(sampleJpiFile()).aircraftId).toBe('N12345');
  });

  it('raises UnsupportedFormatError for unknown data', () => {
    expect(() => parseEmsData(encodeText('hello world')))
      .toThrow(new UnsupportedFormatError('Unrecognized EMS data; supported types: jpi-edm, cgr30p'));
  });

  it('uses the requested parser without detection', () => {
    expect(() => parseEmsData(encodeText('hello world'), { emsType: 'cgr30p' })).toThrow(FormatError);
  });

  it('passes parse options through', () => {
    const text = 'Date,Time,RPM\n04/02/2024,10:00:00,2400\n04/02/2024,10:00:30,2400\n';
    expect(parseEmsData(encodeText(text), { sessionGapSecs: 10 }).sessions).toHaveLength(2);
  });

  it('reads files from disk', async () => {
    const path = join(dir, 'sample.jpi');
    await writeFile(path, sampleJpiFile());
    const log = await parseEmsFile(path);
    expect(log.emsType).toBe('jpi-edm');
    expect(log.sessions[0].records).toHaveLength(2);
  });
});
