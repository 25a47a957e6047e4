import fs from 'fs';
import { describe, expect, it } from 'vitest';
import { decodeJson } from '../decoder/jsonDecoder.js';
import { getStation } from '../stations/profiles.js';
import { MalformedPayloadError } from '../teletext/errors.js';
import { serializeRow } from '../teletext/serializer.js';
import type { JsonStation } from '../types/index.js';

const station = getStation('ntv');
if (station.format !== 'json') throw new Error('ntv is not a json station');
const ntv: JsonStation = station;

const fixture = fs.readFileSync(new URL('./fixtures/ntv-100.json', import.meta.url), 'utf8');

function cellPage(columns: unknown[]): unknown {
  return { content: { page: '100', row: [{ columns }] } };
}

describe('decodeJson', () => {
  it('decodes text and mosaic cells with their colors', () => {
    const { rows, address, warnings } = decodeJson(fixture, ntv);
    expect(address).toEqual({ page: 100 });
    expect(rows.map(serializeRow)).toEqual([
      JSON.stringify([['wl', 'n-tv Text'.padEnd(40)]]),
      JSON.stringify([['gbx', '█▌'], ['wb', ' '], ['wb', '101', 101], ['wb', ' '.repeat(34)]]),
    ]);
    expect(warnings).toEqual([]);
  });

  it('accepts an already parsed payload', () => {
    const { rows } = decodeJson(JSON.parse(fixture), ntv);
    expect(rows).toHaveLength(2);
  });

  it('takes the page number from the start of the page field', () => {
    const payload = { content: { page: '305-2', row: [{ columns: [{ value: 'x', font: '#fff', background: '#000' }] }] } };
    expect(decodeJson(payload, ntv).address).toEqual({ page: 305 });
  });

  it('rejects graphic cells that are not character codes', () => {
    const payload = cellPage([{ value: 'x', font: '#fff', background: '#000', graphic: true }]);
    expect(() => decodeJson(payload, ntv)).toThrow("Graphic cell value 'x' is not a character code");
  });

  it('rejects invalid JSON and unexpected shapes', () => {
    expect(() => decodeJson('{"content":', ntv)).toThrow('Payload is not valid JSON');
    expect(() => decodeJson({ content: { page: '100' } }, ntv)).toThrow(MalformedPayloadError);
    expect(() => decodeJson(cellPage([{ value: 'x', font: 'red', background: '#000' }]), ntv))
      .toThrow("Can't convert rgb value 'red'");
  });

  it('keeps each row element one display row', () => {
    const payload = cellPage([
      { value: 'a', font: '#fff', background: '#000' },
      { value: '\n', font: '#fff', background: '#000' },
      { value: 'b', font: '#fff', background: '#000' },
    ]);
    expect(() => decodeJson(payload, ntv)).toThrow('Cell in row 0 contains a line break');
  });

  it('degrades an invalid link to plain text', () => {
    const payload = cellPage([
      { value: 'a', font: '#fff', background: '#000', link: 'home' },
      { value: 'b', font: '#fff', background: '#000' },
    ]);
    const { rows, warnings } = decodeJson(payload, ntv);
    expect(rows.map(serializeRow)).toEqual(['[["wb","ab"]]']);
    expect(warnings).toEqual([{ kind: 'InvalidLinkTarget', message: "Invalid link target 'home'", row: 0 }]);
  });
});
