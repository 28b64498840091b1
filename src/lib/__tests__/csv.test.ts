import { describe, it, expect } from 'vitest';
import { decodeText, parseCsv, toCsv } from '../csv';
import { Dataset } from '../dataset';
import { FormatError } from '../errors';
import { parseDataset } from '../loader';
import { captureError, record } from './helpers';

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(Buffer.from('Babić', 'utf-8'))).toEqual({ text: 'Babić', encoding: 'utf-8' });
  });

  it('drops a UTF-8 byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('id', 'utf-8')]);
    expect(decodeText(bytes).text).toBe('id');
  });

  it('falls back to latin-1 on invalid UTF-8', () => {
    expect(decodeText(Buffer.from([0x4a, 0x6f, 0x73, 0xe9]))).toEqual({ text: 'José', encoding: 'latin1' });
  });
});

describe('parseCsv', () => {
  it('splits the header from the rows and trims header names', () => {
    expect(parseCsv(' id , name\n1,Ana\n')).toEqual({
      header: ['id', 'name'],
      rows: [['1', 'Ana']],
    });
  });

  it('keeps quoted commas inside a cell', () => {
    expect(parseCsv('name,term\n"Horvat, Ana",2025-01').rows).toEqual([['Horvat, Ana', '2025-01']]);
  });

  it('pads short rows to the header width', () => {
    expect(parseCsv('a,b,c\n1\n').rows).toEqual([['1', '', '']]);
  });

  it('reports unterminated quotes with the source name', () => {
    const err = captureError(() => parseCsv('a,b\n"1,2\n', 'broken.csv'));
    expect(err).toBeInstanceOf(FormatError);
    expect(err).toMatchObject({ kind: 'format', message: expect.stringContaining("'broken.csv'") });
  });
});

describe('toCsv', () => {
  it('writes canonical headers and rows in order', () => {
    const dataset = Dataset.fromRecords([
      record(1, 'Ana', 'Horvat', '2025-01', 92, 5),
      record(2, 'Ivan', 'Perić', '2025-06', 40, 1),
    ]);

    expect(toCsv(dataset)).toBe(
      'student_id,first_name,last_name,term,score,grade\n1,Ana,Horvat,2025-01,92,5\n2,Ivan,Perić,2025-06,40,1'
    );
  });

  it('quotes cells that contain the delimiter', () => {
    const dataset = Dataset.fromRecords([record(1, 'Ana, Marija', 'Horvat', '2025-01', 92, 5)]);

    expect(toCsv(dataset).split('\n')[1]).toBe('1,"Ana, Marija",Horvat,2025-01,92,5');
    expect(parseDataset(toCsv(dataset)).records()).toEqual(dataset.records());
  });

  it('writes only the header for an empty dataset', () => {
    expect(toCsv(Dataset.empty())).toBe('student_id,first_name,last_name,term,score,grade');
  });
});
