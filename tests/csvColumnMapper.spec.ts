import {
  DEFAULT_COLUMN_MAPPING,
  mapCsv,
  mappingWarnings,
  parseCsv,
  recognizedColumns,
  resolveColumnMapping,
} from '../src/services/csvColumnMapper';
import { CsvParseError, NoRecognizedColumnsError } from '../src/utils/errors';

describe('resolveColumnMapping', () => {
  test('maps every expected header that is present', () => {
    const mapping = resolveColumnMapping(['date', 'steps', 'totalSleep', 'weight', 'notes']);

    expect(mapping).toEqual({
      date: 'date',
      steps: 'steps',
      sleep_hours: 'totalSleep',
      body_weight: 'weight',
    });
  });

  test('falls back to a "Time" header for the date', () => {
    const mapping = resolveColumnMapping(['Time', 'steps']);
    expect(mapping.date).toBe('Time');
  });

  test('first date-like header in file order wins', () => {
    const mapping = resolveColumnMapping(['steps', 'sleepTime', 'Date', 'updateTime']);
    expect(mapping.date).toBe('sleepTime');
  });

  test('no fallback scan for fields other than the date', () => {
    const mapping = resolveColumnMapping(['Date', 'Steps', 'TotalSleep']);
    expect(mapping).toEqual({ date: 'Date' });
  });

  test('expected "date" header is preferred over earlier date-like headers', () => {
    const mapping = resolveColumnMapping(['timestamp', 'date']);
    expect(mapping.date).toBe('date');
  });

  test('honours a custom preferred mapping', () => {
    const mapping = resolveColumnMapping(['day', 'Schritte'], {
      ...DEFAULT_COLUMN_MAPPING,
      date: 'day',
      steps: 'Schritte',
    });
    expect(mapping).toEqual({ date: 'day', steps: 'Schritte' });
  });
});

describe('recognizedColumns', () => {
  test('lists mapped headers once, in canonical order', () => {
    expect(recognizedColumns({ body_weight: 'weight', date: 'Time', steps: 'steps' })).toEqual([
      'Time',
      'steps',
      'weight',
    ]);
  });
});

describe('parseCsv', () => {
  test('reads the first column when a header repeats', () => {
    const table = parseCsv('date,steps,steps\n2024-01-01,100,200\n');

    expect(table.headers).toEqual(['date', 'steps', 'steps']);
    expect(table.records).toEqual([{ row: 1, cells: { date: '2024-01-01', steps: '100' } }]);
  });

  test('short rows leave trailing headers absent', () => {
    const table = parseCsv('steps,date\n500\n');
    expect(table.records[0].cells).toEqual({ steps: '500' });
  });

  test('strips a byte-order mark and surrounding whitespace', () => {
    const table = parseCsv('\uFEFFdate , steps\n 2024-01-01 , 42 \n');
    expect(table.headers).toEqual(['date', 'steps']);
    expect(table.records[0].cells).toEqual({ date: '2024-01-01', steps: '42' });
  });

  test('an empty file fails at the parse step', () => {
    expect(() => parseCsv('')).toThrow(CsvParseError);
  });

  test('malformed quoting is a parse error', () => {
    expect(() => parseCsv('date,steps\n"2024-01-01,100\n')).toThrow(CsvParseError);
  });
});

describe('mapCsv', () => {
  test('returns records, mapping and recognized columns', () => {
    const mapped = mapCsv('Time,steps,minHeartRate\n2024-01-01 08:00:00,1200,48\n');

    expect(mapped.mapping).toEqual({ date: 'Time', steps: 'steps', min_heart_rate: 'minHeartRate' });
    expect(mapped.recognizedColumns).toEqual(['Time', 'steps', 'minHeartRate']);
    expect(mapped.records).toHaveLength(1);
  });

  test('signals no recognized columns and reports the headers found', () => {
    let caught: unknown;
    try {
      mapCsv('foo,bar\n1,2\n');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(NoRecognizedColumnsError);
    if (caught instanceof NoRecognizedColumnsError) {
      expect(caught.headers).toEqual(['foo', 'bar']);
      expect(caught.statusCode).toBe(422);
    }
  });

  test('a file with known columns but no date column carries a warning', () => {
    const mapped = mapCsv('steps,weight\n1200,70\n');

    expect(mapped.mapping).toEqual({ steps: 'steps', body_weight: 'weight' });
    expect(mapped.warnings).toEqual([
      'No date column found (expected "date" or a header containing "date" or "time"); every row will be skipped',
    ]);
  });

  test('no warnings when the date column resolves', () => {
    expect(mapCsv('Time,steps\n2024-01-01 08:00:00,1\n').warnings).toEqual([]);
  });

  test('an empty file is a parse error, not a mapping error', () => {
    expect(() => mapCsv('')).toThrow(CsvParseError);
  });
});

describe('mappingWarnings', () => {
  test('names the configured date header', () => {
    expect(mappingWarnings({ steps: 'Schritte' }, { ...DEFAULT_COLUMN_MAPPING, date: 'Tag' })).toEqual([
      'No date column found (expected "Tag" or a header containing "date" or "time"); every row will be skipped',
    ]);
  });
});
