import { TypeInferencer } from '../src/processor/TypeInferencer';
import { MasterTable } from '../src/model/MasterTable';

describe('TypeInferencer.parseNumber', () => {
  it('parses numbers and decimal text independently of the locale', () => {
    expect(TypeInferencer.parseNumber(7)).toBe(7);
    expect(TypeInferencer.parseNumber('  -12 ')).toBe(-12);
    expect(TypeInferencer.parseNumber('.5')).toBe(0.5);
    expect(TypeInferencer.parseNumber('+4.')).toBe(4);
    expect(TypeInferencer.parseNumber('1e3')).toBe(1000);
  });

  it('treats anything else as not numeric', () => {
    expect(TypeInferencer.parseNumber(null)).toBeNull();
    expect(TypeInferencer.parseNumber('')).toBeNull();
    expect(TypeInferencer.parseNumber('abc')).toBeNull();
    expect(TypeInferencer.parseNumber('1,5')).toBeNull();
    expect(TypeInferencer.parseNumber('0x10')).toBeNull();
    expect(TypeInferencer.parseNumber('NaN')).toBeNull();
    expect(TypeInferencer.parseNumber('Infinity')).toBeNull();
    expect(TypeInferencer.parseNumber(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('TypeInferencer.inferColumn', () => {
  it('classifies all-integer columns as int', () => {
    expect(TypeInferencer.inferColumn([1, 2, 3])).toBe('int');
    expect(TypeInferencer.inferColumn(['1', '2.0', ' 3 ', null])).toBe('int');
  });

  it('classifies numeric columns with a fraction as float', () => {
    expect(TypeInferencer.inferColumn([1, 2.5, 3])).toBe('float');
    expect(TypeInferencer.inferColumn([null, '4.25'])).toBe('float');
  });

  it('demotes the whole column to string on a single non-numeric value', () => {
    expect(TypeInferencer.inferColumn([1, 'a', 3])).toBe('string');
    expect(TypeInferencer.inferColumn(['1,5', 2])).toBe('string');
  });

  it('classifies empty and all-null columns as string', () => {
    expect(TypeInferencer.inferColumn([])).toBe('string');
    expect(TypeInferencer.inferColumn([null, null])).toBe('string');
  });
});

describe('TypeInferencer.infer', () => {
  it('types every column in column order and forces _sheet to string', () => {
    const table: MasterTable = {
      columnNames: ['monto', 'id', 'vacio', '_sheet'],
      data: [
        [1.5, 1, null, '2024'],
        ['2', 2, null, '2025'],
      ],
    };

    const types = TypeInferencer.infer(table);

    expect([...types.entries()]).toEqual([
      ['monto', 'float'],
      ['id', 'int'],
      ['vacio', 'string'],
      ['_sheet', 'string'],
    ]);
  });
});
