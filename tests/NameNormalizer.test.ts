import { createHash } from 'crypto';
import { FALLBACK_COLUMN_NAME, NameNormalizer } from '../src/processor/NameNormalizer';
import { InvalidConfigError } from '../src/model/Errors';

const SAMPLE_HEADERS = [
  'Número Cliente',
  'Fecha-de Nacimiento (DD/MM)',
  '  ÇA VA?  ',
  'Straße',
  'İstanbul',
  'Año__2025',
  '__id__',
  'a - b -- c',
  '½ kilo',
  '¿Qué tal?',
  '',
  '!!!',
];

describe('NameNormalizer.normalizeName', () => {
  it('strips accents and converts to snake case', () => {
    expect(NameNormalizer.normalizeName('Número Cliente')).toBe('numero_cliente');
    expect(NameNormalizer.normalizeName('Fecha-de Nacimiento (DD/MM)')).toBe('fecha_de_nacimiento_dd_mm');
    expect(NameNormalizer.normalizeName('İstanbul')).toBe('istanbul');
  });

  it('collapses underscores and trims them at the edges', () => {
    expect(NameNormalizer.normalizeName('Año__2025')).toBe('ano_2025');
    expect(NameNormalizer.normalizeName('__id__')).toBe('id');
    expect(NameNormalizer.normalizeName('a - b -- c')).toBe('a_b_c');
  });

  it('falls back to columna for names with nothing left', () => {
    expect(NameNormalizer.normalizeName('')).toBe(FALLBACK_COLUMN_NAME);
    expect(NameNormalizer.normalizeName('  --  ')).toBe('columna');
    expect(NameNormalizer.normalizeName('!!!')).toBe('columna');
  });

  it('only produces lowercase word characters and underscores', () => {
    for (const header of SAMPLE_HEADERS) {
      const name = NameNormalizer.normalizeName(header);
      expect(name).toMatch(/^[\p{L}\p{N}_]+$/u);
      expect(name).toBe(name.toLowerCase());
      expect(name).not.toMatch(/\p{M}/u);
      expect(name).not.toMatch(/[\s-]/);
    }
  });

  it('is idempotent', () => {
    for (const header of SAMPLE_HEADERS) {
      const once = NameNormalizer.normalizeName(header);
      expect(NameNormalizer.normalizeName(once)).toBe(once);
    }
  });
});

describe('NameNormalizer.normalizeHeaders', () => {
  it('suffixes repeated names with an incrementing counter', () => {
    expect(NameNormalizer.normalizeHeaders(['Total', 'total', 'Total'])).toEqual(['total', 'total_1', 'total_2']);
  });

  it('keeps generated names unique against literal ones', () => {
    expect(NameNormalizer.normalizeHeaders(['total', 'total', 'total_1'])).toEqual(['total', 'total_1', 'total_1_1']);
  });

  it('deduplicates fallback names', () => {
    expect(NameNormalizer.normalizeHeaders(['', ' ', 'Columna'])).toEqual(['columna', 'columna_1', 'columna_2']);
  });
});

describe('NameNormalizer.safeFilename', () => {
  it('normalizes like column names', () => {
    expect(NameNormalizer.safeFilename('Número Cliente')).toBe('numero_cliente');
    expect(NameNormalizer.safeFilename('...')).toBe('columna');
  });

  it('never contains reserved characters', () => {
    const name = NameNormalizer.safeFilename('a/b:c*d?"e<f>g|h\\i');
    expect(name).toBe('a_b_c_d_e_f_g_h_i');
    expect(name).not.toMatch(/[\\/:*?"<>|]/);
  });

  it('truncates long names and appends a content hash', () => {
    const longName = 'a'.repeat(150);
    const hash = createHash('md5').update(longName).digest('hex').slice(0, 8);

    const name = NameNormalizer.safeFilename(longName);

    expect(name).toBe(`${'a'.repeat(91)}_${hash}`);
    expect(name).toHaveLength(100);
    expect(NameNormalizer.safeFilename(longName)).toBe(name);
  });

  it('honours a custom maximum length', () => {
    const name = NameNormalizer.safeFilename('b'.repeat(30), 20);
    expect(name).toHaveLength(20);
    expect(name.startsWith(`${'b'.repeat(11)}_`)).toBe(true);
    expect(NameNormalizer.safeFilename('b'.repeat(20), 20)).toBe('b'.repeat(20));
  });

  it('rejects maximum lengths that cannot hold the hash', () => {
    expect(() => NameNormalizer.safeFilename('name', 9)).toThrow(InvalidConfigError);
  });
});
