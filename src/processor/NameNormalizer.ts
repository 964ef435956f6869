import { createHash } from 'crypto';
import { InvalidConfigError } from '../model/Errors';

export const FALLBACK_COLUMN_NAME = 'columna';

const COMBINING_MARKS = /\p{M}/gu;
const NON_NAME_CHARS = /[^\p{L}\p{N}_\s-]/gu;
const SEPARATOR_RUNS = /[\s-]+/g;
const UNDERSCORE_RUNS = /_+/g;
const EDGE_UNDERSCORES = /^_+|_+$/g;
const RESERVED_FILENAME_CHARS = /[\\/:*?"<>|]+/g;
const EDGE_DOTS_AND_SPACES = /^[ .]+|[ .]+$/g;
const HASH_LENGTH = 8;

export class NameNormalizer {
  /**
   * Turns a raw header into a lowercase, accent-free, underscore-delimited name.
   * Headers that normalize to nothing become `columna`.
   */
  static normalizeName(raw: string): string {
    return this.toSnakeCase(raw) || FALLBACK_COLUMN_NAME;
  }

  /**
   * Normalizes the headers of one sheet, keeping the first occurrence of a name
   * and suffixing later ones with `_1`, `_2`, ...
   */
  static normalizeHeaders(rawNames: string[]): string[] {
    const used = new Set<string>();
    const counters = new Map<string, number>();

    return rawNames.map((raw) => {
      const base = this.normalizeName(raw);
      let candidate = base;
      if (used.has(base)) {
        let counter = counters.get(base) ?? 0;
        do {
          counter += 1;
          candidate = `${base}_${counter}`;
        } while (used.has(candidate));
        counters.set(base, counter);
      }
      used.add(candidate);
      return candidate;
    });
  }

  /**
   * Builds a short file name (without extension) for a column. Names longer than
   * `maxLen` are truncated and tagged with the first 8 hex chars of their MD5.
   */
  static safeFilename(raw: string, maxLen: number = 100): string {
    if (!Number.isInteger(maxLen) || maxLen <= HASH_LENGTH + 1) {
      throw new InvalidConfigError(`maxFilenameLength must be an integer greater than ${HASH_LENGTH + 1}, got ${maxLen}`);
    }

    let base = this.toSnakeCase(raw)
      .replace(RESERVED_FILENAME_CHARS, '_')
      .replace(EDGE_DOTS_AND_SPACES, '');
    if (!base) {
      base = FALLBACK_COLUMN_NAME;
    }

    const chars = Array.from(base);
    if (chars.length > maxLen) {
      const hash = createHash('md5').update(base, 'utf8').digest('hex').slice(0, HASH_LENGTH);
      base = `${chars.slice(0, maxLen - HASH_LENGTH - 1).join('')}_${hash}`;
    }
    return base;
  }

  // Lowercased on both sides of NFKD: İ only sheds its mark once lowercased, ℌ only becomes a capital H once decomposed.
  private static stripAccents(value: string): string {
    return value.toLowerCase().normalize('NFKD').replace(COMBINING_MARKS, '').toLowerCase();
  }

  private static toSnakeCase(raw: string): string {
    return this.stripAccents(raw.trim())
      .replace(NON_NAME_CHARS, ' ')
      .replace(SEPARATOR_RUNS, '_')
      .replace(UNDERSCORE_RUNS, '_')
      .replace(EDGE_UNDERSCORES, '');
  }
}
