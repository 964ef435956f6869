import { CellValue } from '../model/DataSheet';
import { ColumnType, ColumnTypeMap } from '../model/ColumnType';
import { MasterTable, SHEET_COLUMN } from '../model/MasterTable';

// Plain decimal literal: optional sign, digits with an optional fraction, optional exponent.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export class TypeInferencer {
  /**
   * Parses a cell as a number independently of the locale. Non-finite numbers,
   * hex literals, thousands separators and empty text are not numeric.
   * @returns The number, or null when the value is null or not numeric.
   */
  static parseNumber(value: CellValue): number | null {
    if (value === null) {
      return null;
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }
    const text = value.trim();
    if (!DECIMAL_LITERAL.test(text)) {
      return null;
    }
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : null;
  }

  /**
   * Classifies one column. Null cells are ignored; a single non-numeric value
   * makes the whole column `string`.
   */
  static inferColumn(values: CellValue[]): ColumnType {
    let hasValues = false;
    let allIntegers = true;
    for (const value of values) {
      if (value === null) {
        continue;
      }
      hasValues = true;
      const parsed = this.parseNumber(value);
      if (parsed === null) {
        return 'string';
      }
      if (parsed % 1 !== 0) {
        allIntegers = false;
      }
    }
    if (!hasValues) {
      return 'string';
    }
    return allIntegers ? 'int' : 'float';
  }

  /**
   * Infers a type for every column of the master table, in column order.
   * `_sheet` is always `string`.
   */
  static infer(table: MasterTable): ColumnTypeMap {
    const types: ColumnTypeMap = new Map();
    table.columnNames.forEach((col, idx) => {
      if (col === SHEET_COLUMN) {
        types.set(col, 'string');
        return;
      }
      types.set(col, this.inferColumn(table.data.map((row) => row[idx] ?? null)));
    });
    return types;
  }
}
