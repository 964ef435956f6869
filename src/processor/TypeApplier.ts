import { CellValue } from '../model/DataSheet';
import { COLUMN_TYPES, CoercionResult, ColumnType } from '../model/ColumnType';
import { MasterTable } from '../model/MasterTable';
import { TypeInferencer } from './TypeInferencer';

export class TypeApplier {
  /**
   * Coerces the columns named in `types` and returns a new table. A column whose
   * tag is unknown or whose coercion fails is written as text instead; columns
   * missing from `types` are copied unchanged.
   */
  static apply(table: MasterTable, types: ReadonlyMap<string, string>): MasterTable {
    const columns = table.columnNames.map((col, idx) => {
      const values = table.data.map((row) => row[idx] ?? null);
      const type = types.get(col);
      if (type === undefined) {
        return values;
      }
      const result = this.isColumnType(type) ? this.coerceColumn(col, values, type) : this.toText(values);
      return result.ok ? result.values : this.toText(values).values;
    });

    return {
      columnNames: [...table.columnNames],
      data: table.data.map((_, rowIdx) => columns.map((values) => values[rowIdx] ?? null)),
    };
  }

  static isColumnType(type: string): type is ColumnType {
    return COLUMN_TYPES.some((columnType) => columnType === type);
  }

  static coerceColumn(column: string, values: CellValue[], type: ColumnType): CoercionResult {
    switch (type) {
      case 'string':
        return this.toText(values);
      case 'float':
        return { ok: true, values: values.map((value) => TypeInferencer.parseNumber(value)) };
      case 'int': {
        const parsed = values.map((value) => TypeInferencer.parseNumber(value));
        const badValue = parsed.find((value) => value !== null && !Number.isSafeInteger(value));
        if (badValue !== undefined) {
          return { ok: false, failure: { column, reason: `${badValue} is not a safe integer` } };
        }
        return { ok: true, values: parsed };
      }
    }
  }

  private static toText(values: CellValue[]): { ok: true; values: CellValue[] } {
    return { ok: true, values: values.map((value) => (value === null ? null : String(value))) };
  }
}
