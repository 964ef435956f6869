import { CellValue, DataSheet } from '../model/DataSheet';
import { MasterTable, SHEET_COLUMN } from '../model/MasterTable';
import { NameNormalizer } from './NameNormalizer';

export class SheetUnifier {
  /**
   * Normalizes the headers of every sheet, aligns all sheets on the union of
   * their columns (first-seen order) and concatenates their rows. Each row is
   * tagged with its sheet name in the trailing `_sheet` column.
   * @param sheetsData Sheets keyed by name, in read order. They are not modified.
   * @returns The master table.
   */
  static unify(sheetsData: Map<string, DataSheet>): MasterTable {
    const normalizedSheets = [...sheetsData.entries()].map(([sheetName, sheet]) => ({
      sheetName,
      columnNames: NameNormalizer.normalizeHeaders(sheet.columnNames),
      data: sheet.data,
    }));

    const allColumns: string[] = [];
    const seenColumns = new Set<string>();
    for (const sheet of normalizedSheets) {
      for (const col of sheet.columnNames) {
        if (!seenColumns.has(col)) {
          seenColumns.add(col);
          allColumns.push(col);
        }
      }
    }

    const data: CellValue[][] = [];
    for (const sheet of normalizedSheets) {
      const colIndexMap = new Map<string, number>();
      sheet.columnNames.forEach((col, idx) => colIndexMap.set(col, idx));

      for (const row of sheet.data) {
        const alignedRow = allColumns.map((col) => {
          const idx = colIndexMap.get(col);
          return idx !== undefined ? (row[idx] ?? null) : null;
        });
        alignedRow.push(sheet.sheetName);
        data.push(alignedRow);
      }
    }

    return {
      columnNames: [...allColumns, SHEET_COLUMN],
      data,
    };
  }
}
