// src/model/MasterTable.ts
import { CellValue } from './DataSheet';

export const SHEET_COLUMN = '_sheet';

/**
 * All sheets concatenated after header alignment. The last column is always
 * `_sheet`; row `i` of `data` has row index `i`.
 */
export interface MasterTable {
  columnNames: string[];
  data: CellValue[][];
}
