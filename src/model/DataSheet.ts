// src/model/DataSheet.ts

/**
 * A single spreadsheet cell as read from the source file. Numbers and text are
 * kept apart so the type inferencer sees the rawest possible value.
 */
export type CellValue = null | number | string;

export interface DataSheet {
  name: string;
  columnNames: string[];
  data: CellValue[][];
}
