import * as fs from 'fs';
import * as path from 'path';
import { CsvProcessor, UTF8_BOM } from '../processor/CsvProcessor';
import { NameNormalizer } from '../processor/NameNormalizer';
import { CellValue } from '../model/DataSheet';
import { MasterTable } from '../model/MasterTable';
import { ColumnType, ColumnTypeMap } from '../model/ColumnType';
import { DEFAULT_MAX_FILENAME_LENGTH } from '../model/RunConf';

export const MASTER_FILE_NAME = 'master.csv';
export const COLUMNS_FOLDER_NAME = 'columns';
export const ROW_INDEX_COLUMN = 'row_index';

export class CsvGenerator {
  /**
   * Writes a UTF-8 CSV file with a byte-order mark, creating the folder if needed.
   * @param columnNames Header row.
   * @param data Data rows.
   * @param outputFolder The folder where the CSV file will be saved.
   * @param fileName Name of the file inside `outputFolder`.
   * @param columnTypes Type of each column, by position.
   * @returns The path of the written file.
   */
  static generateCsvFile(
    columnNames: string[],
    data: CellValue[][],
    outputFolder: string,
    fileName: string,
    columnTypes: ReadonlyArray<ColumnType | undefined> = []
  ): string {
    try {
      // Ensure the output folder exists
      fs.mkdirSync(outputFolder, { recursive: true });

      // Prepare the headers and data for the CSV
      const csvContent = CsvProcessor.generateCSV(columnNames, data, columnTypes);

      // Write the CSV content, prefixed with a UTF-8 BOM
      const outputFilePath = path.join(outputFolder, fileName);
      fs.writeFileSync(outputFilePath, UTF8_BOM + csvContent, 'utf8');
      return outputFilePath;
    } catch (error: unknown) {
      console.error(`Error generating CSV file ${fileName}:`, error instanceof Error ? error.message : error);
      throw error;
    }
  }

  /** Writes the whole master table to `master.csv`, without a row index. */
  static generateMasterFile(table: MasterTable, outputFolder: string, types?: ColumnTypeMap): string {
    const columnTypes = table.columnNames.map((col) => types?.get(col));
    return this.generateCsvFile(table.columnNames, table.data, outputFolder, MASTER_FILE_NAME, columnTypes);
  }

  /**
   * Writes one `row_index,<column>` CSV per master column under `columns/`.
   * File names come from {@link NameNormalizer.safeFilename}; a name already
   * used in this run or already on disk gets `_2`, `_3`, ... appended.
   * @returns The paths of the written files, in column order.
   */
  static generateColumnFiles(
    table: MasterTable,
    outputFolder: string,
    maxFilenameLength: number = DEFAULT_MAX_FILENAME_LENGTH,
    types?: ColumnTypeMap
  ): string[] {
    // Ensure the columns folder exists
    const columnsFolder = path.join(outputFolder, COLUMNS_FOLDER_NAME);
    fs.mkdirSync(columnsFolder, { recursive: true });

    const usedNames = new Set<string>();
    return table.columnNames.map((col, idx) => {
      const baseName = NameNormalizer.safeFilename(col, maxFilenameLength);
      let candidate = baseName;
      let counter = 1;
      // Skip names taken earlier in this run or left by a previous one
      while (usedNames.has(candidate) || fs.existsSync(path.join(columnsFolder, `${candidate}.csv`))) {
        counter += 1;
        candidate = `${baseName}_${counter}`;
      }
      usedNames.add(candidate);

      const rows = table.data.map((row, rowIdx) => [rowIdx, row[idx] ?? null]);
      return this.generateCsvFile([ROW_INDEX_COLUMN, col], rows, columnsFolder, `${candidate}.csv`, [
        'int',
        types?.get(col),
      ]);
    });
  }
}
