import * as Papa from 'papaparse';
import { CellValue } from '../model/DataSheet';
import { ColumnType } from '../model/ColumnType';

export const UTF8_BOM = '\uFEFF';

// Beyond this magnitude String() switches to exponent notation
const MAX_PLAIN_INTEGER = 1e21;

export class CsvProcessor {
  /**
   * Generates a CSV string from headers and data using PapaParse.
   * Null cells become empty fields; fields are quoted only when they need it.
   * @param headers The headers for the CSV file.
   * @param data The data rows for the CSV file.
   * @param columnTypes Type of each column, by position; `float` columns keep a decimal point.
   * @returns A CSV string.
   */
  static generateCSV(
    headers: string[],
    data: CellValue[][],
    columnTypes: ReadonlyArray<ColumnType | undefined> = []
  ): string {
    // Render every cell as text before handing the rows to PapaParse
    const rows = data.map((row) => row.map((value, idx) => this.formatCell(value, columnTypes[idx])));
    const csvData = [headers, ...rows];

    // Use PapaParse to generate the CSV string
    return Papa.unparse(csvData, {
      quotes: false, // Quote only fields that contain a delimiter, quote or newline
      delimiter: ',',
      newline: '\n',
    });
  }

  /** Integral values of a `float` column are written as `3.0` so the column still reads as decimal. */
  static formatCell(value: CellValue, type?: ColumnType): string {
    if (value === null) {
      return '';
    }
    if (type === 'float' && typeof value === 'number' && Number.isInteger(value) && Math.abs(value) < MAX_PLAIN_INTEGER) {
      return value.toFixed(1);
    }
    return String(value);
  }

  /**
   * Parses a CSV string into headers and data using PapaParse.
   * A leading byte-order mark is dropped.
   * @param csvString The CSV string to parse.
   * @returns An object containing headers and data.
   */
  static parseCSV(csvString: string): { headers: string[]; data: string[][] } {
    const content = csvString.startsWith(UTF8_BOM) ? csvString.slice(UTF8_BOM.length) : csvString;

    // Use PapaParse to parse the CSV string
    const result = Papa.parse<string[]>(content, {
      header: false, // The first row is returned as data and split off below
      delimiter: ',',
      skipEmptyLines: true,
    });

    if (result.errors.length > 0) {
      throw new Error(`Error parsing CSV: ${result.errors.map(e => e.message).join(', ')}`);
    }

    // Extract headers and data
    const [headers = [], ...data] = result.data;

    return { headers, data };
  }
}
