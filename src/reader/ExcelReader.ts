import * as XLSX from 'xlsx';
import * as fs from 'fs';
import * as path from 'path';
import { CellValue, DataSheet } from '../model/DataSheet';
import { SheetSelection } from '../model/RunConf';
import { FileNotFoundError, InvalidConfigError, UnreadableFileError } from '../model/Errors';

// OOXML/ODS/XLSB workbooks are ZIP archives, legacy .xls files are CFB containers.
const WORKBOOK_SIGNATURES: readonly Buffer[] = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]),
];

/** Calendar fields of an Excel date serial, as returned by `XLSX.SSF.parse_date_code`. */
interface DateCode {
  y: number;
  m: number;
  d: number;
  H: number;
  M: number;
  S: number;
}

export class ExcelReader {
  /**
   * Reads the selected sheets of a workbook without coercing any cell.
   * @param filePath Path to the spreadsheet.
   * @param which `'all'` for every sheet in workbook order, or the sheet names to read, in order.
   * @returns The sheets keyed by name, in read order.
   */
  static readAllSheets(filePath: string, which: SheetSelection = 'all'): Map<string, DataSheet> {
    if (which !== 'all' && !(Array.isArray(which) && which.every((name) => typeof name === 'string'))) {
      throw new InvalidConfigError(`Sheet selection must be "all" or a list of sheet names, got ${JSON.stringify(which)}`);
    }

    const resolvedPath = path.resolve(filePath);
    if (!fs.existsSync(resolvedPath)) {
      throw new FileNotFoundError(filePath);
    }

    let workbook: XLSX.WorkBook;
    try {
      // Check the signature first: xlsx would otherwise read any text file as a one-sheet CSV
      if (!this.hasWorkbookSignature(resolvedPath)) {
        throw new Error('not a spreadsheet (unknown file signature)');
      }
      // Dates stay serial numbers; cellNF keeps the number format needed to recognize them
      workbook = XLSX.readFile(resolvedPath, { cellNF: true });
    } catch (error: unknown) {
      throw new UnreadableFileError(filePath, error);
    }
    const date1904 = workbook.Workbook?.WBProps?.date1904 ?? false;

    const sheetNames = which === 'all' ? workbook.SheetNames : which;
    const sheetsData = new Map<string, DataSheet>();
    for (const sheetName of sheetNames) {
      const worksheet = workbook.Sheets[sheetName];
      if (worksheet === undefined) {
        throw new InvalidConfigError(`Sheet "${sheetName}" not found in ${filePath}`);
      }
      sheetsData.set(sheetName, this.readSheet(sheetName, worksheet, date1904));
    }
    return sheetsData;
  }

  private static readSheet(sheetName: string, worksheet: XLSX.WorkSheet, date1904: boolean): DataSheet {
    const ref = worksheet['!ref'];
    const hasCells = Object.keys(worksheet).some((key) => !key.startsWith('!'));
    if (ref === undefined || !hasCells) {
      console.warn(`Sheet "${sheetName}" is empty and contributes no columns.`);
      return { name: sheetName, columnNames: [], data: [] };
    }

    const range = XLSX.utils.decode_range(ref);
    const columnNames: string[] = [];
    for (let C = range.s.c; C <= range.e.c; ++C) {
      const header = this.toCellValue(worksheet[XLSX.utils.encode_cell({ r: range.s.r, c: C })], date1904);
      columnNames.push(header === null ? '' : String(header));
    }

    const data: CellValue[][] = [];
    for (let R = range.s.r + 1; R <= range.e.r; ++R) {
      const rowData: CellValue[] = [];
      let hasData = false;
      for (let C = range.s.c; C <= range.e.c; ++C) {
        const cellValue = this.toCellValue(worksheet[XLSX.utils.encode_cell({ r: R, c: C })], date1904);
        rowData.push(cellValue);
        if (cellValue !== null) {
          hasData = true;
        }
      }
      if (hasData) {
        data.push(rowData);
      }
    }

    return { name: sheetName, columnNames, data };
  }

  private static hasWorkbookSignature(filePath: string): boolean {
    const header = Buffer.alloc(8);
    const fd = fs.openSync(filePath, 'r');
    try {
      const bytesRead = fs.readSync(fd, header, 0, header.length, 0);
      return WORKBOOK_SIGNATURES.some(
        (signature) => bytesRead >= signature.length && header.subarray(0, signature.length).equals(signature)
      );
    } finally {
      fs.closeSync(fd);
    }
  }

  /**
   * Maps a raw cell onto null, number or text; booleans, dates and error cells become text.
   * Date-formatted numbers become `YYYY-MM-DD`, or `YYYY-MM-DDTHH:MM:SS` when they carry a time,
   * built from the serial itself so the text does not depend on the host time zone.
   */
  static toCellValue(cell: XLSX.CellObject | undefined, date1904: boolean = false): CellValue {
    if (cell === undefined || cell.v === undefined || cell.v === null) {
      return null;
    }
    const value = cell.v;
    if (cell.t === 'e') {
      return cell.w ?? String(value);
    }
    if (typeof value === 'number') {
      return this.isDateFormat(cell.z) ? this.formatDateSerial(value, date1904) ?? value : value;
    }
    if (typeof value === 'boolean') {
      return value ? 'true' : 'false';
    }
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? (cell.w ?? null) : value.toISOString();
    }
    return value === '' ? null : value;
  }

  private static isDateFormat(format: string | number | undefined): boolean {
    if (format === undefined) {
      return false;
    }
    const isDate: boolean = XLSX.SSF.is_date(format);
    return isDate;
  }

  private static formatDateSerial(serial: number, date1904: boolean): string | null {
    const code: DateCode | null = XLSX.SSF.parse_date_code(serial, { date1904 });
    if (code === null) {
      return null;
    }
    const pad = (n: number, width: number = 2) => String(n).padStart(width, '0');
    const time = `${pad(code.H)}:${pad(code.M)}:${pad(code.S)}`;
    // Serials below 1 are times of day with no date part
    if (!date1904 && serial < 1) {
      return time;
    }
    const day = `${pad(code.y, 4)}-${pad(code.m)}-${pad(code.d)}`;
    if (code.H === 0 && code.M === 0 && code.S === 0) {
      return day;
    }
    return `${day}T${time}`;
  }
}
