import * as fs from 'fs';
import * as path from 'path';
import { CsvProcessor } from '../processor/CsvProcessor';
import { DataSheet } from '../model/DataSheet';
import { FileNotFoundError } from '../model/Errors';

export class CsvReader {
  /**
   * Reads an exported CSV file back into a DataSheet. Every field stays text;
   * empty fields become null.
   * @param filePath The path to the CSV file.
   * @returns A promise that resolves to a DataSheet named after the file.
   */
  static async readCsvFile(filePath: string): Promise<DataSheet> {
    return new Promise((resolve, reject) => {
      fs.readFile(filePath, 'utf8', (err, csvString) => {
        if (err) {
          return reject(err.code === 'ENOENT' ? new FileNotFoundError(filePath) : new Error(`Error reading CSV file "${filePath}": ${err.message}`));
        }

        try {
          const { headers, data } = CsvProcessor.parseCSV(csvString);

          resolve({
            name: path.basename(filePath, path.extname(filePath)),
            columnNames: [...headers],
            data: data.map((row) => row.map((value) => (value === '' ? null : value))),
          });
        } catch (error: unknown) {
          const reason = error instanceof Error ? error.message : String(error);
          reject(new Error(`Error parsing CSV file "${filePath}": ${reason}`));
        }
      });
    });
  }
}
