import * as fs from 'fs';
import * as path from 'path';
import { ColumnTypeMap } from '../model/ColumnType';

export const TYPE_MAP_FILE_NAME = 'inferred_dtypes.json';

export class TypeMapGenerator {
  /**
   * Serializes the type map as a JSON object. Keys are written in column order,
   * even for names such as `2024` that a plain object would move to the front.
   */
  static toJson(types: ColumnTypeMap): string {
    if (types.size === 0) {
      return '{}';
    }
    const entries = [...types.entries()].map(([col, type]) => `  ${JSON.stringify(col)}: ${JSON.stringify(type)}`);
    return `{\n${entries.join(',\n')}\n}`;
  }

  /** Writes `inferred_dtypes.json` into the output folder and returns its path. */
  static generateTypeMapFile(types: ColumnTypeMap, outputFolder: string): string {
    fs.mkdirSync(outputFolder, { recursive: true });
    const outputFilePath = path.join(outputFolder, TYPE_MAP_FILE_NAME);
    fs.writeFileSync(outputFilePath, this.toJson(types), 'utf8');
    return outputFilePath;
  }
}
