import * as path from 'path';
import { ExcelReader } from '../reader/ExcelReader';
import { SheetUnifier } from './SheetUnifier';
import { TypeInferencer } from './TypeInferencer';
import { TypeApplier } from './TypeApplier';
import { CsvGenerator } from '../generator/CsvGenerator';
import { TypeMapGenerator } from '../generator/TypeMapGenerator';
import { RunConfReader } from '../reader/RunConfReader';
import { RunConf, RunSummary } from '../model/RunConf';

export class PipelineProcessor {
  /**
   * Runs read -> unify -> infer -> apply -> export for one workbook.
   * Nothing is written unless every step before the exports succeeds.
   * @param runConf The resolved run configuration.
   * @returns Row and column counts, the absolute output folder and the written files.
   */
  static run(runConf: RunConf): RunSummary {
    RunConfReader.parseMaxFilenameLength(runConf.maxFilenameLength);

    console.log(`== Reading Excel file: ${runConf.inputFile}`);
    const sheetsData = ExcelReader.readAllSheets(runConf.inputFile, runConf.sheets);

    console.log(`== Unifying ${sheetsData.size} sheet(s) and normalizing headers...`);
    const unified = SheetUnifier.unify(sheetsData);

    console.log('== Inferring column types (numeric vs string)...');
    const types = TypeInferencer.infer(unified);
    const master = TypeApplier.apply(unified, types);

    console.log('== Exporting...');
    const outputFolder = path.resolve(runConf.outputFolder);
    const artifacts = [
      CsvGenerator.generateMasterFile(master, outputFolder, types),
      ...CsvGenerator.generateColumnFiles(master, outputFolder, runConf.maxFilenameLength, types),
      TypeMapGenerator.generateTypeMapFile(types, outputFolder),
    ];

    return {
      rowCount: master.data.length,
      columnCount: master.columnNames.length,
      outputFolder,
      artifacts,
    };
  }

  static formatSummary(summary: RunSummary): string[] {
    return [
      '=== DONE ===',
      `Rows: ${summary.rowCount} | Columns: ${summary.columnCount}`,
      `Output: ${summary.outputFolder}`,
      'Generated:',
      ' - master.csv',
      ` - columns/*.csv (${summary.columnCount} files, one per column)`,
      ' - inferred_dtypes.json (applied column types)',
    ];
  }
}
