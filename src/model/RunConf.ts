// src/model/RunConf.ts

export type SheetSelection = 'all' | string[];

export const DEFAULT_INPUT_FILE = 'data/2025A.xlsx';
export const DEFAULT_OUTPUT_FOLDER = 'outputs';
export const DEFAULT_MAX_FILENAME_LENGTH = 100;

export class RunConf {
  inputFile: string;
  outputFolder: string;
  sheets: SheetSelection;
  maxFilenameLength: number;

  constructor(
    inputFile: string = DEFAULT_INPUT_FILE,
    outputFolder: string = DEFAULT_OUTPUT_FOLDER,
    sheets: SheetSelection = 'all',
    maxFilenameLength: number = DEFAULT_MAX_FILENAME_LENGTH
  ) {
    this.inputFile = inputFile;
    this.outputFolder = outputFolder;
    this.sheets = sheets;
    this.maxFilenameLength = maxFilenameLength;
  }
}

export interface RunSummary {
  rowCount: number;
  columnCount: number;
  outputFolder: string;
  artifacts: string[];
}
