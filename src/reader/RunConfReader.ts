import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { RunConf, SheetSelection } from '../model/RunConf';
import { InvalidConfigError } from '../model/Errors';

/** Settings found in a YAML run file; anything left out falls back to the next source. */
export interface RunConfOverrides {
  inputFile?: string;
  outputFolder?: string;
  sheets?: SheetSelection;
  maxFilenameLength?: number;
}

export class RunConfReader {
  static readConfFile(confFilePath: string): RunConfOverrides {
    let confData: unknown;
    try {
      const confFileContent = fs.readFileSync(path.resolve(confFilePath), 'utf8');
      confData = yaml.load(confFileContent);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(`Error reading or parsing configuration file: ${reason}`);
    }
    return this.parseConf(confData);
  }

  static parseConf(confData: unknown): RunConfOverrides {
    if (confData === undefined || confData === null) {
      return {};
    }
    if (typeof confData !== 'object' || Array.isArray(confData)) {
      throw new InvalidConfigError('Configuration file must contain a mapping of settings.');
    }

    const conf = new Map<string, unknown>(Object.entries(confData));
    const overrides: RunConfOverrides = {};

    const inputFile = conf.get('inputFile');
    if (inputFile !== undefined) {
      overrides.inputFile = this.parseString('inputFile', inputFile);
    }
    const outputFolder = conf.get('outputFolder');
    if (outputFolder !== undefined) {
      overrides.outputFolder = this.parseString('outputFolder', outputFolder);
    }
    const sheets = conf.get('sheets');
    if (sheets !== undefined) {
      overrides.sheets = this.parseSheets(sheets);
    }
    const maxFilenameLength = conf.get('maxFilenameLength');
    if (maxFilenameLength !== undefined) {
      overrides.maxFilenameLength = this.parseMaxFilenameLength(maxFilenameLength);
    }
    return overrides;
  }

  /** Accepts `all` or a non-empty list of sheet names; numeric YAML names are read as text. */
  static parseSheets(sheetsData: unknown): SheetSelection {
    if (sheetsData === 'all') {
      return 'all';
    }
    if (Array.isArray(sheetsData) && sheetsData.length > 0) {
      return sheetsData.map((name: unknown) => {
        if (typeof name === 'string' || typeof name === 'number') {
          return String(name);
        }
        throw new InvalidConfigError(`Invalid sheet name in configuration: ${JSON.stringify(name)}`);
      });
    }
    throw new InvalidConfigError(`"sheets" must be "all" or a list of sheet names, got ${JSON.stringify(sheetsData)}`);
  }

  static parseMaxFilenameLength(value: unknown): number {
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 10) {
      throw new InvalidConfigError(`"maxFilenameLength" must be an integer of at least 10, got ${JSON.stringify(value)}`);
    }
    return parsed;
  }

  /**
   * Merges the setting sources, highest precedence first, on top of the defaults.
   */
  static resolve(...sources: RunConfOverrides[]): RunConf {
    const defaults = new RunConf();
    const pick = <K extends keyof RunConfOverrides>(key: K): RunConfOverrides[K] =>
      sources.find((source) => source[key] !== undefined)?.[key];

    return new RunConf(
      pick('inputFile') ?? defaults.inputFile,
      pick('outputFolder') ?? defaults.outputFolder,
      pick('sheets') ?? defaults.sheets,
      pick('maxFilenameLength') ?? defaults.maxFilenameLength
    );
  }

  private static parseString(key: string, value: unknown): string {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new InvalidConfigError(`"${key}" must be a non-empty string, got ${JSON.stringify(value)}`);
    }
    return value;
  }
}
