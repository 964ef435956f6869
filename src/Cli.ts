// src/Cli.ts
import { Command, CommanderError } from 'commander';
import * as dotenv from 'dotenv';
import { PipelineProcessor } from './processor/PipelineProcessor';
import { RunConfOverrides, RunConfReader } from './reader/RunConfReader';
import { FileNotFoundError } from './model/Errors';
import { RunConf, SheetSelection } from './model/RunConf';

type CliOptions = {
  confFile?: string;
  sheets?: string[];
  maxFilenameLength?: string;
};

// `-s all` arrives as ['all']
function parseSheetsOption(names: string[]): SheetSelection {
  return RunConfReader.parseSheets(names.length === 1 && names[0] === 'all' ? 'all' : names);
}

function buildProgram(): Command {
  return new Command()
    .name('sheet-unifier')
    .description('Unify every sheet of a workbook into one typed master table and export it as CSV')
    .argument('[excelFile]', 'Path to the Excel file (default: data/2025A.xlsx)')
    .argument('[outputFolder]', 'Folder where output files will be created (default: outputs)')
    .option('-c, --confFile <path>', 'Path to a YAML run configuration file')
    .option('-s, --sheets <names...>', 'Sheets to read, in order, or "all"')
    .option('-m, --maxFilenameLength <n>', 'Maximum length of per-column file names')
    .exitOverride();
}

/**
 * Resolves the run configuration from the command line, an optional YAML run
 * file and the environment, in that order of precedence.
 * @param argv Arguments in `process.argv` form (runtime and script first).
 * @param env Environment holding `SHEET_UNIFIER_INPUT` / `SHEET_UNIFIER_OUTPUT`.
 */
export function resolveRunConf(argv: string[], env: NodeJS.ProcessEnv = process.env): RunConf {
  const program = buildProgram().parse(argv);
  const [excelFile, outputFolder]: (string | undefined)[] = program.args;
  const opts = program.opts<CliOptions>();

  const cliConf: RunConfOverrides = {
    inputFile: excelFile,
    outputFolder: outputFolder,
    sheets: opts.sheets === undefined ? undefined : parseSheetsOption(opts.sheets),
    maxFilenameLength:
      opts.maxFilenameLength === undefined ? undefined : RunConfReader.parseMaxFilenameLength(opts.maxFilenameLength),
  };
  const fileConf = opts.confFile !== undefined ? RunConfReader.readConfFile(opts.confFile) : {};
  const envConf: RunConfOverrides = {
    inputFile: env.SHEET_UNIFIER_INPUT || undefined,
    outputFolder: env.SHEET_UNIFIER_OUTPUT || undefined,
  };
  return RunConfReader.resolve(cliConf, fileConf, envConf);
}

/**
 * Runs the whole pipeline for one command line and prints the summary.
 * @returns The process exit code: 0 after the summary, 1 on any failure.
 */
export function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  try {
    const runConf = resolveRunConf(argv, env);
    const summary = PipelineProcessor.run(runConf);
    for (const line of PipelineProcessor.formatSummary(summary)) {
      console.log(line);
    }
    return 0;
  } catch (error: unknown) {
    // Commander already printed its own usage error or help text
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof FileNotFoundError) {
      console.error(`ERROR: Excel file not found: ${error.filePath}`);
    } else {
      console.error('Failed to process files:', error);
    }
    return 1;
  }
}

/** Entry point: loads `.env`, runs the CLI and exits with its code. */
export function main(): void {
  // Load environment variables from .env file
  dotenv.config();

  process.exit(runCli(process.argv));
}
