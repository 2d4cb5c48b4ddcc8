#!/usr/bin/env node
/**
 * pageline-ocr - recognize a PDF into a CSV result table from the terminal
 *
 * Runs the same job runner the API uses against an in-process job store.
 * Ctrl+C requests cancellation; rows recognized so far are kept.
 */

import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import winston from 'winston';
import { errorMessage } from '@pageline/errors';
import { createLogger, Logger } from '@pageline/logger';
import { BaiduOcrClient } from './clients/BaiduOcrClient';
import { Recognizer } from './clients/Recognizer';
import { MAX_DPI, MIN_DPI } from './config';
import { JobRecord, JobStatus, LAYOUT_MODES, LayoutMode, RecognizerCredentials, canCancel } from './models/job.model';
import { JobRunner } from './orchestration/JobRunner';
import { PageRenderer } from './renderers/PageRenderer';
import { PdfPageRenderer } from './renderers/PdfPageRenderer';
import { JobStore } from './repositories/JobStore';
import { CsvResultStore } from './storage/ResultStore';
import { defaultCredentialsFile, resolveCredentials } from './utils/credentials';

export interface CliOptions {
  output: string;
  imagesDir?: string;
  dpi: number;
  layout: LayoutMode;
  languageType: string;
  apiKey?: string;
  secretKey?: string;
  credentialsFile?: string;
  /** Seconds */
  timeout: number;
  /** Seconds between page requests */
  interval: number;
  verbose: boolean;
}

export interface CliDependencies {
  recognizer?: Recognizer;
  renderer?: PageRenderer;
  logger?: Logger;
  env?: Record<string, string | undefined>;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  /** Source of SIGINT (default: process) */
  interrupts?: EventEmitter;
}

export interface CliResult {
  exitCode: number;
  job?: JobRecord;
}

function integerIn(name: string, min: number, max: number): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`${name} must be an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

function nonNegative(name: string): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new InvalidArgumentError(`${name} must be a non-negative number.`);
    }
    return parsed;
  };
}

function positive(name: string): (value: string) => number {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive number.`);
    }
    return parsed;
  };
}

/**
 * Rendered pages go next to the output table unless a directory is given
 */
export function defaultImagesDir(pdfPath: string, outputPath: string): string {
  const stem = path.basename(pdfPath, path.extname(pdfPath));
  return path.join(path.dirname(path.resolve(outputPath)), `${stem}_images`);
}

function createCliLogger(verbose: boolean): Logger {
  return createLogger({
    service: 'pageline-ocr',
    level: verbose ? 'info' : 'error',
    format: 'pretty',
    enableConsole: false,
    // stdout stays free for the summary line
    transports: [new winston.transports.Console({ stderrLevels: ['debug', 'info', 'warn', 'error'] })],
  });
}

export async function convertPdf(pdfPath: string, options: CliOptions, deps: CliDependencies = {}): Promise<CliResult> {
  const out = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  const source = path.resolve(pdfPath);
  try {
    await fs.access(source);
  } catch {
    err(chalk.red(`Input PDF not found: ${source}`));
    return { exitCode: 1 };
  }

  let credentials: RecognizerCredentials;
  try {
    const env = deps.env ?? process.env;
    credentials = await resolveCredentials({ ...options, defaultCredentialsFile: defaultCredentialsFile(env) }, env);
  } catch (error) {
    err(chalk.red(errorMessage(error)));
    return { exitCode: 1 };
  }
  if (!credentials.apiKey || !credentials.secretKey) {
    err(
      chalk.red(
        'Missing credentials: pass --api-key and --secret-key, --credentials-file, ' +
          'or set BAIDU_OCR_API_KEY and BAIDU_OCR_SECRET_KEY'
      )
    );
    return { exitCode: 1 };
  }

  const logger = deps.logger ?? createCliLogger(options.verbose);
  const resultPath = path.resolve(options.output);
  const imagesDir = options.imagesDir ? path.resolve(options.imagesDir) : defaultImagesDir(source, resultPath);

  const store = new JobStore();
  const runner = new JobRunner({
    store,
    renderer: deps.renderer ?? new PdfPageRenderer(),
    recognizer: deps.recognizer ?? new BaiduOcrClient({ timeoutMs: options.timeout * 1000 }),
    results: new CsvResultStore(),
    logger,
    pageIntervalMs: Math.round(options.interval * 1000),
  });

  const job = store.create({
    outputName: path.basename(resultPath),
    options: { layout: options.layout, languageHint: options.languageType, resolution: options.dpi },
  });

  const onInterrupt = (): void => {
    if (canCancel(store.require(job.id))) {
      store.requestCancel(job.id);
      err(chalk.yellow('Cancellation requested, finishing the current page...'));
    }
  };
  const interrupts: EventEmitter = deps.interrupts ?? process;
  interrupts.on('SIGINT', onInterrupt);

  let finished: JobRecord;
  try {
    finished = await runner.run({
      jobId: job.id,
      document: { kind: 'pdf', path: source },
      credentials,
      imagesDir,
      resultPath,
    });
  } finally {
    interrupts.off('SIGINT', onInterrupt);
  }

  switch (finished.status) {
    case JobStatus.COMPLETED:
      out(chalk.green(`Wrote ${finished.rowsTotal} line(s) from ${finished.pagesTotal} page(s) to ${resultPath}`));
      return { exitCode: 0, job: finished };
    case JobStatus.COMPLETED_WITH_ERRORS:
      out(chalk.yellow(`Wrote ${finished.rowsTotal} line(s) from ${finished.pagesTotal} page(s) to ${resultPath}`));
      err(chalk.yellow(`Failed pages: ${finished.failedPages.join(', ')}`));
      return { exitCode: 1, job: finished };
    default:
      err(chalk.red(finished.message));
      return { exitCode: 1, job: finished };
  }
}

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('pageline-ocr')
    .description('Recognize the text lines of a PDF into a CSV table')
    .version('1.0.0', '-V, --version', 'Output the current version')
    .argument('<pdf>', 'PDF file to recognize')
    .requiredOption('-o, --output <csv>', 'Result table path')
    .option('--images-dir <dir>', 'Directory for rendered page images (default: <output dir>/<pdf name>_images)')
    .option('--dpi <n>', `Render resolution, ${MIN_DPI}-${MAX_DPI}`, integerIn('dpi', MIN_DPI, MAX_DPI), 300)
    .addOption(new Option('--layout <mode>', 'Reading order').choices(LAYOUT_MODES).default('auto'))
    .option('--language-type <code>', 'Language hint for the recognizer', 'CHN_ENG')
    .option('--api-key <key>', 'Recognition service API key')
    .option('--secret-key <key>', 'Recognition service secret key')
    .option(
      '--credentials-file <path>',
      'File holding api_key=... and secret_key=... lines (default: $PAGELINE_CREDENTIALS_FILE or ./baidu_ocr_credentials.txt, when present)'
    )
    .option('--timeout <seconds>', 'Per-request timeout', positive('timeout'), 60)
    .option('--interval <seconds>', 'Pause between page requests', nonNegative('interval'), 0)
    .option('-v, --verbose', 'Log progress to stderr', false)
    .action(async (pdf: string, options: CliOptions) => {
      const result = await convertPdf(pdf, options, deps);
      process.exitCode = result.exitCode;
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`${chalk.red(errorMessage(error))}\n`);
      process.exit(1);
    });
}
