import { EventEmitter } from 'events';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CommanderError } from 'commander';
import { CliDependencies, CliOptions, convertPdf, createProgram, defaultImagesDir } from '../../cli';
import { JobStatus } from '../../models/job.model';
import { parseCsv } from '../../storage/csv';
import { FakeRecognizer, FakeRenderer, silentLogger } from '../utils/fakes';

// chalk may or may not colorize depending on the terminal the tests run in
const plain = (line: string): string => line.replace(/\u001b\[[0-9;]*m/g, '');

describe('pageline-ocr', () => {
  let dir: string;
  let pdfPath: string;
  let output: string;
  let recognizer: FakeRecognizer;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pageline-cli-'));
    pdfPath = path.join(dir, 'doc.pdf');
    output = path.join(dir, 'out', 'doc.csv');
    await fs.writeFile(pdfPath, '%PDF-1.4 test');
    recognizer = new FakeRecognizer();
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function deps(pages = 2): CliDependencies {
    return {
      recognizer,
      renderer: new FakeRenderer(pages),
      logger: silentLogger(),
      env: {},
      stdout: (line) => stdout.push(plain(line)),
      stderr: (line) => stderr.push(plain(line)),
    };
  }

  function options(overrides: Partial<CliOptions> = {}): CliOptions {
    return {
      output,
      dpi: 300,
      layout: 'auto',
      languageType: 'CHN_ENG',
      apiKey: 'test-key',
      secretKey: 'test-secret',
      timeout: 60,
      interval: 0,
      verbose: false,
      ...overrides,
    };
  }

  it('should place page images beside the output by default', () => {
    expect(defaultImagesDir('/in/Report.pdf', '/out/result.csv')).toBe(path.join('/out', 'Report_images'));
  });

  it('should write the table and exit 0 when every page is recognized', async () => {
    const result = await convertPdf(pdfPath, options(), deps());

    expect(result.exitCode).toBe(0);
    expect(stdout).toEqual([`Wrote 2 line(s) from 2 page(s) to ${output}`]);
    expect(stderr).toEqual([]);
    expect(result.job?.imagePaths[0]).toBe(`${path.join(dir, 'out', 'doc_images')}/page_1.png`);
    const rows = parseCsv(await fs.readFile(output, 'utf8'));
    expect(rows.map((row) => [row.pageNo, row.text])).toEqual([
      [1, 'text of page_1.png'],
      [2, 'text of page_2.png'],
    ]);
  });

  it('should list failed pages and exit 1', async () => {
    recognizer.script('page_2.png', { error: 'request timed out' });

    const result = await convertPdf(pdfPath, options(), deps(3));

    expect(result.exitCode).toBe(1);
    expect(result.job?.status).toBe(JobStatus.COMPLETED_WITH_ERRORS);
    expect(stderr).toEqual(['Failed pages: 2']);
  });

  it('should report a failed job with its message', async () => {
    recognizer.authError = 'invalid client';

    const result = await convertPdf(pdfPath, options(), deps());

    expect(result.exitCode).toBe(1);
    expect(stderr).toEqual(['Authentication failed: invalid client']);
  });

  it('should use the images directory it is given', async () => {
    const imagesDir = path.join(dir, 'pages');

    const result = await convertPdf(pdfPath, options({ imagesDir }), deps(1));

    expect(result.job?.imagePaths).toEqual([`${imagesDir}/page_1.png`]);
  });

  it('should refuse a missing input file', async () => {
    const missing = path.join(dir, 'missing.pdf');

    const result = await convertPdf(missing, options(), deps());

    expect(result).toEqual({ exitCode: 1 });
    expect(stderr).toEqual([`Input PDF not found: ${missing}`]);
  });

  it('should refuse to run without credentials', async () => {
    const result = await convertPdf(pdfPath, options({ apiKey: undefined, secretKey: undefined }), deps());

    expect(result.exitCode).toBe(1);
    expect(stderr).toEqual([
      'Missing credentials: pass --api-key and --secret-key, --credentials-file, or set BAIDU_OCR_API_KEY and BAIDU_OCR_SECRET_KEY',
    ]);
    expect(recognizer.attempts).toEqual([]);
  });

  it('should fall back to credentials from the environment', async () => {
    const result = await convertPdf(pdfPath, options({ apiKey: undefined, secretKey: undefined }), {
      ...deps(),
      env: { BAIDU_OCR_API_KEY: 'env-key', BAIDU_OCR_SECRET_KEY: 'test-secret' },
    });

    expect(result.exitCode).toBe(0);
    expect(recognizer.credentials).toEqual({ apiKey: 'env-key', secretKey: 'test-secret' });
  });

  it('should read the default credentials file when no flags are given', async () => {
    const keys = path.join(dir, 'keys.txt');
    await fs.writeFile(keys, 'api_key=file-key\nsecret_key=test-secret\n');

    const result = await convertPdf(pdfPath, options({ apiKey: undefined, secretKey: undefined }), {
      ...deps(),
      env: { PAGELINE_CREDENTIALS_FILE: keys },
    });

    expect(result.exitCode).toBe(0);
    expect(recognizer.credentials).toEqual({ apiKey: 'file-key', secretKey: 'test-secret' });
  });

  it('should cancel after the current page on SIGINT and keep its rows', async () => {
    const interrupts = new EventEmitter();
    recognizer.onRecognize = () => {
      interrupts.emit('SIGINT');
    };

    const result = await convertPdf(pdfPath, options(), { ...deps(3), interrupts });

    expect(result.exitCode).toBe(1);
    expect(result.job?.status).toBe(JobStatus.CANCELED);
    expect(stderr).toEqual(['Cancellation requested, finishing the current page...', 'Canceled after 1 of 3 page(s)']);
    expect(parseCsv(await fs.readFile(output, 'utf8'))).toHaveLength(1);
    expect(interrupts.listenerCount('SIGINT')).toBe(0);
  });

  describe('argument parsing', () => {
    function program() {
      return createProgram(deps())
        .exitOverride()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    }

    const CREDENTIAL_FLAGS = ['--api-key', 'test-key', '--secret-key', 'test-secret'];

    afterEach(() => {
      process.exitCode = undefined;
    });

    it('should run a conversion with defaults', async () => {
      await program().parseAsync(['node', 'pageline-ocr', pdfPath, '-o', output, ...CREDENTIAL_FLAGS]);

      expect(process.exitCode).toBe(0);
      expect(stdout).toEqual([`Wrote 2 line(s) from 2 page(s) to ${output}`]);
    });

    it('should parse numeric options', async () => {
      await program().parseAsync(['node', 'pageline-ocr', pdfPath, '-o', output, '--dpi', '150', '--layout', 'vertical-rtl', ...CREDENTIAL_FLAGS]);

      expect(process.exitCode).toBe(0);
      expect(stdout).toEqual([`Wrote 2 line(s) from 2 page(s) to ${output}`]);
    });

    it.each([
      [['--dpi', '50'], 'commander.invalidArgument'],
      [['--dpi', 'high'], 'commander.invalidArgument'],
      [['--layout', 'sideways'], 'commander.invalidArgument'],
      [['--timeout', '0'], 'commander.invalidArgument'],
      [['--interval=-1'], 'commander.invalidArgument'],
    ])('should reject %j', async (extra: string[], code: string) => {
      const parsing = program().parseAsync(['node', 'pageline-ocr', pdfPath, '-o', output, ...extra]);

      await expect(parsing).rejects.toBeInstanceOf(CommanderError);
      await expect(parsing).rejects.toMatchObject({ code });
      expect(recognizer.attempts).toEqual([]);
    });

    it('should exit with 1 when no credentials are given', async () => {
      await program().parseAsync(['node', 'pageline-ocr', pdfPath, '-o', output]);

      expect(process.exitCode).toBe(1);
      expect(recognizer.attempts).toEqual([]);
    });

    it('should require an output path', async () => {
      await expect(program().parseAsync(['node', 'pageline-ocr', pdfPath])).rejects.toMatchObject({
        code: 'commander.missingMandatoryOptionValue',
      });
    });
  });
});
