import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { InvalidInputError } from '@pageline/errors';
import {
  DEFAULT_CREDENTIALS_FILE_NAME,
  cleanCredentialValue,
  defaultCredentialsFile,
  parseCredentialsFile,
  resolveCredentials,
} from '../../utils/credentials';

describe('parseCredentialsFile', () => {
  it('should read KEY=VALUE lines and strip quotes', () => {
    expect(parseCredentialsFile('api_key=test-key\nsecret_key = "test-secret"\n')).toEqual({
      apiKey: 'test-key',
      secretKey: 'test-secret',
    });
  });

  it('should accept colon separators and short key names', () => {
    expect(parseCredentialsFile('AK: test-key\r\nSK: test-secret')).toEqual({ apiKey: 'test-key', secretKey: 'test-secret' });
  });

  it('should normalize dashes and spaces in key names', () => {
    expect(parseCredentialsFile('client-id=test-key\nclient secret=test-secret')).toEqual({
      apiKey: 'test-key',
      secretKey: 'test-secret',
    });
  });

  it('should read a bare two-line file, skipping comments and blanks', () => {
    expect(parseCredentialsFile('# keys\n\ntest-key\ntest-secret\n')).toEqual({ apiKey: 'test-key', secretKey: 'test-secret' });
  });

  it('should ignore unknown keys', () => {
    expect(parseCredentialsFile('token=zzz\n')).toEqual({});
  });
});

describe('cleanCredentialValue', () => {
  it('should strip one pair of matching quotes', () => {
    expect(cleanCredentialValue(" 'abc' ")).toBe('abc');
    expect(cleanCredentialValue('"abc\'')).toBe('"abc\'');
  });
});

describe('resolveCredentials', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pageline-creds-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should prefer flags, then the file, then the environment', async () => {
    const file = path.join(dir, 'keys.txt');
    await fs.writeFile(file, 'api_key=file-key\n');
    const env = { BAIDU_OCR_API_KEY: 'env-key', BAIDU_OCR_SECRET_KEY: 'env-secret' };

    await expect(resolveCredentials({ credentialsFile: file }, env)).resolves.toEqual({
      apiKey: 'file-key',
      secretKey: 'env-secret',
    });
    await expect(resolveCredentials({ apiKey: 'flag-key', credentialsFile: file }, env)).resolves.toEqual({
      apiKey: 'flag-key',
      secretKey: 'env-secret',
    });
  });

  it('should return empty values when nothing is configured', async () => {
    await expect(resolveCredentials({}, {})).resolves.toEqual({ apiKey: '', secretKey: '' });
  });

  it('should reject a missing credentials file', async () => {
    const file = path.join(dir, 'absent.txt');

    await expect(resolveCredentials({ credentialsFile: file }, {})).rejects.toThrow(InvalidInputError);
    await expect(resolveCredentials({ credentialsFile: file }, {})).rejects.toThrow(`credentials file not found: ${file}`);
  });

  it('should read the default file only when no file is named and it exists', async () => {
    const fallback = path.join(dir, 'default.txt');
    const named = path.join(dir, 'named.txt');
    await fs.writeFile(fallback, 'api_key=default-key\nsecret_key=test-secret\n');
    await fs.writeFile(named, 'api_key=named-key\n');

    await expect(resolveCredentials({ defaultCredentialsFile: fallback }, {})).resolves.toEqual({
      apiKey: 'default-key',
      secretKey: 'test-secret',
    });
    await expect(resolveCredentials({ credentialsFile: named, defaultCredentialsFile: fallback }, {})).resolves.toEqual({
      apiKey: 'named-key',
      secretKey: '',
    });
  });

  it('should skip a default file that does not exist', async () => {
    const fallback = path.join(dir, 'absent.txt');

    await expect(resolveCredentials({ defaultCredentialsFile: fallback }, {})).resolves.toEqual({ apiKey: '', secretKey: '' });
  });
});

describe('defaultCredentialsFile', () => {
  it('should use PAGELINE_CREDENTIALS_FILE relative to the working directory', () => {
    expect(defaultCredentialsFile({ PAGELINE_CREDENTIALS_FILE: 'keys/ocr.txt' }, '/work')).toBe(path.resolve('/work', 'keys/ocr.txt'));
  });

  it('should fall back to the file in the working directory', () => {
    expect(defaultCredentialsFile({}, '/work')).toBe(path.resolve('/work', DEFAULT_CREDENTIALS_FILE_NAME));
  });
});
