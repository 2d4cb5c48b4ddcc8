/**
 * Credential resolution for the command line tool
 *
 * Order: explicit flags, then the credentials file, then the
 * BAIDU_OCR_API_KEY / BAIDU_OCR_SECRET_KEY environment variables.
 * Without --credentials-file, the default file is read when it exists.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ErrorFactory } from '@pageline/errors';
import { RecognizerCredentials } from '../models/job.model';

export const DEFAULT_CREDENTIALS_FILE_NAME = 'baidu_ocr_credentials.txt';

const API_KEY_NAMES = ['api_key', 'apikey', 'client_id', 'ak', 'access_key', 'accesskey'];
const SECRET_KEY_NAMES = ['secret_key', 'secretkey', 'client_secret', 'sk', 'secret', 'secretaccesskey'];

/**
 * Trims a value and strips one pair of matching surrounding quotes
 */
export function cleanCredentialValue(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed[0] === trimmed[trimmed.length - 1] && (trimmed[0] === '"' || trimmed[0] === "'")) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

/**
 * Parses KEY=VALUE / KEY: VALUE lines, or a bare two-line file holding the
 * API key then the secret key. Blank lines and # comments are ignored.
 */
export function parseCredentialsFile(content: string): Partial<RecognizerCredentials> {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));

  const result: Partial<RecognizerCredentials> = {};

  for (const line of lines) {
    const match = /^([^=:]+)[=:](.*)$/.exec(line);
    if (!match) {
      continue;
    }
    const key = match[1].trim().toLowerCase().replace(/[-\s]/g, '_');
    const value = cleanCredentialValue(match[2]);
    if (!value) {
      continue;
    }
    if (API_KEY_NAMES.includes(key)) {
      result.apiKey = value;
    } else if (SECRET_KEY_NAMES.includes(key)) {
      result.secretKey = value;
    }
  }

  const isBare = (line: string | undefined): line is string =>
    line !== undefined && !line.includes('=') && !line.includes(':');

  if (!result.apiKey && isBare(lines[0])) {
    result.apiKey = lines[0];
  }
  if (!result.secretKey && isBare(lines[1])) {
    result.secretKey = lines[1];
  }

  return result;
}

export interface CredentialSources {
  apiKey?: string;
  secretKey?: string;
  credentialsFile?: string;
  /** Read only when credentialsFile is unset and this file exists */
  defaultCredentialsFile?: string;
}

/**
 * PAGELINE_CREDENTIALS_FILE, else baidu_ocr_credentials.txt in the working directory
 */
export function defaultCredentialsFile(env: Record<string, string | undefined>, cwd: string = process.cwd()): string {
  const configured = env.PAGELINE_CREDENTIALS_FILE?.trim();
  return path.resolve(cwd, configured || DEFAULT_CREDENTIALS_FILE_NAME);
}

async function fileExists(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function resolveCredentials(
  sources: CredentialSources,
  env: Record<string, string | undefined> = process.env
): Promise<RecognizerCredentials> {
  let file = sources.credentialsFile;
  if (!file && sources.defaultCredentialsFile && (await fileExists(sources.defaultCredentialsFile))) {
    file = sources.defaultCredentialsFile;
  }

  let fromFile: Partial<RecognizerCredentials> = {};
  if (file) {
    let content: string;
    try {
      content = await fs.readFile(file, 'utf8');
    } catch {
      throw ErrorFactory.invalidInput(`credentials file not found: ${file}`);
    }
    fromFile = parseCredentialsFile(content);
  }

  return {
    apiKey: sources.apiKey?.trim() || fromFile.apiKey || env.BAIDU_OCR_API_KEY?.trim() || '',
    secretKey: sources.secretKey?.trim() || fromFile.secretKey || env.BAIDU_OCR_SECRET_KEY?.trim() || '',
  };
}
