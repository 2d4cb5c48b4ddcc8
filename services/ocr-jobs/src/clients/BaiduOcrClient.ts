/**
 * BaiduOcrClient - recognizer backed by the Baidu OCR REST API
 *
 * - authenticate: OAuth client-credentials exchange for an access token
 * - recognize: "accurate" general recognition of one page image, with
 *   per-line locations and probabilities
 *
 * Calls carry a fixed timeout and are never retried here. A failed page is
 * recorded by the job runner and can be retried as part of the job.
 */

import axios, { AxiosInstance } from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { ErrorFactory, errorMessage } from '@pageline/errors';
import { Fragment, RecognizerCredentials } from '../models/job.model';
import { Recognizer } from './Recognizer';

export const DEFAULT_TOKEN_URL = 'https://aip.baidubce.com/oauth/2.0/token';
export const DEFAULT_OCR_URL = 'https://aip.baidubce.com/rest/2.0/ocr/v1/accurate';

export interface BaiduOcrClientOptions {
  tokenUrl?: string;
  ocrUrl?: string;
  /** Per-call deadline in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** HTTP client; tests attach a mock adapter to it */
  http?: AxiosInstance;
}

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(payload: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = payload[key];
    if ((typeof value === 'string' && value !== '') || typeof value === 'number') {
      return String(value);
    }
  }
  return undefined;
}

function coordinate(value: unknown): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.trunc(parsed) : 0;
}

function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'request timed out';
    }
    return `network error (${error.code ?? error.name})`;
  }
  return errorMessage(error);
}

/**
 * Maps one `words_result` entry to a fragment
 */
export function toFragment(item: unknown): Fragment | undefined {
  if (!isRecord(item)) {
    return undefined;
  }

  const location = isRecord(item.location) ? item.location : {};
  const fragment: Fragment = {
    left: coordinate(location.left),
    top: coordinate(location.top),
    width: coordinate(location.width),
    height: coordinate(location.height),
    text: typeof item.words === 'string' ? item.words : '',
  };

  if (isRecord(item.probability) && typeof item.probability.average === 'number') {
    fragment.confidence = item.probability.average;
  }

  return fragment;
}

export class BaiduOcrClient implements Recognizer {
  private readonly http: AxiosInstance;
  private readonly tokenUrl: string;
  private readonly ocrUrl: string;
  private readonly timeoutMs: number;

  constructor(options: BaiduOcrClientOptions = {}) {
    this.tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.ocrUrl = options.ocrUrl ?? DEFAULT_OCR_URL;
    this.timeoutMs = options.timeoutMs ?? 60000;
    this.http =
      options.http ??
      axios.create({
        headers: { 'User-Agent': 'pageline-ocr/1.0' },
      });
  }

  async authenticate(credentials: RecognizerCredentials): Promise<string> {
    let status: number;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(this.tokenUrl, {
        params: {
          grant_type: 'client_credentials',
          client_id: credentials.apiKey,
          client_secret: credentials.secretKey,
        },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw ErrorFactory.authentication(
        `Access token request failed: ${describeTransportError(error)}`
      );
    }

    if (!isRecord(data)) {
      throw ErrorFactory.authentication('Access token response is not JSON', { status });
    }

    if (status >= 400) {
      const reason = stringField(data, 'error_description', 'error') ?? 'http_error';
      throw ErrorFactory.authentication(`Access token request rejected: status=${status}, error=${reason}`, {
        status,
      });
    }

    const token = data.access_token;
    if (typeof token !== 'string' || token === '') {
      const reason = stringField(data, 'error_description', 'error') ?? 'no access_token in response';
      throw ErrorFactory.authentication(`Access token request rejected: ${reason}`, { status });
    }

    return token;
  }

  async recognize(imagePath: string, token: string, languageHint: string): Promise<Fragment[]> {
    const imageName = path.basename(imagePath);

    let image: string;
    try {
      image = (await fs.readFile(imagePath)).toString('base64');
    } catch (error) {
      throw ErrorFactory.recognition(`Cannot read page image ${imageName}: ${errorMessage(error)}`);
    }

    const form = new URLSearchParams({
      image,
      language_type: languageHint,
      detect_direction: 'true',
      multidirectional_recognize: 'true',
      probability: 'true',
    });

    let status: number;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.ocrUrl, form.toString(), {
        params: { access_token: token },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      throw ErrorFactory.recognition(`Recognition of ${imageName} failed: ${describeTransportError(error)}`, {
        imageName,
      });
    }

    if (!isRecord(data)) {
      throw ErrorFactory.recognition(`Recognition response for ${imageName} is not JSON`, { imageName, status });
    }

    if (status >= 400) {
      const reason = stringField(data, 'error_msg', 'error_code') ?? 'http_error';
      throw ErrorFactory.recognition(`Recognition of ${imageName} rejected: status=${status}, error=${reason}`, {
        imageName,
        status,
      });
    }

    if ('error_code' in data) {
      const reason = stringField(data, 'error_msg') ?? 'unknown error';
      throw ErrorFactory.recognition(
        `Recognition of ${imageName} failed: ${reason} (code ${String(data.error_code)})`,
        { imageName, errorCode: data.error_code }
      );
    }

    const words = Array.isArray(data.words_result) ? data.words_result : [];
    return words.map(toFragment).filter((fragment): fragment is Fragment => fragment !== undefined);
  }
}
