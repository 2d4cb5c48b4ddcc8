/**
 * Persisted result sets
 *
 * A result set is always written whole. Writers never append: the table is
 * written to a temporary file beside the target and renamed over it, so a
 * reader sees either the previous table or the new one.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorCode } from '@pageline/errors';
import { ResultRow } from '../models/job.model';
import { formatCsv, parseCsv } from './csv';

export interface ResultStore {
  /** Rows at the location; an absent table reads as empty */
  read(location: string): Promise<ResultRow[]>;
  /** Replaces the whole table at the location */
  write(location: string, rows: readonly ResultRow[]): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export class CsvResultStore implements ResultStore {
  async read(location: string): Promise<ResultRow[]> {
    let content: string;
    try {
      content = await fs.readFile(location, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
    return parseCsv(content);
  }

  async write(location: string, rows: readonly ResultRow[]): Promise<void> {
    await fs.mkdir(path.dirname(location), { recursive: true });

    const tmpPath = `${location}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(tmpPath, formatCsv(rows), 'utf8');
      await fs.rename(tmpPath, location);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
