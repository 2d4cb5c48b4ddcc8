import path from 'path';
import { errorMessage } from '@pageline/errors';
import { Recognizer } from '../clients/Recognizer';
import { LayoutMode, ResultRow } from '../models/job.model';
import { RowBuilder } from '../layout/rows';

/**
 * Result of one page attempt. Failures are values, never exceptions, so the
 * page loop always moves on to the next page.
 */
export type PageOutcome =
  | { ok: true; pageNo: number; rows: ResultRow[] }
  | { ok: false; pageNo: number; reason: string };

export interface PageRequest {
  pageNo: number;
  imagePath: string;
  accessToken: string;
  languageHint: string;
  layout: LayoutMode;
}

export class PageProcessor {
  constructor(
    private readonly recognizer: Recognizer,
    private readonly rowBuilder: RowBuilder
  ) {}

  async process(request: PageRequest): Promise<PageOutcome> {
    const { pageNo, imagePath } = request;
    try {
      const fragments = await this.recognizer.recognize(imagePath, request.accessToken, request.languageHint);
      const rows = this.rowBuilder.build(
        { imageFile: path.basename(imagePath), pageNo },
        fragments,
        request.layout
      );
      return { ok: true, pageNo, rows };
    } catch (error) {
      return { ok: false, pageNo, reason: errorMessage(error) };
    }
  }
}

export function progressWithin(start: number, span: number, done: number, total: number): number {
  return total > 0 ? start + Math.floor((span * done) / total) : start;
}
