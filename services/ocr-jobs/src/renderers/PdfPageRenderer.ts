/**
 * PDF page renderer
 *
 * Page counts come from pdf-lib. Each page is rasterized by a separate
 * `pdftoppm` process (poppler-utils) into `<stem>_page_<nnnn>.png`.
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { PDFDocument } from 'pdf-lib';
import { ErrorFactory, errorMessage } from '@pageline/errors';
import { PageRenderer, SourceDocument } from './PageRenderer';

export interface PdfPageRendererOptions {
  /** pdftoppm executable (default: 'pdftoppm' on PATH) */
  pdftoppmPath?: string;
}

export function pageImageName(pdfPath: string, pageIndex: number): string {
  const stem = path.basename(pdfPath, path.extname(pdfPath));
  return `${stem}_page_${String(pageIndex + 1).padStart(4, '0')}.png`;
}

function requirePdf(document: SourceDocument): string {
  if (document.kind !== 'pdf') {
    throw ErrorFactory.conversion(`PDF renderer cannot render a ${document.kind} document`);
  }
  return document.path;
}

export class PdfPageRenderer implements PageRenderer {
  private readonly pdftoppmPath: string;

  constructor(options: PdfPageRendererOptions = {}) {
    this.pdftoppmPath = options.pdftoppmPath ?? 'pdftoppm';
  }

  async countPages(document: SourceDocument): Promise<number> {
    const pdfPath = requirePdf(document);
    try {
      const bytes = await fs.readFile(pdfPath);
      const pdf = await PDFDocument.load(bytes, { ignoreEncryption: true });
      return pdf.getPageCount();
    } catch (error) {
      throw ErrorFactory.conversion(`Cannot read PDF ${path.basename(pdfPath)}: ${errorMessage(error)}`, {
        pdfPath,
      });
    }
  }

  async render(document: SourceDocument, pageIndex: number, resolution: number, imagesDir: string): Promise<string> {
    const pdfPath = requirePdf(document);
    const imagePath = path.join(imagesDir, pageImageName(pdfPath, pageIndex));
    const page = String(pageIndex + 1);

    await fs.mkdir(imagesDir, { recursive: true });

    // -singlefile writes <prefix>.png instead of <prefix>-<n>.png
    const args = [
      '-r', String(resolution),
      '-f', page,
      '-l', page,
      '-png',
      '-singlefile',
      pdfPath,
      imagePath.slice(0, -'.png'.length),
    ];

    await this.spawnRasterizer(args, pageIndex + 1);
    return imagePath;
  }

  private spawnRasterizer(args: string[], pageNo: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.pdftoppmPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          reject(
            ErrorFactory.conversion(`pdftoppm exited with code ${code} on page ${pageNo}`, {
              pageNo,
              stderr: stderr.trim(),
            })
          );
        }
      });

      child.on('error', (error) => {
        reject(ErrorFactory.conversion(`Cannot start pdftoppm: ${error.message}`, { pageNo }));
      });
    });
  }
}
