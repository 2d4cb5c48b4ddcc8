/**
 * Renderer for documents that already are page images.
 *
 * Pages follow natural file-name order, so page_2.png comes before page_10.png.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ErrorFactory } from '@pageline/errors';
import { PageRenderer, SourceDocument } from './PageRenderer';

const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: 'base' });

export function naturalOrder(paths: readonly string[]): string[] {
  return [...paths].sort((a, b) => collator.compare(path.basename(a), path.basename(b)));
}

function requireImages(document: SourceDocument): string[] {
  if (document.kind !== 'images') {
    throw ErrorFactory.conversion(`Image renderer cannot render a ${document.kind} document`);
  }
  return naturalOrder(document.paths);
}

export class ImageSetRenderer implements PageRenderer {
  async countPages(document: SourceDocument): Promise<number> {
    return requireImages(document).length;
  }

  async render(document: SourceDocument, pageIndex: number): Promise<string> {
    const images = requireImages(document);
    if (pageIndex < 0 || pageIndex >= images.length) {
      throw ErrorFactory.conversion(`Page ${pageIndex + 1} is out of range (${images.length} images)`);
    }

    const imagePath = images[pageIndex];
    try {
      await fs.access(imagePath);
    } catch {
      throw ErrorFactory.conversion(`Page image ${path.basename(imagePath)} is missing`, { imagePath });
    }
    return imagePath;
  }
}
