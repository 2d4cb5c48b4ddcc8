import { PageRenderer, SourceDocument } from './PageRenderer';

/**
 * Dispatches to the renderer registered for the document kind
 */
export class RoutingRenderer implements PageRenderer {
  constructor(private readonly renderers: Record<SourceDocument['kind'], PageRenderer>) {}

  countPages(document: SourceDocument): Promise<number> {
    return this.renderers[document.kind].countPages(document);
  }

  render(document: SourceDocument, pageIndex: number, resolution: number, imagesDir: string): Promise<string> {
    return this.renderers[document.kind].render(document, pageIndex, resolution, imagesDir);
  }
}
