/**
 * Page rendering collaborator
 */

export type SourceDocument =
  | { kind: 'pdf'; path: string }
  | { kind: 'images'; paths: string[] };

export interface PageRenderer {
  /** Number of pages in the document; throws ConversionError when unreadable */
  countPages(document: SourceDocument): Promise<number>;

  /**
   * Produces the image for one page (0-based index) and returns its path.
   * Throws ConversionError.
   */
  render(document: SourceDocument, pageIndex: number, resolution: number, imagesDir: string): Promise<string>;
}
