import path from 'path';

export const ALLOWED_IMAGE_EXTENSIONS: readonly string[] = [
  '.png',
  '.jpg',
  '.jpeg',
  '.bmp',
  '.tif',
  '.tiff',
  '.webp',
];

/**
 * Reduces an uploaded file name to a safe ASCII base name.
 * May return '' when nothing usable is left.
 */
export function safeFileName(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  return base
    .normalize('NFKD')
    .replace(/[^\x20-\x7e]/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

export function extensionOf(name: string): string {
  return path.extname(name).toLowerCase();
}

export function isAllowedImage(name: string): boolean {
  return ALLOWED_IMAGE_EXTENSIONS.includes(extensionOf(name));
}

export interface JobPaths {
  root: string;
  inputDir: string;
  imagesDir: string;
  resultPath: string;
}

/**
 * Per-job workspace layout under the runs directory
 */
export function jobPaths(runsDir: string, jobId: string): JobPaths {
  const root = path.join(runsDir, jobId);
  return {
    root,
    inputDir: path.join(root, 'input'),
    imagesDir: path.join(root, 'images'),
    resultPath: path.join(root, `${jobId}_ocr.csv`),
  };
}
