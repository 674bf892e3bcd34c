import * as path from 'path';

export const REVIEWABLE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py',
  '.js',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.cpp',
  '.c',
  '.cs',
  '.go',
  '.rb',
  '.php',
  '.swift',
  '.kt',
  '.rs',
  '.scala',
]);

export function isReviewableFile(filePath: string): boolean {
  return REVIEWABLE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}
