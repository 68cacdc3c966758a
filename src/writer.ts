import * as fs from 'fs/promises';
import * as path from 'path';
import type { GeneratedPackage } from './types.js';

/**
 * Writes every file of a generated package below `outputDir`, creating directories as needed
 * and overwriting files that already exist. Returns the absolute paths written, in package order.
 */
export async function writePackage(outputDir: string, files: GeneratedPackage): Promise<string[]> {
  const root = path.resolve(outputDir);
  const written: string[] = [];

  for (const [relativePath, content] of files) {
    const target = path.resolve(root, relativePath);
    if (path.relative(root, target).startsWith('..') || path.isAbsolute(relativePath)) {
      throw new Error(`Refusing to write ${relativePath} outside of ${root}`);
    }
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf-8');
    written.push(target);
  }
  return written;
}
