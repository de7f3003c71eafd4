import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}

/** Depth-first walk yielding regular files; symlinks are not followed. */
export async function* walkFiles(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(fullPath);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

export async function listDirectory(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) {
    return [];
  }
  const entries = await readdir(dir);
  return entries.sort().map((name) => path.join(dir, name));
}

/**
 * Last `lineCount` lines of every `*.log` file under `rootDir`, each block
 * headed by the file's relative path.
 */
export async function collectLogTails(rootDir: string, lineCount = 20): Promise<string> {
  if (!(await pathExists(rootDir))) {
    return '';
  }
  const blocks: string[] = [];
  for await (const filePath of walkFiles(rootDir)) {
    if (!filePath.endsWith('.log')) {
      continue;
    }
    const content = await readFile(filePath, 'utf8');
    const tail = content.trimEnd().split('\n').slice(-lineCount).join('\n');
    blocks.push(`==> ${path.relative(rootDir, filePath)} <==\n${tail}`);
  }
  return blocks.join('\n\n');
}
