import { open, readFile } from 'node:fs/promises';
import path from 'node:path';
import {
  ADDRESS_FIELDS,
  type ConfigDocument,
  type ConfigDocumentKind,
  loadConfigDocument,
  overrideDistribDir,
  persistConfigDocument,
  pointRemoteStorageAt,
  rebaseStrings,
  updateFields,
} from '../config/service-config.js';
import { walkFiles } from '../utils/fs-tree.js';
import type { PortRemapper } from './port-remapper.js';

const BINARY_SNIFF_BYTES = 8 * 1024;
const DOCUMENT_KINDS: ConfigDocumentKind[] = ['service', 'root'];

export interface SanitizeInput {
  repoDir: string;
  captureRepoDir: string;
  remapper: PortRemapper;
  overrideDistribDir?: string;
}

/**
 * Rewrite one document so that it only references the current environment.
 * Pure apart from the port allocations made through `remapper`.
 */
export async function sanitizeDocument(document: ConfigDocument, input: SanitizeInput): Promise<ConfigDocument> {
  let next = document;
  for (const field of ADDRESS_FIELDS[document.kind]) {
    next = await updateFields(next, field, async (leaf) => {
      if (typeof leaf === 'number' || typeof leaf === 'string') {
        return input.remapper.remap(leaf);
      }
      return leaf;
    });
  }
  if (input.captureRepoDir !== input.repoDir) {
    next = rebaseStrings(next, input.captureRepoDir, input.repoDir);
  }
  next = pointRemoteStorageAt(next, input.repoDir);
  if (input.overrideDistribDir) {
    next = overrideDistribDir(next, input.overrideDistribDir);
  }
  return next;
}

/** Load, rewrite and persist every configuration document of a copied repo. */
export async function sanitizeRepoConfig(input: SanitizeInput): Promise<ConfigDocument[]> {
  const loaded: ConfigDocument[] = [];
  for (const kind of DOCUMENT_KINDS) {
    loaded.push(await loadConfigDocument(input.repoDir, kind));
  }

  const rewritten: ConfigDocument[] = [];
  for (const document of loaded) {
    rewritten.push(await sanitizeDocument(document, input));
  }

  for (const document of rewritten) {
    await persistConfigDocument(document);
  }
  return rewritten;
}

async function looksBinary(filePath: string): Promise<boolean> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

/**
 * Whole-tree literal search. Files whose first 8 KiB contain a NUL byte are
 * treated as binary and skipped. Returns matching paths relative to `rootDir`,
 * sorted.
 */
export async function findResidualReferences(rootDir: string, needle: string): Promise<string[]> {
  const matches: string[] = [];
  for await (const filePath of walkFiles(rootDir)) {
    if (await looksBinary(filePath)) {
      continue;
    }
    const content = await readFile(filePath, 'utf8');
    if (content.includes(needle)) {
      matches.push(path.relative(rootDir, filePath));
    }
  }
  return matches.sort();
}
