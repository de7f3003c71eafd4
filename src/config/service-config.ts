import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse, stringify } from 'smol-toml';
import { PreconditionError } from '../services/compat-errors.js';

/**
 * Configuration documents embedded in a service repo directory.
 *
 * Documents are plain values: loading and persisting are the only operations
 * that touch disk, every transform returns a new document.
 */

export type ConfigDocumentKind = 'root' | 'service';

export type ConfigTable = Record<string, unknown>;

export interface ConfigDocument {
  kind: ConfigDocumentKind;
  path: string;
  table: ConfigTable;
}

/** A field path; `*` fans out over array elements. */
export type FieldPath = readonly string[];

export const CONFIG_DOCUMENT_FILES: Record<ConfigDocumentKind, string> = {
  root: 'config',
  service: 'pageserver.toml',
};

export const ADDRESS_FIELDS: Record<ConfigDocumentKind, FieldPath[]> = {
  service: [
    ['listen_http_addr'],
    ['listen_pg_addr'],
    ['broker_endpoints', '*'],
    ['broker_endpoint'],
  ],
  root: [
    ['etcd_broker', 'broker_endpoints', '*'],
    ['broker', 'listen_addr'],
    ['pageserver', 'listen_http_addr'],
    ['pageserver', 'listen_pg_addr'],
    ['pageservers', '*', 'listen_http_addr'],
    ['pageservers', '*', 'listen_pg_addr'],
    ['safekeepers', '*', 'http_port'],
    ['safekeepers', '*', 'pg_port'],
  ],
};

export const REMOTE_STORAGE_DIRNAME = 'local_fs_remote_storage';
const REMOTE_STORAGE_PATH: FieldPath = ['remote_storage', 'local_path'];
const DISTRIB_DIR_FIELD = 'pg_distrib_dir';

export function isPlainRecord(value: unknown): value is ConfigTable {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

// ─── Disk I/O ─────────────────────────────────────────────────────────────────

export function configDocumentPath(repoDir: string, kind: ConfigDocumentKind): string {
  return path.join(repoDir, CONFIG_DOCUMENT_FILES[kind]);
}

export async function loadConfigDocument(repoDir: string, kind: ConfigDocumentKind): Promise<ConfigDocument> {
  const filePath = configDocumentPath(repoDir, kind);
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new PreconditionError(`Configuration document '${filePath}' cannot be read.`, error);
  }
  try {
    return { kind, path: filePath, table: parse(raw) };
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PreconditionError(`Configuration document '${filePath}' is not valid TOML: ${detail}`, error);
  }
}

export async function persistConfigDocument(document: ConfigDocument): Promise<void> {
  await writeFile(document.path, `${stringify(document.table)}\n`, 'utf8');
}

// ─── Value Transforms ─────────────────────────────────────────────────────────

export function getIn(table: ConfigTable, fieldPath: FieldPath): unknown {
  let current: unknown = table;
  for (const key of fieldPath) {
    if (!isPlainRecord(current) || !(key in current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

async function updateAt(
  value: unknown,
  fieldPath: FieldPath,
  update: (leaf: unknown) => Promise<unknown>,
): Promise<unknown> {
  if (fieldPath.length === 0) {
    return update(value);
  }
  const [head, ...rest] = fieldPath;
  if (head === '*') {
    if (!Array.isArray(value)) {
      return value;
    }
    const next: unknown[] = [];
    for (const element of value) {
      next.push(await updateAt(element, rest, update));
    }
    return next;
  }
  if (!isPlainRecord(value) || !(head in value)) {
    return value;
  }
  return { ...value, [head]: await updateAt(value[head], rest, update) };
}

/** Apply `update` to every existing leaf at `fieldPath`; absent fields are left alone. */
export async function updateFields(
  document: ConfigDocument,
  fieldPath: FieldPath,
  update: (leaf: unknown) => Promise<unknown>,
): Promise<ConfigDocument> {
  const table = await updateAt(document.table, fieldPath, update);
  return isPlainRecord(table) ? { ...document, table } : document;
}

/** Set a top-level or nested field, creating intermediate tables as needed. */
export function setField(document: ConfigDocument, fieldPath: FieldPath, value: unknown): ConfigDocument {
  const assign = (current: unknown, keys: FieldPath): unknown => {
    if (keys.length === 0) {
      return value;
    }
    const [head, ...rest] = keys;
    const base = isPlainRecord(current) ? current : {};
    return { ...base, [head]: assign(base[head], rest) };
  };
  const table = assign(document.table, fieldPath);
  return isPlainRecord(table) ? { ...document, table } : document;
}

function isUnderPrefix(value: string, prefix: string): boolean {
  if (value === prefix) {
    return true;
  }
  return value.startsWith(`${prefix}/`) || value.startsWith(`${prefix}${path.sep}`);
}

/**
 * Replace `fromPrefix` at the start of any string value with `toPrefix`.
 * Only whole path segments match: `/x/repo-old` is not under `/x/repo`.
 */
export function rebaseStrings(document: ConfigDocument, fromPrefix: string, toPrefix: string): ConfigDocument {
  const visit = (value: unknown): unknown => {
    if (typeof value === 'string') {
      return isUnderPrefix(value, fromPrefix) ? `${toPrefix}${value.slice(fromPrefix.length)}` : value;
    }
    if (Array.isArray(value)) {
      return value.map(visit);
    }
    if (isPlainRecord(value)) {
      return Object.fromEntries(Object.entries(value).map(([key, child]) => [key, visit(child)]));
    }
    return value;
  };
  const table = visit(document.table);
  return isPlainRecord(table) ? { ...document, table } : document;
}

export function remoteStoragePath(document: ConfigDocument): string | undefined {
  const value = getIn(document.table, REMOTE_STORAGE_PATH);
  return typeof value === 'string' ? value : undefined;
}

export function pointRemoteStorageAt(document: ConfigDocument, repoDir: string): ConfigDocument {
  if (!isPlainRecord(getIn(document.table, ['remote_storage']))) {
    return document;
  }
  return setField(document, REMOTE_STORAGE_PATH, path.join(repoDir, REMOTE_STORAGE_DIRNAME));
}

export function overrideDistribDir(document: ConfigDocument, distribDir: string): ConfigDocument {
  return setField(document, [DISTRIB_DIR_FIELD], distribDir);
}

/** Point the root document at the binaries and Postgres installation used for this run. */
export function injectDistribution(
  document: ConfigDocument,
  input: { binDir: string; distribDir: string },
): ConfigDocument {
  const withBin = setField(document, ['neon_distrib_dir'], input.binDir);
  return setField(withBin, ['postgres_distrib_dir'], input.distribDir);
}

// ─── Cluster Identity ─────────────────────────────────────────────────────────

export interface ClusterIdentity {
  tenantId: string;
  timelineId: string;
  pageserverHttpAddr: string;
  authToken?: string;
}

function readString(table: ConfigTable, fieldPath: FieldPath): string | undefined {
  const value = getIn(table, fieldPath);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function pageserverSection(table: ConfigTable): ConfigTable | undefined {
  const single = getIn(table, ['pageserver']);
  if (isPlainRecord(single)) {
    return single;
  }
  const many = getIn(table, ['pageservers']);
  if (Array.isArray(many)) {
    const first: unknown = many[0];
    return isPlainRecord(first) ? first : undefined;
  }
  return undefined;
}

/**
 * Resolve tenant, timeline and pageserver endpoint from the root document.
 * `branch_name_mappings.<branch>` is a list of `[tenantId, timelineId]` pairs.
 */
export function describeCluster(document: ConfigDocument, branchName = 'main'): ClusterIdentity {
  const tenantId = readString(document.table, ['default_tenant_id']);
  if (!tenantId) {
    throw new PreconditionError(`'${document.path}' has no default_tenant_id.`);
  }

  const mappings = getIn(document.table, ['branch_name_mappings', branchName]);
  let timelineId: string | undefined;
  if (Array.isArray(mappings)) {
    for (const pair of mappings) {
      if (Array.isArray(pair) && pair[0] === tenantId && typeof pair[1] === 'string') {
        timelineId = pair[1];
        break;
      }
    }
  }
  if (!timelineId) {
    throw new PreconditionError(
      `'${document.path}' maps no timeline for branch '${branchName}' of tenant ${tenantId}.`,
    );
  }

  const pageserver = pageserverSection(document.table);
  const pageserverHttpAddr = pageserver ? readString(pageserver, ['listen_http_addr']) : undefined;
  if (!pageserverHttpAddr) {
    throw new PreconditionError(`'${document.path}' has no pageserver listen_http_addr.`);
  }
  const authToken = pageserver ? readString(pageserver, ['auth_token']) : undefined;

  return { tenantId, timelineId, pageserverHttpAddr, authToken };
}
