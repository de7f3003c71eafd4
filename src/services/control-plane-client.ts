import type {
  ControlPlaneClient,
  ControlPlaneEndpoint,
  TimelineDetail,
} from '../types/collaborators.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_TIMEOUT_MS = 30_000;

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function pickString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Accepts both the flat timeline payload and the older nested
 * `{ local: {...}, remote: {...} }` one.
 */
export function parseTimelineDetail(payload: unknown, tenantId: string, timelineId: string): TimelineDetail {
  if (!isObjectRecord(payload)) {
    throw new Error(`Timeline ${tenantId}/${timelineId}: response is not an object.`);
  }
  const local = isObjectRecord(payload.local) ? payload.local : payload;
  const remote = isObjectRecord(payload.remote) ? payload.remote : payload;

  const lastRecordLsn = pickString(local, 'last_record_lsn');
  if (!lastRecordLsn) {
    throw new Error(`Timeline ${tenantId}/${timelineId}: response has no last_record_lsn.`);
  }
  return {
    tenantId: pickString(payload, 'tenant_id') ?? tenantId,
    timelineId: pickString(payload, 'timeline_id') ?? timelineId,
    lastRecordLsn,
    remoteConsistentLsn: pickString(remote, 'remote_consistent_lsn'),
  };
}

export interface HttpControlPlaneClientOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Client for the storage service's management API (`/v1/tenant/...`). */
export class HttpControlPlaneClient implements ControlPlaneClient {
  readonly #baseUrl: string;
  readonly #authToken?: string;
  readonly #timeoutMs: number;
  readonly #fetch: typeof fetch;

  constructor(endpoint: ControlPlaneEndpoint, options: HttpControlPlaneClientOptions = {}) {
    this.#baseUrl = `http://${endpoint.host}:${endpoint.port}`;
    this.#authToken = endpoint.authToken;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.#fetch = options.fetchImpl ?? fetch;
  }

  async timelineDetail(tenantId: string, timelineId: string): Promise<TimelineDetail> {
    const payload = await this.#request('GET', this.#timelinePath(tenantId, timelineId));
    return parseTimelineDetail(payload, tenantId, timelineId);
  }

  async timelineCheckpoint(tenantId: string, timelineId: string): Promise<void> {
    await this.#request('PUT', `${this.#timelinePath(tenantId, timelineId)}/checkpoint`);
  }

  async timelineDelete(tenantId: string, timelineId: string): Promise<void> {
    await this.#request('DELETE', this.#timelinePath(tenantId, timelineId));
    await logThought(`[ControlPlane] Deleted timeline ${tenantId}/${timelineId}.`);
  }

  async timelineCreate(tenantId: string, timelineId: string): Promise<TimelineDetail> {
    const payload = await this.#request('POST', `/v1/tenant/${tenantId}/timeline`, {
      new_timeline_id: timelineId,
    });
    await logThought(`[ControlPlane] Recreated timeline ${tenantId}/${timelineId}.`);
    return parseTimelineDetail(payload, tenantId, timelineId);
  }

  #timelinePath(tenantId: string, timelineId: string): string {
    return `/v1/tenant/${tenantId}/timeline/${timelineId}`;
  }

  async #request(method: string, pathname: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }
    if (this.#authToken) {
      headers.authorization = `Bearer ${this.#authToken}`;
    }

    const response = await this.#fetch(`${this.#baseUrl}${pathname}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.#timeoutMs),
    });
    const raw = await response.text();
    if (!response.ok) {
      throw new Error(`${method} ${pathname} returned HTTP ${response.status}: ${raw.trim().slice(0, 500)}`);
    }
    if (!raw.trim()) {
      return null;
    }
    const payload: unknown = JSON.parse(raw);
    return payload;
  }
}

/** Parse `host:port` as written in `listen_http_addr`. */
export function endpointFromAddress(address: string, authToken?: string): ControlPlaneEndpoint {
  const separator = address.lastIndexOf(':');
  const port = Number(address.slice(separator + 1));
  if (separator <= 0 || !Number.isInteger(port)) {
    throw new Error(`Address '${address}' is not of the form host:port.`);
  }
  return { host: address.slice(0, separator), port, authToken };
}
