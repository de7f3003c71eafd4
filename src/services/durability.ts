import type { ControlPlaneClient, TimelineDetail } from '../types/collaborators.js';
import { getConfigNumber } from '../config/config-loader.js';
import { lsnReached } from '../utils/lsn.js';
import { logThought } from '../utils/logger.js';
import { pollUntil } from '../utils/retry.js';

const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_INTERVAL_MS = 1_000;

export interface DurabilityWaitOptions {
  timeoutMs?: number;
  intervalMs?: number;
}

function resolveTimeout(options: DurabilityWaitOptions): number {
  return options.timeoutMs ?? getConfigNumber('COMPAT_DURABILITY_TIMEOUT_MS', DEFAULT_TIMEOUT_MS);
}

async function waitForTimeline(
  client: ControlPlaneClient,
  tenantId: string,
  timelineId: string,
  label: string,
  reached: (detail: TimelineDetail) => boolean,
  describe: (detail: TimelineDetail | undefined) => string,
  options: DurabilityWaitOptions,
): Promise<TimelineDetail> {
  let last: TimelineDetail | undefined;
  return pollUntil(
    async () => {
      last = await client.timelineDetail(tenantId, timelineId);
      return reached(last) ? last : undefined;
    },
    () => describe(last),
    {
      label,
      timeoutMs: resolveTimeout(options),
      intervalMs: options.intervalMs ?? DEFAULT_INTERVAL_MS,
    },
  );
}

/** Wait until the service has ingested the log up to `lsn`. */
export async function waitForLastRecordLsn(
  client: ControlPlaneClient,
  tenantId: string,
  timelineId: string,
  lsn: string,
  options: DurabilityWaitOptions = {},
): Promise<TimelineDetail> {
  const detail = await waitForTimeline(
    client,
    tenantId,
    timelineId,
    `last_record_lsn >= ${lsn}`,
    (current) => lsnReached(current.lastRecordLsn, lsn),
    (current) => `last_record_lsn is ${current?.lastRecordLsn ?? 'unknown'}, waiting for ${lsn}`,
    options,
  );
  await logThought(`[Durability] ${tenantId}/${timelineId} ingested up to ${detail.lastRecordLsn}.`);
  return detail;
}

/** Wait until layers covering `lsn` are persisted to remote storage. */
export async function waitForUpload(
  client: ControlPlaneClient,
  tenantId: string,
  timelineId: string,
  lsn: string,
  options: DurabilityWaitOptions = {},
): Promise<TimelineDetail> {
  const detail = await waitForTimeline(
    client,
    tenantId,
    timelineId,
    `remote_consistent_lsn >= ${lsn}`,
    (current) => lsnReached(current.remoteConsistentLsn, lsn),
    (current) => `remote_consistent_lsn is ${current?.remoteConsistentLsn ?? 'unset'}, waiting for ${lsn}`,
    options,
  );
  await logThought(`[Durability] ${tenantId}/${timelineId} uploaded up to ${detail.remoteConsistentLsn ?? lsn}.`);
  return detail;
}
