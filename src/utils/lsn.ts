const LSN_PATTERN = /^([0-9A-Fa-f]{1,8})\/([0-9A-Fa-f]{1,8})$/;

/** Parse an `X/Y` log sequence number into its 64-bit position. */
export function parseLsn(value: string): bigint {
  const match = LSN_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid LSN '${value}'. Expected the form 'X/Y' in hex.`);
  }
  return (BigInt(`0x${match[1]}`) << 32n) + BigInt(`0x${match[2]}`);
}

export function formatLsn(position: bigint): string {
  const high = (position >> 32n).toString(16).toUpperCase();
  const low = (position & 0xffffffffn).toString(16).toUpperCase();
  return `${high}/${low}`;
}

/** True when `current` has reached or passed `target`. */
export function lsnReached(current: string | null | undefined, target: string): boolean {
  if (!current) {
    return false;
  }
  return parseLsn(current) >= parseLsn(target);
}
