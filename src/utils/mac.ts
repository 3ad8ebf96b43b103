const MAC_PATTERN = /\b(?:[0-9a-fA-F]{2}[:-]){5}[0-9a-fA-F]{2}\b/g;

export const WILDCARD_MAC = '00:00:00:00:00:00';

export function normalizeMac(mac: string): string {
  return mac.toLowerCase().replace(/[^a-f0-9]/g, '').replace(/(.{2})/g, '$1:').slice(0, 17);
}

export function isValidMac(mac: string): boolean {
  const normalized = mac.replace(/[:-]/g, '');
  return normalized.length === 12 && /^[a-fA-F0-9]+$/.test(normalized);
}

/** The all-zero address the kernel uses for incomplete neighbour entries. */
export function isWildcardMac(mac: string): boolean {
  return normalizeMac(mac) === WILDCARD_MAC;
}

/** Every colon- or dash-separated hardware address found in a line of text. */
export function extractMacs(line: string): string[] {
  return (line.match(MAC_PATTERN) ?? []).map(normalizeMac);
}
