import { createChildLogger } from '../utils/logger.js';
import { normalizeMac, isValidMac, isWildcardMac, extractMacs } from '../utils/mac.js';
import { classifyBand, parseFrequencyMhz, DEFAULT_BAND_5G_THRESHOLD_MHZ } from '../utils/frequency.js';
import { compareIpv4, lastOctet } from '../utils/ip.js';
import { SegmentParser, type SectionMarker } from './segment-parser.js';
import type { DeviceRecord, WifiBand } from '../types/network.js';

const logger = createChildLogger('device-reconciler');

export type DeviceSection = 'default' | 'addresses' | 'wireless' | 'leases';

export const DEVICE_SECTION_MARKERS: ReadonlyArray<SectionMarker<DeviceSection>> = [
  { marker: '---ARP---', section: 'addresses' },
  { marker: '---WIFI_SCAN---', section: 'wireless' },
  { marker: '---DHCP---', section: 'leases' },
];

export const deviceSegmentParser = new SegmentParser<DeviceSection>(DEVICE_SECTION_MARKERS, 'default');

export interface AddressEntry {
  ipAddress: string;
  macAddress: string;
  interfaceName: string;
}

export interface LeaseEntry {
  macAddress: string;
  ipAddress: string;
  hostname: string;
  expiresAt: number | null;
}

export interface StationEntry {
  macAddress: string;
  interfaceName: string;
  band: Exclude<WifiBand, 'none'>;
}

export interface ParsedLines<T> {
  entries: T[];
  skipped: number;
}

const UNNAMED_LEASE = '*';

function logSkips(kind: string, skipped: number): void {
  if (skipped > 0) {
    logger.debug({ kind, skipped }, 'Skipped malformed lines');
  }
}

/**
 * Address-table rows. Accepts the trimmed `ip mac iface` form and raw
 * `/proc/net/arp` rows (`ip hwtype flags mac mask iface`).
 */
export function parseAddressTable(lines: readonly string[]): ParsedLines<AddressEntry> {
  const entries: AddressEntry[] = [];
  let skipped = 0;

  for (const line of lines) {
    const parts = line.trim().split(/\s+/);
    let ip: string | undefined;
    let mac: string | undefined;
    let iface: string | undefined;

    if (parts.length >= 6 && isValidMac(parts[3] ?? '')) {
      [ip, , , mac, , iface] = parts;
    } else if (parts.length >= 3) {
      [ip, mac, iface] = parts;
    }

    if (ip === undefined || mac === undefined || iface === undefined || !isValidMac(mac)) {
      skipped++;
      continue;
    }
    if (isWildcardMac(mac)) {
      skipped++;
      continue;
    }

    entries.push({ ipAddress: ip, macAddress: normalizeMac(mac), interfaceName: iface });
  }

  logSkips('addresses', skipped);
  return { entries, skipped };
}

export function placeholderHostname(ipAddress: string): string {
  return `Unknown (${lastOctet(ipAddress)})`;
}

/** dnsmasq lease rows: `<expiry> <mac> <ip> <hostname> [client-id]`. */
export function parseLeases(lines: readonly string[]): ParsedLines<LeaseEntry> {
  const entries: LeaseEntry[] = [];
  let skipped = 0;

  for (const line of lines) {
    const [expiry, mac, ip, name] = line.trim().split(/\s+/);
    if (expiry === undefined || mac === undefined || ip === undefined || name === undefined || !isValidMac(mac)) {
      skipped++;
      continue;
    }

    const hostname = name === UNNAMED_LEASE || name === '' ? placeholderHostname(ip) : name;
    const expiresAt = /^\d+$/.test(expiry) ? parseInt(expiry, 10) : null;

    entries.push({ macAddress: normalizeMac(mac), ipAddress: ip, hostname, expiresAt });
  }

  logSkips('leases', skipped);
  return { entries, skipped };
}

/**
 * Wireless station dump: `IFACE <name> <freqMHz>` opens an interface, and each
 * following line holding exactly one hardware address is a station on it.
 * Stations under an interface whose frequency could not be read are skipped
 * until the next interface line.
 */
export function parseWirelessStations(
  lines: readonly string[],
  band5gThresholdMhz: number = DEFAULT_BAND_5G_THRESHOLD_MHZ
): ParsedLines<StationEntry> {
  const entries: StationEntry[] = [];
  let skipped = 0;
  let current: { name: string; band: Exclude<WifiBand, 'none'> } | null = null;

  for (const line of lines) {
    if (/^IFACE\b/.test(line.trim())) {
      const [, name, freqToken] = line.trim().split(/\s+/);
      const frequency = parseFrequencyMhz(freqToken);
      if (name === undefined || frequency === null) {
        current = null;
        skipped++;
        continue;
      }
      current = { name, band: classifyBand(frequency, band5gThresholdMhz) };
      continue;
    }

    const macs = extractMacs(line);
    const [mac] = macs;
    if (current === null || macs.length !== 1 || mac === undefined) {
      skipped++;
      continue;
    }

    entries.push({ macAddress: mac, interfaceName: current.name, band: current.band });
  }

  logSkips('wireless', skipped);
  return { entries, skipped };
}

export interface ReconcileInput {
  leases: readonly LeaseEntry[];
  addresses: readonly AddressEntry[];
  stations: readonly StationEntry[];
}

/**
 * Merges the three sources into one record per hardware address.
 *
 * Precedence is fixed: leases seed offline LAN records, the address table
 * marks them online (or adds minimal records for unleased hosts), and the
 * station dump upgrades known records to WiFi with a band. Stations with no
 * lease and no address-table entry are dropped.
 */
export function reconcileDevices(input: ReconcileInput): DeviceRecord[] {
  const devices = new Map<string, DeviceRecord>();

  for (const lease of input.leases) {
    devices.set(lease.macAddress, {
      macAddress: lease.macAddress,
      ipAddress: lease.ipAddress,
      hostname: lease.hostname,
      status: 'offline',
      connection: 'lan',
      band: 'none',
    });
  }

  for (const entry of input.addresses) {
    const known = devices.get(entry.macAddress);
    if (known) {
      known.status = 'online';
      continue;
    }
    devices.set(entry.macAddress, {
      macAddress: entry.macAddress,
      ipAddress: entry.ipAddress,
      hostname: entry.ipAddress,
      status: 'online',
      connection: 'lan',
      band: 'none',
    });
  }

  let dropped = 0;
  for (const station of input.stations) {
    const known = devices.get(station.macAddress);
    if (!known) {
      dropped++;
      continue;
    }
    known.status = 'online';
    known.connection = 'wifi';
    known.band = station.band;
  }

  if (dropped > 0) {
    logger.debug({ dropped }, 'Wireless stations without lease or address entry ignored');
  }

  return sortDevices([...devices.values()]);
}

export function compareDevices(a: DeviceRecord, b: DeviceRecord): number {
  if (a.status !== b.status) {
    return a.status === 'online' ? -1 : 1;
  }
  return compareIpv4(a.ipAddress, b.ipAddress);
}

export function sortDevices(devices: DeviceRecord[]): DeviceRecord[] {
  return devices.sort(compareDevices);
}
