import type { Config } from '../config/index.js';
import { DEVICE_SECTION_MARKERS, type DeviceSection } from '../core/device-reconciler.js';
import { METRICS_SECTION_MARKERS, type MetricsSection } from '../core/system-readings.js';

type Monitor = Config['monitor'];

function markerFor<S extends string>(markers: ReadonlyArray<{ marker: string; section: S }>, section: S): string {
  const found = markers.find(m => m.section === section);
  if (!found) {
    throw new Error(`No marker declared for section '${section}'`);
  }
  return found.marker;
}

const echo = (marker: string): string => `echo '${marker}'`;

// Extended-regex escape; interface names like `eth0.2` carry a dot.
const escapeEre = (text: string): string => text.replace(/[.[\]()*+?{}|^$\\]/g, '\\$&');

/** `/proc/net/dev` row for exactly this interface, not `veth0` for `eth0`. */
export function interfaceCountersCommand(interfaceName: string): string {
  return `grep -E '^[[:space:]]*${escapeEre(interfaceName)}:' /proc/net/dev`;
}

export const deviceMarker = (section: Exclude<DeviceSection, 'default'>): string =>
  markerFor(DEVICE_SECTION_MARKERS, section);

export const metricsMarker = (section: Exclude<MetricsSection, 'default'>): string =>
  markerFor(METRICS_SECTION_MARKERS, section);

export function addressTableCommand(): string {
  return "cat /proc/net/arp | grep -v 'IP address' | awk '{print $1,$4,$6}'";
}

export function wirelessScanCommand(): string {
  return [
    "for iface in $(iw dev | awk '/Interface/ {print $2}'); do",
    "freq=$(iw dev $iface info | grep -oE '[0-9]+ MHz' | head -n1 | awk '{print $1}');",
    'echo "IFACE $iface $freq";',
    "iw dev $iface station dump | awk '/^Station/ {print $2}';",
    'done',
  ].join(' ');
}

export function leaseTableCommand(monitor: Monitor): string {
  return `cat ${monitor.leaseFile} 2>/dev/null || true`;
}

/** One call that emits all three device sections behind their markers. */
export function combinedDeviceCommand(monitor: Monitor): string {
  return [
    echo(deviceMarker('addresses')),
    addressTableCommand(),
    echo(deviceMarker('wireless')),
    wirelessScanCommand(),
    echo(deviceMarker('leases')),
    leaseTableCommand(monitor),
  ].join('; ');
}

export function metricsCommand(monitor: Monitor): string {
  return [
    echo(metricsMarker('load')),
    "cut -d' ' -f1 /proc/loadavg",
    echo(metricsMarker('ping')),
    `ping -c 1 -W 1 ${monitor.pingTarget} 2>/dev/null | grep 'time=' || true`,
    echo(metricsMarker('counters')),
    interfaceCountersCommand(monitor.wanInterface),
    echo(metricsMarker('temperature')),
    'cat /sys/class/thermal/thermal_zone0/temp 2>/dev/null || cat /sys/devices/virtual/thermal/thermal_zone0/temp 2>/dev/null || cat /sys/class/hwmon/hwmon0/temp1_input 2>/dev/null || true',
    echo(metricsMarker('memory')),
    "awk '/MemTotal/ {t=$2} /MemAvailable/ {a=$2} END {if (t > 0) printf \"%d\\n\", ((t-a)/t)*100}' /proc/meminfo",
  ].join('; ');
}

export function flowSampleCommand(monitor: Monitor): string {
  return `iftop -i ${monitor.lanInterface} -t -s 1 -n -N -P -L ${monitor.flowSampleLimit} 2>/dev/null`;
}
