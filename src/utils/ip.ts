/**
 * The four integers of a dotted address, or null if the text is not four
 * dot-separated integers. Octet range is not checked: `10.0.0.300` still
 * yields a key.
 */
export function dottedQuad(address: string): [number, number, number, number] | null {
  const match = /^(\d+)\.(\d+)\.(\d+)\.(\d+)$/.exec(address);
  if (!match) return null;

  const [a, b, c, d] = [match[1], match[2], match[3], match[4]].map(part => parseInt(part ?? '', 10));
  if (a === undefined || b === undefined || c === undefined || d === undefined) return null;

  return [a, b, c, d];
}

/**
 * Orders dotted IPv4 addresses numerically, octet by octet. Anything that is
 * not four dotted integers sorts after every valid address and ties with other invalid ones,
 * so a stable sort keeps their input order.
 */
export function compareIpv4(left: string, right: string): number {
  const a = dottedQuad(left);
  const b = dottedQuad(right);

  if (!a && !b) return 0;
  if (!a) return 1;
  if (!b) return -1;

  for (let i = 0; i < 4; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function lastOctet(address: string): string {
  const parts = address.split('.');
  return parts[parts.length - 1] ?? address;
}

export interface Endpoint {
  address: string;
  port?: number | undefined;
}

/**
 * Splits `host:port` or `[v6]:port`. A bare IPv6 address keeps its colons and
 * gets no port.
 */
export function splitHostPort(token: string): Endpoint {
  const bracketed = /^\[([^\]]+)\]:(\d{1,5})$/.exec(token);
  if (bracketed?.[1] !== undefined && bracketed[2] !== undefined) {
    return { address: bracketed[1], port: parseInt(bracketed[2], 10) };
  }

  const hostPort = /^([^:]+):(\d{1,5})$/.exec(token);
  if (hostPort?.[1] !== undefined && hostPort[2] !== undefined) {
    return { address: hostPort[1], port: parseInt(hostPort[2], 10) };
  }

  return { address: token };
}

export function isPortToken(token: string | undefined): token is string {
  if (token === undefined || !/^\d{1,5}$/.test(token)) return false;
  const port = parseInt(token, 10);
  return port >= 0 && port <= 65535;
}
