import { createChildLogger } from '../utils/logger.js';
import { splitHostPort, isPortToken, type Endpoint } from '../utils/ip.js';
import { pairFlowLines, DEFAULT_PAIR_MARKERS, type LinePair, type PairMarkers } from './segment-parser.js';
import type { TrafficClassifier } from './traffic-classifier.js';
import type { FlowRecord } from '../types/network.js';

const logger = createChildLogger('flow-parser');

/**
 * Port assumed when neither `addr:port` nor `addr port` yields one. Most
 * unlabelled traffic on a home LAN is TLS, so this is a best guess only.
 */
export const DEFAULT_FLOW_PORT = 443;

const RATE_TOKEN = /^\d+(\.\d+)?[KMGT]?[bB]$/;

export interface FlowParseOptions {
  markers?: PairMarkers;
  defaultPort?: number;
}

export interface FlowParseResult {
  flows: FlowRecord[];
  skipped: number;
}

function isRateToken(token: string | undefined): boolean {
  return token !== undefined && RATE_TOKEN.test(token);
}

/** Endpoint from `addr:port`, or from `addr port` when the next token is a bare port. */
function readEndpoint(tokens: readonly string[], start: number): Endpoint | null {
  const first = tokens[start];
  if (first === undefined || isRateToken(first)) return null;

  const endpoint = splitHostPort(first);
  if (endpoint.port === undefined && isPortToken(tokens[start + 1])) {
    return { address: endpoint.address, port: parseInt(tokens[start + 1] ?? '', 10) };
  }
  return endpoint;
}

/** Endpoint written immediately before a marker token, in either form. */
function readEndpointBefore(tokens: readonly string[], markerIndex: number): Endpoint | null {
  const last = tokens[markerIndex - 1];
  if (last === undefined) return null;

  const beforeLast = tokens[markerIndex - 2];
  if (isPortToken(last) && beforeLast !== undefined && !isPortToken(beforeLast)) {
    return { address: splitHostPort(beforeLast).address, port: parseInt(last, 10) };
  }
  return splitHostPort(last);
}

/**
 * Turns one sampler line pair into a flow.
 *
 * The outbound line carries the source before its marker and, in the compact
 * format, the destination after it. When the outbound line only has rate
 * columns after the marker the destination is the endpoint in front of the
 * inbound marker. The bandwidth figure is the last token of the inbound line.
 */
export function parseFlowPair(
  pair: LinePair,
  classifier: TrafficClassifier,
  options: FlowParseOptions = {}
): FlowRecord | null {
  const markers = options.markers ?? DEFAULT_PAIR_MARKERS;
  const defaultPort = options.defaultPort ?? DEFAULT_FLOW_PORT;

  const outTokens = pair.outbound.split(/\s+/).filter(Boolean);
  const inTokens = pair.inbound.split(/\s+/).filter(Boolean);
  const outIndex = outTokens.indexOf(markers.outbound);
  const inIndex = inTokens.indexOf(markers.inbound);
  if (outIndex < 1 || inIndex < 0) return null;

  const source = readEndpointBefore(outTokens, outIndex);
  if (source === null) return null;

  const bandwidth = inTokens[inTokens.length - 1];
  if (bandwidth === undefined || inTokens.length - 1 <= inIndex) return null;

  const destination = readEndpoint(outTokens, outIndex + 1)
    ?? (inIndex > 0 ? readEndpointBefore(inTokens, inIndex) : null);
  if (destination === null) return null;

  const port = destination.port ?? defaultPort;

  return {
    source,
    destination: { address: destination.address, port },
    bandwidth,
    classification: classifier.classify(destination.address, port),
  };
}

export function parseFlows(
  lines: readonly string[],
  classifier: TrafficClassifier,
  options: FlowParseOptions = {}
): FlowParseResult {
  const { pairs, skipped: unpaired } = pairFlowLines(lines, options.markers ?? DEFAULT_PAIR_MARKERS);
  const flows: FlowRecord[] = [];
  let skipped = unpaired;

  for (const pair of pairs) {
    const flow = parseFlowPair(pair, classifier, options);
    if (flow) {
      flows.push(flow);
    } else {
      skipped++;
      logger.debug({ outbound: pair.outbound, inbound: pair.inbound }, 'Dropped malformed flow pair');
    }
  }

  return { flows, skipped };
}
