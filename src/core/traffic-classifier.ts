import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, MonitorError, describeError } from '../utils/errors.js';
import type { Classification } from '../types/network.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const logger = createChildLogger('traffic-classifier');

export const DEFAULT_RULES_PATH = join(__dirname, '..', '..', 'config', 'classification-rules.json');

export const OTHER_TAG = 'other';

export const ClassificationRulesSchema = z.object({
  services: z.array(z.object({
    prefix: z.string().min(1),
    service: z.string().min(1),
  })),
  ports: z.array(z.object({
    port: z.number().int().min(0).max(65535),
    protocol: z.string().min(1),
  })),
});

export type ClassificationRulesInput = z.infer<typeof ClassificationRulesSchema>;

export interface ServiceRule {
  readonly prefix: string;
  readonly service: string;
}

export interface PortRule {
  readonly port: number;
  readonly protocol: string;
}

export interface ClassificationRules {
  readonly services: ReadonlyArray<ServiceRule>;
  readonly ports: ReadonlyArray<PortRule>;
}

export function freezeRules(input: ClassificationRulesInput): ClassificationRules {
  return Object.freeze({
    services: Object.freeze(input.services.map(rule => Object.freeze({ ...rule }))),
    ports: Object.freeze(input.ports.map(rule => Object.freeze({ ...rule }))),
  });
}

export function parseClassificationRules(raw: unknown, source = 'inline'): ClassificationRules {
  const result = ClassificationRulesSchema.safeParse(raw);
  if (!result.success) {
    throw new MonitorError(ErrorCode.RULES_INVALID, `Invalid classification rules in ${source}: ${result.error.message}`, {
      cause: result.error,
      context: { source },
    });
  }
  return freezeRules(result.data);
}

export function loadClassificationRules(path: string = DEFAULT_RULES_PATH): ClassificationRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new MonitorError(ErrorCode.RULES_INVALID, `Cannot read classification rules from ${path}: ${describeError(err)}`, {
      cause: err instanceof Error ? err : undefined,
      context: { path },
    });
  }

  const rules = parseClassificationRules(raw, path);
  logger.info({ path, services: rules.services.length, ports: rules.ports.length }, 'Classification rules loaded');
  return rules;
}

/** Lower-case slug used as a display tag, e.g. `Google DNS` → `google-dns`. */
export function toTag(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug === '' ? OTHER_TAG : slug;
}

/**
 * Labels a destination by service, then by protocol, then by bare port.
 *
 * Service prefixes are literal leading substrings tried in declaration order,
 * so when two prefixes overlap the earlier entry wins even if the later one
 * is more specific.
 */
export class TrafficClassifier {
  private readonly rules: ClassificationRules;
  private readonly portIndex: ReadonlyMap<number, string>;

  constructor(rules: ClassificationRules) {
    this.rules = rules;
    const index = new Map<number, string>();
    for (const rule of rules.ports) {
      if (!index.has(rule.port)) {
        index.set(rule.port, rule.protocol);
      }
    }
    this.portIndex = index;
  }

  static fromFile(path?: string): TrafficClassifier {
    return new TrafficClassifier(loadClassificationRules(path));
  }

  classify(address: string, port: number | string): Classification {
    const service = this.rules.services.find(rule => address.startsWith(rule.prefix));
    if (service) {
      return { label: service.service.toUpperCase(), tag: toTag(service.service) };
    }

    const portText = String(port).trim();
    const portNumber = /^\d+$/.test(portText) ? parseInt(portText, 10) : null;
    const protocol = portNumber === null ? undefined : this.portIndex.get(portNumber);
    if (protocol !== undefined) {
      return { label: protocol, tag: toTag(protocol) };
    }

    return { label: `PORT ${portText}`, tag: OTHER_TAG };
  }

  getRules(): ClassificationRules {
    return this.rules;
  }
}
