import { z } from 'zod';

const portSchema = z.union([
  z.number().int().min(0).max(65535),
  z.string().regex(/^\d{1,5}$/, 'Port must be numeric'),
]);

export const MonitorActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('poll'),
    params: z.object({}).optional(),
  }),
  z.object({
    action: z.literal('get_devices'),
    params: z.object({
      filter: z.enum(['all', 'online', 'offline', 'wifi', 'lan']).optional(),
    }).optional(),
  }),
  z.object({
    action: z.literal('get_flows'),
    params: z.object({
      tag: z.string().min(1).optional(),
    }).optional(),
  }),
  z.object({
    action: z.literal('get_rates'),
    params: z.object({}).optional(),
  }),
  z.object({
    action: z.literal('classify'),
    params: z.object({
      address: z.string().min(1),
      port: portSchema,
    }),
  }),
  z.object({
    action: z.literal('get_metrics'),
    params: z.object({}).optional(),
  }),
  z.object({
    action: z.literal('reset_circuit_breaker'),
    params: z.object({}).optional(),
  }),
]);

export type MonitorAction = z.infer<typeof MonitorActionSchema>;
export type MonitorActionName = MonitorAction['action'];

export const MonitorResponseSchema = z.object({
  success: z.boolean(),
  action: z.string(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  warnings: z.array(z.string()).optional(),
  timestamp: z.string(),
});

export type MonitorResponse = z.infer<typeof MonitorResponseSchema>;
