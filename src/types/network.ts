import { z } from 'zod';

export const WifiBandSchema = z.enum(['2.4GHz', '5GHz', 'none']);
export type WifiBand = z.infer<typeof WifiBandSchema>;

export const ConnectionTypeSchema = z.enum(['wifi', 'lan', 'unknown']);
export type ConnectionType = z.infer<typeof ConnectionTypeSchema>;

export const DeviceStatusSchema = z.enum(['online', 'offline']);
export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export const DeviceRecordSchema = z.object({
  macAddress: z.string(),
  ipAddress: z.string(),
  hostname: z.string(),
  status: DeviceStatusSchema,
  connection: ConnectionTypeSchema,
  band: WifiBandSchema,
});
export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

export const EndpointSchema = z.object({
  address: z.string(),
  port: z.number().int().min(0).max(65535).optional(),
});
export type FlowEndpoint = z.infer<typeof EndpointSchema>;

export const ClassificationSchema = z.object({
  label: z.string(),
  tag: z.string(),
});
export type Classification = z.infer<typeof ClassificationSchema>;

export const FlowRecordSchema = z.object({
  source: EndpointSchema,
  destination: EndpointSchema.extend({ port: z.number().int().min(0).max(65535) }),
  bandwidth: z.string(),
  classification: ClassificationSchema,
});
export type FlowRecord = z.infer<typeof FlowRecordSchema>;

export const ThroughputRatesSchema = z.object({
  downloadMbps: z.number().nonnegative(),
  uploadMbps: z.number().nonnegative(),
  totalMbps: z.number().nonnegative(),
});
export type ThroughputRates = z.infer<typeof ThroughputRatesSchema>;

export const CounterSnapshotSchema = z.object({
  rxBytes: z.number().nonnegative(),
  txBytes: z.number().nonnegative(),
  timestampMs: z.number(),
});
export type CounterSnapshot = z.infer<typeof CounterSnapshotSchema>;

export const SystemReadingsSchema = z.object({
  loadAverage: z.number().nullable(),
  pingMs: z.number().nullable(),
  temperatureC: z.number().nullable(),
  memoryPercent: z.number().nullable(),
});
export type SystemReadings = z.infer<typeof SystemReadingsSchema>;

export const SnapshotSectionSchema = z.enum(['metrics', 'counters', 'flows', 'addresses', 'wireless', 'leases']);
export type SnapshotSection = z.infer<typeof SnapshotSectionSchema>;

export const SectionIssueSchema = z.object({
  section: SnapshotSectionSchema,
  code: z.number(),
  message: z.string(),
});
export type SectionIssue = z.infer<typeof SectionIssueSchema>;

export const PollStatusSchema = z.enum(['online', 'degraded', 'unavailable']);
export type PollStatus = z.infer<typeof PollStatusSchema>;

export const NetworkSnapshotSchema = z.object({
  status: PollStatusSchema,
  timestamp: z.string(),
  rates: ThroughputRatesSchema.nullable(),
  system: SystemReadingsSchema.nullable(),
  devices: z.array(DeviceRecordSchema),
  flows: z.array(FlowRecordSchema),
  issues: z.array(SectionIssueSchema),
});
export type NetworkSnapshot = z.infer<typeof NetworkSnapshotSchema>;
