import { z } from 'zod';

/**
 * Settings shared by serial and TCP transports
 */
const TransportCommonShape = {
  timeout: z.number().int().min(50).max(30000).optional().default(1000), // milliseconds
  retryAttempts: z.number().int().min(1).max(10).optional().default(3),
  retryDelay: z.number().int().min(0).max(60000).optional().default(1000), // milliseconds
};

export const SerialTransportSchema = z.object({
  type: z.literal('serial'),
  serialPort: z.string().min(1),
  baudRate: z.number().int().positive().optional().default(9600),
  dataBits: z.union([z.literal(7), z.literal(8)]).optional().default(8),
  stopBits: z.union([z.literal(1), z.literal(2)]).optional().default(1),
  parity: z.enum(['none', 'even', 'odd']).optional().default('none'),
  ...TransportCommonShape,
});

export const TcpTransportSchema = z.object({
  type: z.literal('tcp'),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).optional().default(502),
  ...TransportCommonShape,
});

export const TransportSchema = z.discriminatedUnion('type', [SerialTransportSchema, TcpTransportSchema]);

export type SerialTransportConfig = z.infer<typeof SerialTransportSchema>;
export type TcpTransportConfig = z.infer<typeof TcpTransportSchema>;
export type TransportConfig = z.infer<typeof TransportSchema>;

const UnitIdSchema = z.number().int().min(1).max(255);

/**
 * Either an explicit list, polled in the order given, or an inclusive
 * ascending range. Both resolve to the ordered list of unit ids.
 */
export const UnitIdRangeSchema = z
  .union([
    z
      .array(UnitIdSchema)
      .min(1)
      .refine((ids) => new Set(ids).size === ids.length, { message: 'unitIdRange contains duplicate ids' }),
    z
      .object({ from: UnitIdSchema, to: UnitIdSchema })
      .refine((range) => range.from <= range.to, { message: 'unitIdRange.from must not exceed unitIdRange.to' }),
  ])
  .transform((range) => {
    if (Array.isArray(range)) {
      return range;
    }
    return Array.from({ length: range.to - range.from + 1 }, (_, index) => range.from + index);
  });

export const DeviceSchema = z.object({
  typeName: z.string().min(1),
  startAddress: z.number().int().min(0).max(65535),
  registerCount: z.number().int().min(1).max(125),
  unitIdRange: UnitIdRangeSchema,
  registerType: z.enum(['holding', 'input']).optional().default('holding'),
  gatewayUnitId: z.number().int().min(0).max(255).optional(),
  stride: z.number().int().min(1).optional(),
  interReadDelayMs: z.number().int().min(0).max(60000).optional(),
  escalation: z.enum(['soft-fail', 'hard-fail']).optional(),
});

export type DeviceConfig = z.infer<typeof DeviceSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoggingSchema = z.object({
  baseFolder: z.string().min(1),
  retentionDays: z.number().int().min(1).optional().default(30),
  fileSuffix: z.string().min(1),
  header: z.array(z.string()).optional(),
  cycleIntervalSeconds: z.number().positive(),
  level: LogLevelSchema.optional().default('info'),
  console: z.boolean().optional().default(true),
  diskUsagePaths: z.array(z.string().min(1)).optional().default([]),
});

export type LoggingConfig = z.infer<typeof LoggingSchema>;

export const AppConfigSchema = z.object({
  transport: TransportSchema,
  device: DeviceSchema,
  logging: LoggingSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;
