/**
 * Response schemas for the control-plane API.
 * Unknown fields are dropped except on connection metadata.
 */

import { z } from 'zod';

export const VersionInfoSchema = z.object({
  version: z.string(),
  meta: z.boolean().optional(),
  premium: z.boolean().optional(),
});

const DelayHistorySchema = z.object({
  time: z.string(),
  delay: z.number(),
});

export const ProxyInfoSchema = z.object({
  name: z.string(),
  type: z.string(),
  now: z.string().optional(),
  all: z.array(z.string()).optional(),
  history: z.array(DelayHistorySchema).default([]),
  udp: z.boolean().optional(),
  alive: z.boolean().optional(),
});

export const ProxiesSchema = z.object({
  proxies: z.record(ProxyInfoSchema),
});

export const DelaySchema = z.object({
  delay: z.number(),
});

const ConnectionSchema = z.object({
  id: z.string(),
  metadata: z
    .object({
      network: z.string().default(''),
      type: z.string().default(''),
      sourceIP: z.string().default(''),
      destinationIP: z.string().default(''),
      sourcePort: z.string().default(''),
      destinationPort: z.string().default(''),
      host: z.string().default(''),
      process: z.string().optional(),
    })
    .passthrough(),
  upload: z.number().default(0),
  download: z.number().default(0),
  start: z.string().default(''),
  chains: z.array(z.string()).default([]),
  rule: z.string().default(''),
  rulePayload: z.string().default(''),
});

export const ConnectionsSchema = z.object({
  downloadTotal: z.number().default(0),
  uploadTotal: z.number().default(0),
  connections: z
    .array(ConnectionSchema)
    .nullable()
    .default([])
    .transform((list) => list ?? []),
  memory: z.number().optional(),
});

export const TrafficSchema = z.object({
  up: z.number(),
  down: z.number(),
});

export const MemorySchema = z.object({
  inuse: z.number(),
  oslimit: z.number().default(0),
});

export const LogEntrySchema = z.object({
  type: z.enum(['debug', 'info', 'warning', 'error']),
  payload: z.string(),
});

export const ErrorBodySchema = z.object({
  message: z.string(),
});
