/**
 * Structural profile validation.
 *
 * Checks that a profile is a YAML mapping with at least one inbound port and
 * that the top-level keys the manager and the kernel rely on have the right
 * shape. Routing rules are only checked to be strings.
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../errors';

const Port = z.number().int().min(1).max(65535);

export const INBOUND_PORT_KEYS = [
  'mixed-port',
  'port',
  'socks-port',
  'redir-port',
  'tproxy-port',
] as const;

const Named = z.object({ name: z.string().min(1), type: z.string().min(1) }).passthrough();

const ProfileSchema = z
  .object({
    'mixed-port': Port.optional(),
    port: Port.optional(),
    'socks-port': Port.optional(),
    'redir-port': Port.optional(),
    'tproxy-port': Port.optional(),
    'allow-lan': z.boolean().optional(),
    'bind-address': z.string().optional(),
    mode: z
      .string()
      .refine((v) => ['rule', 'global', 'direct'].includes(v.toLowerCase()), {
        message: 'expected rule, global or direct',
      })
      .optional(),
    'log-level': z.enum(['silent', 'error', 'warning', 'info', 'debug']).optional(),
    ipv6: z.boolean().optional(),
    'external-controller': z
      .string()
      .regex(/^(\[[0-9a-fA-F:.]*\]|[^\s:[\]]*):\d{1,5}$/, { message: 'expected host:port' })
      .optional(),
    secret: z.union([z.string(), z.number()]).optional(),
    dns: z.object({}).passthrough().optional(),
    tun: z.object({}).passthrough().optional(),
    proxies: z.array(Named).optional(),
    'proxy-groups': z
      .array(Named.extend({ proxies: z.array(z.string()).optional() }))
      .optional(),
    'proxy-providers': z.record(z.object({}).passthrough()).optional(),
    'rule-providers': z.record(z.object({}).passthrough()).optional(),
    rules: z.array(z.string()).optional(),
  })
  .passthrough();

export type ProfileDocument = z.infer<typeof ProfileSchema>;

/**
 * Parse YAML text into a mapping. Anything else is a ValidationError.
 */
export function parseProfileYaml(content: string, source: string): Record<string, unknown> {
  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (error) {
    throw new ValidationError(`Malformed YAML in ${source}: ${errorMessage(error)}`, {
      cause: error,
      key: '(document)',
    });
  }
  if (!isMapping(doc)) {
    throw new ValidationError(`${source} is not a YAML mapping`, { key: '(document)' });
  }
  return doc;
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate profile text. The error names the first missing or malformed key.
 */
export function validateProfileContent(content: string, source: string): ProfileDocument {
  const doc = parseProfileYaml(content, source);

  const result = ProfileSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ValidationError(`Invalid "${key}" in ${source}: ${issue.message}`, { key });
  }

  if (!INBOUND_PORT_KEYS.some((k) => result.data[k] !== undefined)) {
    throw new ValidationError(
      `Missing inbound port in ${source} (one of ${INBOUND_PORT_KEYS.join(', ')})`,
      { key: INBOUND_PORT_KEYS[0] }
    );
  }
  return result.data;
}
