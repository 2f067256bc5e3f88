/**
 * Configuration for the HTTP cloud provider.
 *
 * The provider is configured by a JSON document whose keys are the flag and
 * URL names below, optionally nested under a single `global` section:
 *
 *   {
 *     "instances": true,
 *     "instances-url": "http://inventory.internal:8080",
 *     "scheduler-extension": true,
 *     "scheduler-extension-url": "http://extender.internal:8081/api/"
 *   }
 *
 * There are no defaults for the URLs: an enabled capability without a valid
 * absolute base URL is rejected, and so is a base URL with a query string or
 * fragment.
 */

import type { Readable } from 'node:stream';
import { z, type ZodError } from 'zod';
import { logger, type CapabilityName, type CloudConfigSource } from '@remote-cloud/shared';
import { CAPABILITY_NAMES, CAPABILITY_REGISTRY, type CapabilityUrlField } from './capabilities.js';
import { ConfigError } from './errors.js';

const log = logger.child({ module: 'http-cloud-config' });

export type PrioritizeCandidates = 'filtered' | 'all';

export interface HttpCloudConfig {
  /** Capability flags exactly as configured. */
  readonly flags: Readonly<Record<CapabilityName, boolean>>;
  /** Base URLs with trailing slashes removed. */
  readonly urls: Readonly<Partial<Record<CapabilityUrlField, string>>>;
  /** Which node list a scheduling round sends to prioritize. */
  readonly prioritizeCandidates: PrioritizeCandidates;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const Flag = z.boolean().default(false);
const BaseUrl = z.string().trim().optional();

const RawConfigSchema = z
  .object({
    'instances': Flag,
    'instances-url': BaseUrl,
    'tcp-load-balancer': Flag,
    'zones': Flag,
    'clusters': Flag,
    'scheduler-extension': Flag,
    'scheduler-extension-url': BaseUrl,
    'prioritize-candidates': z.enum(['filtered', 'all']).default('filtered'),
  })
  .strict()
  .superRefine((raw, ctx) => {
    for (const name of CAPABILITY_NAMES) {
      const { flag, url } = CAPABILITY_REGISTRY[name];
      if (url === null || !raw[flag]) continue;

      const value = raw[url];
      if (!value) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [url],
          message: `is required when ${flag} is enabled`,
        });
      } else if (!isAbsoluteHttpUrl(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [url],
          message: `can't parse ${JSON.stringify(value)} as an absolute http(s) URL`,
        });
      } else if (/[?#]/.test(value)) {
        // Suffix paths are appended to the base verbatim.
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [url],
          message: `${JSON.stringify(value)} must not carry a query string or fragment`,
        });
      }
    }
  });

type RawConfig = z.output<typeof RawConfigSchema>;

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Strip trailing path separators so suffix paths never double them. */
export function normalizeBaseUrl(value: string): string {
  return value.replace(/\/+$/, '');
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

async function readSource(source: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function readConfigText(source: CloudConfigSource): Promise<string> {
  if (source === null || source === undefined) return '';
  if (typeof source === 'string') return source;
  if (Buffer.isBuffer(source)) return source.toString('utf-8');
  try {
    return await readSource(source);
  } catch (err) {
    throw new ConfigError(
      `couldn't read config: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err },
    );
  }
}

/** Accept the document either flat or wrapped in a lone `global` section. */
function unwrapGlobalSection(document: unknown): unknown {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    return document;
  }
  const entries = Object.entries(document);
  if (entries.length === 1) {
    const [key, section] = entries[0];
    if (key === 'global' || key === 'Global') return section;
  }
  return document;
}

function toConfig(raw: RawConfig): HttpCloudConfig {
  const urls: Partial<Record<CapabilityUrlField, string>> = {};
  if (raw['instances-url']) urls['instances-url'] = normalizeBaseUrl(raw['instances-url']);
  if (raw['scheduler-extension-url']) {
    urls['scheduler-extension-url'] = normalizeBaseUrl(raw['scheduler-extension-url']);
  }

  return {
    flags: {
      instances: raw['instances'],
      tcpLoadBalancer: raw['tcp-load-balancer'],
      zones: raw['zones'],
      clusters: raw['clusters'],
      schedulerExtension: raw['scheduler-extension'],
    },
    urls,
    prioritizeCandidates: raw['prioritize-candidates'],
  };
}

/**
 * Parse and validate provider configuration. Throws ConfigError when the
 * source is absent or blank, is not JSON, or fails validation.
 */
export async function loadHttpCloudConfig(source: CloudConfigSource): Promise<HttpCloudConfig> {
  const text = await readConfigText(source);
  if (text.trim() === '') {
    throw new ConfigError('config is empty or not provided');
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `couldn't read config: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { cause: err },
    );
  }

  const parsed = RawConfigSchema.safeParse(unwrapGlobalSection(document));
  if (!parsed.success) {
    const field = parsed.error.issues.find((issue) => issue.path.length > 0)?.path.join('.');
    throw new ConfigError(`invalid config: ${formatZodError(parsed.error)}`, field, {
      cause: parsed.error,
    });
  }

  const config = toConfig(parsed.data);

  for (const name of CAPABILITY_NAMES) {
    const { flag, served, desc } = CAPABILITY_REGISTRY[name];
    if (config.flags[name] && !served) {
      log.warn({ flag, capability: desc }, 'capability enabled in config but not supported by the http provider');
    }
  }
  log.info({ flags: config.flags, urls: config.urls }, 'http cloud config loaded');

  return config;
}
