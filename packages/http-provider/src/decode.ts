import { z, type ZodType, type ZodTypeDef } from 'zod';
import type { V1ListMeta, V1Node, V1NodeAddress, V1NodeList } from '@kubernetes/client-node';
import type { HostPriority, NodeResources } from '@remote-cloud/shared';
import { DecodeError } from './errors.js';

// ---------------------------------------------------------------------------
// Response schemas. A JSON null decodes to the operation's empty value.
// ---------------------------------------------------------------------------

const isObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const NodeSchema = z.custom<V1Node>(isObject, { message: 'expected a node object' });

export const InstanceListSchema = z
  .array(z.string())
  .nullable()
  .transform((names) => names ?? []);

export const NodeAddressesSchema = z
  .array(z.object({ type: z.string(), address: z.string() }))
  .nullable()
  .transform((addresses): V1NodeAddress[] => addresses ?? []);

const Quantity = z.union([z.string(), z.number()]).transform(String);

export const NodeResourcesSchema = z
  .object({ capacity: z.record(z.string(), Quantity).nullish() })
  .nullable()
  .transform((resources): NodeResources => ({ capacity: resources?.capacity ?? {} }));

export const NodeListSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: z.custom<V1ListMeta>(isObject, { message: 'expected list metadata' }).optional(),
    items: z.array(NodeSchema).nullish(),
  })
  .nullable()
  .transform((list): V1NodeList => {
    const result: V1NodeList = { items: list?.items ?? [] };
    if (list?.apiVersion) result.apiVersion = list.apiVersion;
    if (list?.kind) result.kind = list.kind;
    if (list?.metadata) result.metadata = list.metadata;
    return result;
  });

const HostPrioritySchema = z
  .object({
    host: z.string().optional(),
    node: z.string().optional(),
    score: z.number().int(),
  })
  .refine((entry) => entry.host !== undefined || entry.node !== undefined, {
    message: 'expected a host (or node) name',
  })
  .transform((entry): HostPriority => ({ host: entry.host ?? entry.node ?? '', score: entry.score }));

export const HostPriorityListSchema = z
  .array(HostPrioritySchema)
  .nullable()
  .transform((entries) => entries ?? []);

export const AnnotationsSchema = z
  .record(z.string(), z.string())
  .nullable()
  .transform((annotations) => annotations ?? {});

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export interface DecodeContext {
  operation: string;
  url: string;
}

/** Parse a buffered response body as JSON and check it against a schema. */
export function decodeJson<T>(
  body: Buffer,
  schema: ZodType<T, ZodTypeDef, unknown>,
  context: DecodeContext,
): T {
  const text = body.toString('utf-8');
  if (text.trim() === '') {
    throw new DecodeError('empty response body', context);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(
      `response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { ...context, cause: err },
    );
  }

  const parsed = schema.safeParse(document);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(`unexpected response shape: ${detail}`, { ...context, cause: parsed.error });
  }
  return parsed.data;
}
