import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { V1NodeList, V1Pod } from '@kubernetes/client-node';

// ---------------------------------------------------------------------------
// Record every span the client opens, what it sets on it and how it ends
// ---------------------------------------------------------------------------

interface SpanRecord {
  name: string;
  attributes: Record<string, unknown>;
  outcome: Promise<unknown>;
}

const { spans } = vi.hoisted(() => ({
  spans: new Array<SpanRecord>(),
}));

vi.mock('@remote-cloud/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@remote-cloud/shared')>();
  const withSpan: typeof actual.withSpan = (name, attributes, fn) => {
    const record: SpanRecord = { name, attributes: { ...attributes }, outcome: Promise.resolve() };
    const run = actual.withSpan(name, attributes, (span) => {
      const setAttribute = span.setAttribute.bind(span);
      span.setAttribute = (key, value) => {
        record.attributes[key] = value;
        return setAttribute(key, value);
      };
      return fn(span);
    });
    record.outcome = run.then(
      () => 'ok',
      (err: unknown) => err,
    );
    spans.push(record);
    return run;
  };
  return { ...actual, withSpan };
});

import { newHttpCloud, type HttpCloud } from '../http-cloud.js';
import { DecodeError, EncodeError } from '../errors.js';
import type { Transport } from '../transport.js';

const pod: V1Pod = { metadata: { name: 'web-0', namespace: 'default' } };
const nodes: V1NodeList = { items: [{ metadata: { name: 'n1' } }] };

async function cloudAnswering(body: string): Promise<{ cloud: HttpCloud; transport: Transport }> {
  const transport: Transport = { send: vi.fn<Transport['send']>().mockResolvedValue(Buffer.from(body)) };
  const cloud = await newHttpCloud(
    JSON.stringify({
      'instances': true,
      'instances-url': 'http://inventory.test',
      'scheduler-extension': true,
      'scheduler-extension-url': 'http://extender.test',
    }),
    { transport },
  );
  return { cloud, transport };
}

describe('HttpCloud spans', () => {
  beforeEach(() => {
    spans.length = 0;
  });

  it('opens one span per operation carrying the method, URL and response size', async () => {
    const { cloud } = await cloudAnswering('["n1"]');

    await cloud.list('');

    expect(spans).toHaveLength(1);
    expect(spans[0].name).toBe('http-cloud.list');
    expect(spans[0].attributes).toEqual({
      'http.method': 'GET',
      'http.url': 'http://inventory.test/v1/instances',
      'http.response_content_length': 6,
    });
    await expect(spans[0].outcome).resolves.toBe('ok');
  });

  it('ends the span with the DecodeError when the response cannot be decoded', async () => {
    const { cloud } = await cloudAnswering('{"items": [');

    await expect(cloud.filter(pod, nodes)).rejects.toBeInstanceOf(DecodeError);

    expect(spans).toHaveLength(1);
    expect(spans[0].name).toBe('http-cloud.filter');
    await expect(spans[0].outcome).resolves.toBeInstanceOf(DecodeError);
  });

  it('ends the span with the EncodeError when the request cannot be serialized', async () => {
    const { cloud, transport } = await cloudAnswering('{}');

    await expect(cloud.bind(Object.assign({}, pod, { extra: 10n }), 'n1')).rejects.toBeInstanceOf(EncodeError);

    expect(transport.send).not.toHaveBeenCalled();
    expect(spans).toHaveLength(1);
    expect(spans[0].name).toBe('http-cloud.bind');
    await expect(spans[0].outcome).resolves.toBeInstanceOf(EncodeError);
  });
});
