import { InvalidPathSegmentError } from './errors.js';

export const INSTANCES_PATH = '/v1/instances';
export const INSTANCE_ADDRESSES_PATH = 'addresses';
export const INSTANCE_RESOURCES_PATH = 'resources';
export const SCHEDULER_EXTENSION_PATH = '/v1/scheduler';

export type SchedulerVerb = 'filter' | 'prioritize' | 'bind' | 'unbind';

/**
 * Encode a caller-supplied value as exactly one path segment. Dot segments
 * are refused: URL parsing resolves them even when percent-encoded.
 */
export function pathSegment(value: string): string {
  if (value === '.' || value === '..') {
    throw new InvalidPathSegmentError(value, `${JSON.stringify(value)} is not a valid path segment`);
  }
  return encodeURIComponent(value);
}

/** Append a fixed suffix path and encoded segments to a normalized base URL. */
export function buildUrl(base: string, fixedPath: string, ...segments: string[]): string {
  return [base + fixedPath, ...segments.map(pathSegment)].join('/');
}

export function instancesUrl(base: string, filter: string): string {
  return filter.trim() === '' ? buildUrl(base, INSTANCES_PATH) : buildUrl(base, INSTANCES_PATH, filter);
}

export function instanceUrl(base: string, instance: string, resource: string): string {
  return `${buildUrl(base, INSTANCES_PATH, instance)}/${resource}`;
}

export function schedulerUrl(base: string, verb: SchedulerVerb): string {
  return `${base}${SCHEDULER_EXTENSION_PATH}/${verb}`;
}
