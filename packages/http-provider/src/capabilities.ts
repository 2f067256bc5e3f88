import type { CapabilityName } from '@remote-cloud/shared';

// ---------------------------------------------------------------------------
// Capability table — which configuration keys drive each capability
// ---------------------------------------------------------------------------

interface CapabilitySpec {
  /** Boolean key in the configuration file. */
  flag: string;
  /** Base URL key the capability is served from, if it talks to the remote service. */
  url: string | null;
  /** Whether this adapter can serve the capability at all. */
  served: boolean;
  desc: string;
}

export const CAPABILITY_REGISTRY = {
  instances:          { flag: 'instances',           url: 'instances-url',           served: true,  desc: 'Instance inventory' },
  tcpLoadBalancer:    { flag: 'tcp-load-balancer',   url: null,                      served: false, desc: 'TCP load balancers' },
  zones:              { flag: 'zones',               url: null,                      served: false, desc: 'Failure zones' },
  clusters:           { flag: 'clusters',            url: null,                      served: false, desc: 'Cluster enumeration' },
  schedulerExtension: { flag: 'scheduler-extension', url: 'scheduler-extension-url', served: true,  desc: 'Scheduler extension' },
} as const satisfies Record<CapabilityName, CapabilitySpec>;

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'instances',
  'tcpLoadBalancer',
  'zones',
  'clusters',
  'schedulerExtension',
];

type Registry = typeof CAPABILITY_REGISTRY;

/** Configuration key of a capability flag, e.g. `scheduler-extension`. */
export type CapabilityFlag = Registry[CapabilityName]['flag'];

/** Configuration key of a capability base URL, e.g. `instances-url`. */
export type CapabilityUrlField = Exclude<Registry[CapabilityName]['url'], null>;

/** Capabilities that are reached over HTTP and therefore carry a base URL. */
export type RemoteCapability = {
  [K in CapabilityName]: Registry[K]['url'] extends null ? never : K;
}[CapabilityName];

export type CapabilityState = 'supported' | 'unsupported';

/**
 * Resolve the effective state of every capability: the configuration flag
 * must be set and the adapter must be able to serve it.
 */
export function resolveCapabilities(
  flags: Readonly<Record<CapabilityName, boolean>>,
): Record<CapabilityName, CapabilityState> {
  const state = (name: CapabilityName): CapabilityState =>
    flags[name] && CAPABILITY_REGISTRY[name].served ? 'supported' : 'unsupported';
  return {
    instances: state('instances'),
    tcpLoadBalancer: state('tcpLoadBalancer'),
    zones: state('zones'),
    clusters: state('clusters'),
    schedulerExtension: state('schedulerExtension'),
  };
}
