import type { V1NodeAddress, V1NodeList, V1Pod } from '@kubernetes/client-node';

// ---------------------------------------------------------------------------
// Capability model
// ---------------------------------------------------------------------------

/**
 * Result of asking a provider whether it implements a capability. A supported
 * capability hands back the object implementing it, which for single-object
 * providers is the provider itself.
 */
export type CapabilityQuery<T> =
  | { readonly supported: true; readonly provider: T }
  | { readonly supported: false };

/** Names of every capability a cloud provider may claim. */
export type CapabilityName =
  | 'instances'
  | 'tcpLoadBalancer'
  | 'zones'
  | 'clusters'
  | 'schedulerExtension';

export function supported<T>(provider: T): CapabilityQuery<T> {
  return { supported: true, provider };
}

export function unsupported<T>(): CapabilityQuery<T> {
  return { supported: false };
}

// ---------------------------------------------------------------------------
// Wire-level value types not covered by the platform API models
// ---------------------------------------------------------------------------

/** Capacity of a node keyed by resource name, values as quantity strings. */
export interface NodeResources {
  capacity: Record<string, string>;
}

/** Score a scheduler extension assigned to one host. */
export interface HostPriority {
  host: string;
  score: number;
}

export interface Zone {
  failureDomain: string;
  region: string;
}

// ---------------------------------------------------------------------------
// Capability interfaces
// ---------------------------------------------------------------------------

export interface Instances {
  /** Enumerate instance names matching a selection pattern; blank means all. */
  list(filter: string): Promise<string[]>;
  nodeAddresses(instance: string): Promise<V1NodeAddress[]>;
  nodeResources(instance: string): Promise<NodeResources>;
  /** Cloud-provider ID of an instance. */
  externalID(instance: string): string;
}

export interface SchedulerExtension {
  /** Narrow the candidate nodes to those admissible for the pod. */
  filter(pod: V1Pod, nodes: V1NodeList): Promise<V1NodeList>;
  /**
   * Score nodes for the pod. Scores are meant to be added to the local
   * scheduler's own before host selection.
   */
  prioritize(pod: V1Pod, nodes: V1NodeList): Promise<HostPriority[]>;
  /** Reserve resources for the pod on host; returns annotations for later lifecycle stages. */
  bind(pod: V1Pod, host: string): Promise<Record<string, string>>;
  /** Release resources previously reserved by bind. */
  unbind(pod: V1Pod): Promise<void>;
}

export interface TCPLoadBalancer {
  getTCPLoadBalancer(name: string, region: string): Promise<{ exists: boolean; ingress?: string }>;
  ensureTCPLoadBalancer(name: string, region: string, hosts: string[], port: number): Promise<string>;
  ensureTCPLoadBalancerDeleted(name: string, region: string): Promise<void>;
}

export interface Zones {
  getZone(): Promise<Zone>;
}

export interface Clusters {
  listClusters(): Promise<string[]>;
  master(clusterName: string): Promise<string>;
}

/** A cloud provider, queried for each optional capability before use. */
export interface CloudProvider {
  instances(): CapabilityQuery<Instances>;
  tcpLoadBalancer(): CapabilityQuery<TCPLoadBalancer>;
  zones(): CapabilityQuery<Zones>;
  clusters(): CapabilityQuery<Clusters>;
  schedulerExtension(): CapabilityQuery<SchedulerExtension>;
}
