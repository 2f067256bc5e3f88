import type { ZodType, ZodTypeDef } from 'zod';
import type { V1NodeAddress, V1NodeList, V1Pod } from '@kubernetes/client-node';
import {
  logger,
  supported,
  unsupported,
  withSpan,
  type CapabilityName,
  type CapabilityQuery,
  type CloudConfigSource,
  type CloudProvider,
  type Clusters,
  type HostPriority,
  type Instances,
  type NodeResources,
  type SchedulerExtension,
  type TCPLoadBalancer,
  type Zones,
} from '@remote-cloud/shared';
import {
  CAPABILITY_REGISTRY,
  resolveCapabilities,
  type CapabilityState,
  type RemoteCapability,
} from './capabilities.js';
import { loadHttpCloudConfig, type HttpCloudConfig } from './config.js';
import {
  AnnotationsSchema,
  HostPriorityListSchema,
  InstanceListSchema,
  NodeAddressesSchema,
  NodeListSchema,
  NodeResourcesSchema,
  decodeJson,
} from './decode.js';
import { DecodeError, EncodeError, InvalidPathSegmentError, UnsupportedCapabilityError } from './errors.js';
import { runExtenderRound, type ExtenderRoundResult } from './extender-round.js';
import {
  INSTANCE_ADDRESSES_PATH,
  INSTANCE_RESOURCES_PATH,
  instanceUrl,
  instancesUrl,
  schedulerUrl,
} from './paths.js';
import { createFetchTransport, type HttpMethod, type Transport } from './transport.js';

const log = logger.child({ module: 'http-cloud' });

export interface HttpCloudOptions {
  /** Defaults to a fetch transport with the fixed provider timeout. */
  transport?: Transport;
}

/** Request body of filter and prioritize. */
export interface FilterArgs {
  pod: V1Pod;
  nodes: V1NodeList;
}

export type PriorityArgs = FilterArgs;

/** Request body of bind. */
export interface BindArgs {
  pod: V1Pod;
  host: string;
}

/**
 * Cloud provider backed by a remote HTTP/JSON service. One instance serves
 * every enabled capability; the capability queries hand back `this`.
 *
 * The client keeps no per-call state, so concurrent operations are
 * independent of each other.
 */
export class HttpCloud implements CloudProvider, Instances, SchedulerExtension {
  private readonly config: HttpCloudConfig;
  private readonly transport: Transport;
  private readonly states: Readonly<Record<CapabilityName, CapabilityState>>;

  constructor(config: HttpCloudConfig, options: HttpCloudOptions = {}) {
    this.config = config;
    this.transport = options.transport ?? createFetchTransport();
    this.states = resolveCapabilities(config.flags);
  }

  // -------------------------------------------------------------------------
  // Capability queries
  // -------------------------------------------------------------------------

  capabilities(): Record<CapabilityName, CapabilityState> {
    return { ...this.states };
  }

  instances(): CapabilityQuery<Instances> {
    return this.states.instances === 'supported' ? supported<Instances>(this) : unsupported();
  }

  schedulerExtension(): CapabilityQuery<SchedulerExtension> {
    return this.states.schedulerExtension === 'supported' ? supported<SchedulerExtension>(this) : unsupported();
  }

  tcpLoadBalancer(): CapabilityQuery<TCPLoadBalancer> {
    return unsupported();
  }

  zones(): CapabilityQuery<Zones> {
    return unsupported();
  }

  clusters(): CapabilityQuery<Clusters> {
    return unsupported();
  }

  // -------------------------------------------------------------------------
  // Instances
  // -------------------------------------------------------------------------

  async list(filter: string): Promise<string[]> {
    const url = instancesUrl(this.baseUrl('instances'), filter);
    return this.get('list', url, InstanceListSchema);
  }

  async nodeAddresses(instance: string): Promise<V1NodeAddress[]> {
    const url = instanceUrl(this.baseUrl('instances'), requireName(instance), INSTANCE_ADDRESSES_PATH);
    return this.get('nodeAddresses', url, NodeAddressesSchema);
  }

  async nodeResources(instance: string): Promise<NodeResources> {
    const url = instanceUrl(this.baseUrl('instances'), requireName(instance), INSTANCE_RESOURCES_PATH);
    return this.get('nodeResources', url, NodeResourcesSchema);
  }

  /** The instance name doubles as its cloud-provider ID. */
  externalID(instance: string): string {
    return instance;
  }

  // -------------------------------------------------------------------------
  // Scheduler extension
  // -------------------------------------------------------------------------

  async filter(pod: V1Pod, nodes: V1NodeList): Promise<V1NodeList> {
    const args: FilterArgs = { pod, nodes };
    return this.post('filter', schedulerUrl(this.baseUrl('schedulerExtension'), 'filter'), args, NodeListSchema);
  }

  // Scores come back unweighted; the scheduler adds them to its own.
  async prioritize(pod: V1Pod, nodes: V1NodeList): Promise<HostPriority[]> {
    const args: PriorityArgs = { pod, nodes };
    const url = schedulerUrl(this.baseUrl('schedulerExtension'), 'prioritize');
    return this.post('prioritize', url, args, HostPriorityListSchema);
  }

  /**
   * Ask the remote service to reserve resources for the pod on host. Any
   * error leaves the reservation in an unknown state; callers are expected to
   * unbind.
   */
  async bind(pod: V1Pod, host: string): Promise<Record<string, string>> {
    const args: BindArgs = { pod, host };
    return this.post('bind', schedulerUrl(this.baseUrl('schedulerExtension'), 'bind'), args, AnnotationsSchema);
  }

  async unbind(pod: V1Pod): Promise<void> {
    const url = schedulerUrl(this.baseUrl('schedulerExtension'), 'unbind');
    await this.exchange('unbind', 'POST', url, pod, () => undefined);
  }

  /** Filter then prioritize, scoring the candidate set chosen in configuration. */
  async scheduleRound(pod: V1Pod, nodes: V1NodeList): Promise<ExtenderRoundResult> {
    return runExtenderRound(this, pod, nodes, {
      prioritizeCandidates: this.config.prioritizeCandidates,
    });
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private baseUrl(capability: RemoteCapability): string {
    const base = this.config.urls[CAPABILITY_REGISTRY[capability].url];
    if (this.states[capability] !== 'supported' || !base) {
      throw new UnsupportedCapabilityError(capability);
    }
    return base;
  }

  private async get<T>(operation: string, url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    return this.exchange(operation, 'GET', url, undefined, (body) => this.decode(operation, url, body, schema));
  }

  private async post<T>(
    operation: string,
    url: string,
    payload: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    return this.exchange(operation, 'POST', url, payload, (body) => this.decode(operation, url, body, schema));
  }

  /** Send one request and read its body inside the operation's span. */
  private async exchange<T>(
    operation: string,
    method: HttpMethod,
    url: string,
    payload: unknown,
    read: (body: Buffer) => T,
  ): Promise<T> {
    return withSpan(`http-cloud.${operation}`, { 'http.method': method, 'http.url': url }, async (span) => {
      const body = payload === undefined ? undefined : encode(operation, url, payload);
      const response = await this.transport.send({ operation, method, url, body });
      span.setAttribute('http.response_content_length', response.length);
      return read(response);
    });
  }

  private decode<T>(operation: string, url: string, body: Buffer, schema: ZodType<T, ZodTypeDef, unknown>): T {
    try {
      return decodeJson(body, schema, { operation, url });
    } catch (err) {
      if (err instanceof DecodeError) {
        log.warn({ operation, url, err }, 'could not decode response');
      }
      throw err;
    }
  }
}

function requireName(instance: string): string {
  if (instance === '') {
    throw new InvalidPathSegmentError(instance, 'instance name must not be empty');
  }
  return instance;
}

function encode(operation: string, url: string, payload: unknown): string {
  try {
    return JSON.stringify(payload);
  } catch (err) {
    throw new EncodeError(
      `couldn't encode request: ${err instanceof Error ? err.message : String(err)}`,
      { operation, url, cause: err },
    );
  }
}

/**
 * Build an HttpCloud from a raw configuration source. This is the factory
 * registered under the `http` provider name.
 */
export async function newHttpCloud(source: CloudConfigSource, options: HttpCloudOptions = {}): Promise<HttpCloud> {
  const config = await loadHttpCloudConfig(source);
  return new HttpCloud(config, options);
}
