import { registerCloudProvider } from '@remote-cloud/shared';
import { newHttpCloud } from './http-cloud.js';

/** Name the provider is discoverable under in the cloud provider registry. */
export const HTTP_PROVIDER_NAME = 'http';

registerCloudProvider(HTTP_PROVIDER_NAME, (config) => newHttpCloud(config));

export { HttpCloud, newHttpCloud, type HttpCloudOptions, type FilterArgs, type PriorityArgs, type BindArgs } from './http-cloud.js';
export { loadHttpCloudConfig, normalizeBaseUrl, type HttpCloudConfig, type PrioritizeCandidates } from './config.js';
export {
  CAPABILITY_REGISTRY,
  CAPABILITY_NAMES,
  resolveCapabilities,
  type CapabilityFlag,
  type CapabilityState,
  type CapabilityUrlField,
} from './capabilities.js';
export {
  createFetchTransport,
  HTTP_PROVIDER_TIMEOUT_MS,
  type FetchTransportOptions,
  type HttpMethod,
  type Transport,
  type TransportRequest,
} from './transport.js';
export { runExtenderRound, type ExtenderRoundOptions, type ExtenderRoundResult } from './extender-round.js';
export {
  ConfigError,
  DecodeError,
  EncodeError,
  InvalidPathSegmentError,
  OperationError,
  TransportError,
  UnsupportedCapabilityError,
  type TransportErrorKind,
} from './errors.js';
