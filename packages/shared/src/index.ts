export { logger, loggerOptions } from './logger.js';
export { getTracer, getTraceHeaders, withSpan } from './tracing.js';
export * from './cloud-provider.js';
export {
  registerCloudProvider,
  isCloudProviderRegistered,
  registeredCloudProviders,
  getCloudProvider,
  initCloudProvider,
  resetCloudProvidersForTest,
  type CloudConfigSource,
  type CloudProviderFactory,
} from './provider-registry.js';
