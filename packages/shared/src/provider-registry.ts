import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { logger } from './logger.js';
import type { CloudProvider } from './cloud-provider.js';

const log = logger.child({ module: 'provider-registry' });

/** Raw configuration handed to a provider factory; absent when none was supplied. */
export type CloudConfigSource = Readable | Buffer | string | null | undefined;

export type CloudProviderFactory = (config: CloudConfigSource) => Promise<CloudProvider>;

const providers = new Map<string, CloudProviderFactory>();

/**
 * Register a provider factory under a name. Providers call this when their
 * module is loaded; registering the same name twice is a programming error.
 */
export function registerCloudProvider(name: string, factory: CloudProviderFactory): void {
  if (providers.has(name)) {
    throw new Error(`cloud provider "${name}" was registered twice`);
  }
  log.info({ provider: name }, 'registered cloud provider');
  providers.set(name, factory);
}

export function isCloudProviderRegistered(name: string): boolean {
  return providers.has(name);
}

export function registeredCloudProviders(): string[] {
  return [...providers.keys()].sort();
}

/**
 * Instantiate a registered provider. Resolves to undefined when no provider
 * has that name; factory errors propagate.
 */
export async function getCloudProvider(
  name: string,
  config: CloudConfigSource,
): Promise<CloudProvider | undefined> {
  const factory = providers.get(name);
  if (!factory) return undefined;
  return factory(config);
}

/**
 * Instantiate a provider from a configuration file. An empty path passes no
 * configuration to the factory.
 */
export async function initCloudProvider(name: string, configPath: string): Promise<CloudProvider> {
  if (!providers.has(name)) {
    throw new Error(`unknown cloud provider "${name}"`);
  }

  let config: Buffer | undefined;
  if (configPath) {
    try {
      config = await readFile(configPath);
    } catch (err) {
      throw new Error(`couldn't read cloud provider config ${configPath}`, { cause: err });
    }
  } else {
    log.info({ provider: name }, 'no cloud provider config file given');
  }

  const provider = await getCloudProvider(name, config);
  if (!provider) {
    throw new Error(`unknown cloud provider "${name}"`);
  }
  log.info({ provider: name, configPath: configPath || undefined }, 'cloud provider initialized');
  return provider;
}

/** Drop every registration. Tests only. */
export function resetCloudProvidersForTest(): void {
  providers.clear();
}
