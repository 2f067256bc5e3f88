import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock node:fs/promises
// ---------------------------------------------------------------------------

const { mockReadFile } = vi.hoisted(() => ({
  mockReadFile: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  readFile: mockReadFile,
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import {
  getCloudProvider,
  initCloudProvider,
  isCloudProviderRegistered,
  registerCloudProvider,
  registeredCloudProviders,
  resetCloudProvidersForTest,
  type CloudConfigSource,
} from '../provider-registry.js';
import { unsupported, type CloudProvider } from '../cloud-provider.js';

const emptyProvider: CloudProvider = {
  instances: () => unsupported(),
  tcpLoadBalancer: () => unsupported(),
  zones: () => unsupported(),
  clusters: () => unsupported(),
  schedulerExtension: () => unsupported(),
};

describe('provider registry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetCloudProvidersForTest();
  });

  it('lists registered providers by name', () => {
    registerCloudProvider('zeta', async () => emptyProvider);
    registerCloudProvider('alpha', async () => emptyProvider);

    expect(registeredCloudProviders()).toEqual(['alpha', 'zeta']);
    expect(isCloudProviderRegistered('alpha')).toBe(true);
    expect(isCloudProviderRegistered('beta')).toBe(false);
  });

  it('rejects a second registration under the same name', () => {
    registerCloudProvider('http', async () => emptyProvider);

    expect(() => registerCloudProvider('http', async () => emptyProvider)).toThrow(
      'cloud provider "http" was registered twice',
    );
  });

  it('passes the raw config to the factory', async () => {
    const factory = vi.fn(async (_config: CloudConfigSource) => emptyProvider);
    registerCloudProvider('http', factory);

    const provider = await getCloudProvider('http', '{"instances": false}');

    expect(provider).toBe(emptyProvider);
    expect(factory).toHaveBeenCalledWith('{"instances": false}');
  });

  it('resolves to undefined for an unknown provider', async () => {
    await expect(getCloudProvider('missing', null)).resolves.toBeUndefined();
  });

  it('propagates factory errors', async () => {
    registerCloudProvider('broken', async () => {
      throw new Error('bad config');
    });

    await expect(getCloudProvider('broken', '{}')).rejects.toThrow('bad config');
  });

  describe('initCloudProvider', () => {
    it('reads the config file and hands its bytes to the factory', async () => {
      const contents = Buffer.from('{"zones": false}');
      mockReadFile.mockResolvedValue(contents);
      const factory = vi.fn(async (_config: CloudConfigSource) => emptyProvider);
      registerCloudProvider('http', factory);

      const provider = await initCloudProvider('http', '/etc/remote-cloud/http.json');

      expect(provider).toBe(emptyProvider);
      expect(mockReadFile).toHaveBeenCalledWith('/etc/remote-cloud/http.json');
      expect(factory).toHaveBeenCalledWith(contents);
    });

    it('gives the factory no config when the path is empty', async () => {
      const factory = vi.fn(async (_config: CloudConfigSource) => emptyProvider);
      registerCloudProvider('http', factory);

      await initCloudProvider('http', '');

      expect(mockReadFile).not.toHaveBeenCalled();
      expect(factory).toHaveBeenCalledWith(undefined);
    });

    it('fails when the config file cannot be read', async () => {
      mockReadFile.mockRejectedValue(new Error('ENOENT: no such file or directory'));
      registerCloudProvider('http', async () => emptyProvider);

      await expect(initCloudProvider('http', '/missing.json')).rejects.toThrow(
        "couldn't read cloud provider config /missing.json",
      );
    });

    it('fails for an unknown provider without touching the filesystem', async () => {
      await expect(initCloudProvider('aws', '/etc/aws.json')).rejects.toThrow('unknown cloud provider "aws"');
      expect(mockReadFile).not.toHaveBeenCalled();
    });
  });
});
