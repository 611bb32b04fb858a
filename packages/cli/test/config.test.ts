/**
 * Unit tests for config file loading and profile resolution.
 */

import { chmod, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  defaultConfigPath,
  ensureConfigFile,
  loadConfigFile,
  orderedProfiles,
  profileToConfig,
  resolveConfig,
  saveConfigFile,
  type ConfigFile,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const FILE: ConfigFile = {
  default: 'staging',
  configurations: {
    prod: {
      name: 'Production',
      schema_registry: { url: 'https://registry.example.com', api_key: 'test-key', api_secret: 'test-secret' },
      kafka: {
        bootstrap_servers: 'broker-1:9092, broker-2:9092',
        security_protocol: 'SASL_SSL',
        sasl_username: 'test-user',
        sasl_password: 'test-password',
      },
    },
    local: {
      name: 'Local',
      schema_registry: { url: 'http://localhost:8081' },
    },
    staging: {
      name: 'Staging',
      schema_registry: { url: 'http://staging:8081', auth_method: 'none', api_key: 'test-key', api_secret: 'test-secret' },
      kafka: { bootstrap_servers: 'staging:9092', security_protocol: 'PLAINTEXT' },
    },
  },
};

describe('config file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'avrodeck-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a private default file when none exists', async () => {
    const filePath = path.join(dir, 'nested', 'config.yaml');

    const file = await ensureConfigFile(filePath);

    expect(file).toEqual(DEFAULT_CONFIG);
    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    expect((await stat(path.dirname(filePath))).mode & 0o777).toBe(0o700);
    expect(await loadConfigFile(filePath)).toEqual(DEFAULT_CONFIG);
  });

  it('keeps an existing file untouched', async () => {
    const filePath = path.join(dir, 'config.yaml');
    const content = [
      'default: local',
      'configurations:',
      '  local:',
      '    name: Mine',
      '    schema_registry:',
      '      url: http://registry:8081',
      '',
    ].join('\n');
    await writeFile(filePath, content);

    const file = await ensureConfigFile(filePath);

    expect(file.configurations.local?.name).toBe('Mine');
    expect(await readFile(filePath, 'utf-8')).toBe(content);
  });

  it('saves profiles so they load back and stay private', async () => {
    const filePath = path.join(dir, 'config.yaml');
    await writeFile(filePath, 'default: local\n');
    await chmod(filePath, 0o644);

    await saveConfigFile(filePath, FILE);

    expect((await stat(filePath)).mode & 0o777).toBe(0o600);
    expect(await loadConfigFile(filePath)).toEqual(FILE);
  });

  it('resolves null for a missing file', async () => {
    expect(await loadConfigFile(path.join(dir, 'missing.yaml'))).toBeNull();
  });

  it('rejects malformed YAML', async () => {
    const filePath = path.join(dir, 'config.yaml');
    await writeFile(filePath, 'default: [unclosed');

    await expect(loadConfigFile(filePath)).rejects.toThrow(ConfigError);
  });

  it('names the offending field when validation fails', async () => {
    const filePath = path.join(dir, 'config.yaml');
    await writeFile(
      filePath,
      ['default: local', 'configurations:', '  local:', '    name: Local', '    schema_registry:', '      url: not-a-url'].join(
        '\n',
      ),
    );

    await expect(loadConfigFile(filePath)).rejects.toThrow('configurations.local.schema_registry.url: Invalid url');
  });
});

describe('orderedProfiles', () => {
  it('lists the default profile first and the rest alphabetically', () => {
    expect(orderedProfiles(FILE)).toEqual(['staging', 'local', 'prod']);
  });

  it('sorts every profile when the default is missing', () => {
    expect(orderedProfiles({ ...FILE, default: 'gone' })).toEqual(['local', 'prod', 'staging']);
  });
});

describe('resolveConfig', () => {
  it('uses the selected profile', () => {
    const config = resolveConfig(FILE, 'prod', {});

    expect(config).toEqual({
      profileName: 'Production',
      registry: { url: 'https://registry.example.com', apiKey: 'test-key', apiSecret: 'test-secret' },
      kafka: {
        brokers: ['broker-1:9092', 'broker-2:9092'],
        securityProtocol: 'SASL_SSL',
        saslUsername: 'test-user',
        saslPassword: 'test-password',
      },
    });
  });

  it('falls back to the default profile and ignores keys when auth is disabled', () => {
    const config = resolveConfig(FILE, null, {});

    expect(config).toEqual({
      profileName: 'Staging',
      registry: { url: 'http://staging:8081' },
      kafka: { brokers: ['staging:9092'], securityProtocol: 'PLAINTEXT' },
    });
  });

  it('leaves Kafka unconfigured for a profile without it', () => {
    expect(resolveConfig(FILE, 'local', {}).kafka).toBeNull();
  });

  it('rejects an unknown selected profile', () => {
    expect(() => resolveConfig(FILE, 'qa', {})).toThrow('profile "qa" not found');
  });

  it('reads the environment when the default profile does not exist', () => {
    const config = resolveConfig({ ...FILE, default: 'gone' }, null, {
      SCHEMA_REGISTRY_URL: 'http://env-registry:8081',
      KAFKA_BOOTSTRAP_SERVERS: 'env-broker:9092',
    });

    expect(config).toEqual({
      profileName: 'environment',
      registry: { url: 'http://env-registry:8081' },
      kafka: { brokers: ['env-broker:9092'], securityProtocol: 'PLAINTEXT' },
    });
  });
});

describe('configFromEnv', () => {
  it('requires the registry URL', () => {
    expect(() => configFromEnv({})).toThrow('SCHEMA_REGISTRY_URL environment variable is required');
  });

  it('reads credentials and comma-separated brokers', () => {
    const config = configFromEnv({
      SCHEMA_REGISTRY_URL: 'http://registry:8081',
      SCHEMA_REGISTRY_API_KEY: 'test-key',
      SCHEMA_REGISTRY_API_SECRET: 'test-secret',
      KAFKA_BOOTSTRAP_SERVERS: ' a:9092, b:9092 ,',
      KAFKA_SECURITY_PROTOCOL: 'SASL_SSL',
      KAFKA_SASL_USERNAME: 'test-user',
      KAFKA_SASL_PASSWORD: 'test-password',
    });

    expect(config.registry).toEqual({ url: 'http://registry:8081', apiKey: 'test-key', apiSecret: 'test-secret' });
    expect(config.kafka).toEqual({
      brokers: ['a:9092', 'b:9092'],
      securityProtocol: 'SASL_SSL',
      saslUsername: 'test-user',
      saslPassword: 'test-password',
    });
  });

  it('rejects an unknown security protocol', () => {
    expect(() => configFromEnv({ SCHEMA_REGISTRY_URL: 'http://registry:8081', KAFKA_SECURITY_PROTOCOL: 'SSL' })).toThrow(
      'unsupported KAFKA_SECURITY_PROTOCOL "SSL"',
    );
  });
});

describe('profileToConfig', () => {
  it('treats empty bootstrap servers as no Kafka', () => {
    const config = profileToConfig({
      name: 'Registry only',
      schema_registry: { url: 'http://registry:8081' },
      kafka: { bootstrap_servers: '', security_protocol: 'PLAINTEXT' },
    });

    expect(config.kafka).toBeNull();
  });
});

describe('defaultConfigPath', () => {
  it('prefers AVRODECK_CONFIG', () => {
    expect(defaultConfigPath({ AVRODECK_CONFIG: '/etc/avrodeck.yaml' })).toBe('/etc/avrodeck.yaml');
  });
});
