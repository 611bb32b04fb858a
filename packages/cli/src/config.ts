/**
 * CLI configuration loading
 *
 * Profiles live in a YAML file (~/.config/avrodeck/config.yaml by default).
 * A missing file is created with a local profile. When the file names no
 * usable profile, settings come from the environment instead.
 *
 * Priority (highest to lowest):
 * 1. Profile picked in the selector
 * 2. The file's default profile
 * 3. Process environment variables
 */

import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, hasErrorCode } from './errors.js';

// ============================================================================
// File schema
// ============================================================================

const registrySchema = z.object({
  url: z.string().url(),
  auth_method: z.enum(['none', 'basic']).optional(),
  api_key: z.string().optional(),
  api_secret: z.string().optional(),
});

const kafkaSchema = z.object({
  bootstrap_servers: z.string(),
  security_protocol: z.enum(['PLAINTEXT', 'SASL_SSL']).default('PLAINTEXT'),
  sasl_mechanism: z.enum(['plain']).optional(),
  sasl_username: z.string().optional(),
  sasl_password: z.string().optional(),
});

export const profileSchema = z.object({
  name: z.string().min(1),
  schema_registry: registrySchema,
  kafka: kafkaSchema.optional(),
});

export const configFileSchema = z.object({
  default: z.string(),
  configurations: z.record(z.string(), profileSchema),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ProfileConfig = z.infer<typeof profileSchema>;

// ============================================================================
// Resolved configuration
// ============================================================================

export type SecurityProtocol = 'PLAINTEXT' | 'SASL_SSL';

export interface RegistryConfig {
  url: string;
  apiKey?: string;
  apiSecret?: string;
}

export interface KafkaConfig {
  brokers: string[];
  securityProtocol: SecurityProtocol;
  saslUsername?: string;
  saslPassword?: string;
}

export interface AppConfig {
  /** Display name of the profile, or 'environment' */
  profileName: string;
  registry: RegistryConfig;
  /** null when no bootstrap servers are configured */
  kafka: KafkaConfig | null;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ConfigFile = {
  default: 'local',
  configurations: {
    local: {
      name: 'Local Development',
      schema_registry: { url: 'http://localhost:8081' },
      kafka: { bootstrap_servers: 'localhost:9092', security_protocol: 'PLAINTEXT' },
    },
  },
};

export function configDir(): string {
  return path.join(os.homedir(), '.config', 'avrodeck');
}

export function defaultConfigPath(env: Env = process.env): string {
  return env.AVRODECK_CONFIG || path.join(configDir(), 'config.yaml');
}

export function defaultLogPath(env: Env = process.env): string {
  return env.AVRODECK_LOG_FILE || path.join(configDir(), 'avrodeck.log');
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and validate the config file. Resolves with null when it does not exist.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFile | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw new ConfigError(`cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`invalid config file ${filePath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Write the config file. The directory is private to the user and the file
 * readable only by them, since profiles may hold credentials.
 */
export async function saveConfigFile(filePath: string, file: ConfigFile): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true, mode: 0o700 });
  await writeFile(filePath, stringifyYaml(file), { mode: 0o600 });
  // writeFile only applies the mode when it creates the file
  await chmod(filePath, 0o600);
}

export async function createDefaultConfig(filePath: string): Promise<ConfigFile> {
  await saveConfigFile(filePath, DEFAULT_CONFIG);
  return DEFAULT_CONFIG;
}

export async function ensureConfigFile(filePath: string): Promise<ConfigFile> {
  return (await loadConfigFile(filePath)) ?? createDefaultConfig(filePath);
}

/**
 * Profile ids for display: the default profile first, the rest alphabetical.
 */
export function orderedProfiles(file: ConfigFile): string[] {
  const ids = Object.keys(file.configurations).sort();
  return ids.includes(file.default) ? [file.default, ...ids.filter((id) => id !== file.default)] : ids;
}

// ============================================================================
// Resolution
// ============================================================================

export function resolveConfig(file: ConfigFile | null, selected: string | null, env: Env = process.env): AppConfig {
  if (file && selected !== null) {
    const profile = file.configurations[selected];
    if (!profile) throw new ConfigError(`profile "${selected}" not found`);
    return profileToConfig(profile);
  }

  const fallback = file?.configurations[file.default];
  return fallback ? profileToConfig(fallback) : configFromEnv(env);
}

export function profileToConfig(profile: ProfileConfig): AppConfig {
  const { schema_registry: registry, kafka } = profile;
  const useAuth = registry.auth_method !== 'none' && Boolean(registry.api_key) && Boolean(registry.api_secret);

  return {
    profileName: profile.name,
    registry: {
      url: registry.url,
      ...(useAuth ? { apiKey: registry.api_key, apiSecret: registry.api_secret } : {}),
    },
    kafka: kafka
      ? kafkaConfig(kafka.bootstrap_servers, kafka.security_protocol, kafka.sasl_username, kafka.sasl_password)
      : null,
  };
}

export function configFromEnv(env: Env): AppConfig {
  const url = env.SCHEMA_REGISTRY_URL;
  if (!url) {
    throw new ConfigError('SCHEMA_REGISTRY_URL environment variable is required');
  }

  const protocol = env.KAFKA_SECURITY_PROTOCOL || 'PLAINTEXT';
  if (protocol !== 'PLAINTEXT' && protocol !== 'SASL_SSL') {
    throw new ConfigError(`unsupported KAFKA_SECURITY_PROTOCOL "${protocol}"`);
  }

  const apiKey = env.SCHEMA_REGISTRY_API_KEY;
  const apiSecret = env.SCHEMA_REGISTRY_API_SECRET;

  return {
    profileName: 'environment',
    registry: { url, ...(apiKey && apiSecret ? { apiKey, apiSecret } : {}) },
    kafka: kafkaConfig(env.KAFKA_BOOTSTRAP_SERVERS ?? '', protocol, env.KAFKA_SASL_USERNAME, env.KAFKA_SASL_PASSWORD),
  };
}

function kafkaConfig(
  bootstrapServers: string,
  securityProtocol: SecurityProtocol,
  saslUsername: string | undefined,
  saslPassword: string | undefined,
): KafkaConfig | null {
  const brokers = bootstrapServers
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server !== '');
  if (brokers.length === 0) return null;

  return {
    brokers,
    securityProtocol,
    ...(saslUsername && saslPassword ? { saslUsername, saslPassword } : {}),
  };
}
