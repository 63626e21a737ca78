import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve, isAbsolute } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Project root: src/config -> ../.. (also holds for dist/config)
export const projectRoot = resolve(__dirname, '../..');

// Load environment variables
dotenv.config({ path: join(projectRoot, '.env') });

const positiveInt = z.number().int().positive();

// Configuration schema
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.string().optional(),
  }),
  paths: z.object({
    profiles: z.string().min(1),
    stateDir: z.string().min(1),
    outputDir: z.string().min(1),
    identityMap: z.string().optional(),
  }),
  relay: z.object({
    host: z.string().optional(),
    port: z.number().int().min(1).max(65535),
    username: z.string().optional(),
    password: z.string().optional(),
    privateKeyPath: z.string().optional(),
  }),
  session: z.object({
    targetPort: z.number().int().min(1).max(65535),
    connectTimeoutMs: positiveInt,
    initialPromptTimeoutMs: positiveInt,
    quietPeriodMs: z.number().int().nonnegative(),
  }),
  run: z.object({
    // 0 disables the global deadline
    deadlineMs: z.number().int().nonnegative(),
  }),
  persistence: z.object({
    attempts: positiveInt,
    backoffMs: z.number().int().nonnegative(),
  }),
  lookup: z.object({
    environments: z.record(z.string().url()),
    token: z.string().optional(),
    metric: z.string().min(1),
    timeoutMs: positiveInt,
  }),
});

export type Config = z.infer<typeof configSchema>;

function optional(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function resolvePath(value: string): string {
  return isAbsolute(value) ? value : resolve(projectRoot, value);
}

// LOOKUP_URL_PROD=https://... -> { PROD: 'https://...' }
function lookupEnvironments(env: NodeJS.ProcessEnv): Record<string, string> {
  const environments: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const match = /^LOOKUP_URL_([A-Z0-9_]+)$/.exec(key);
    const url = optional(value);
    if (match && url) {
      environments[match[1]] = url;
    }
  }
  return environments;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const identityMap = optional(env.IDENTITY_MAP_PATH);
  return configSchema.parse({
    nodeEnv: env.NODE_ENV || 'development',
    logging: {
      level: env.LOG_LEVEL || 'info',
      file: optional(env.LOG_FILE),
    },
    paths: {
      profiles: resolvePath(env.PROFILES_PATH || 'config/device-profiles.json'),
      stateDir: resolvePath(env.STATE_DIR || 'state'),
      outputDir: resolvePath(env.OUTPUT_DIR || 'output'),
      identityMap: identityMap ? resolvePath(identityMap) : undefined,
    },
    relay: {
      host: optional(env.RELAY_HOST),
      port: parseInt(env.RELAY_PORT || '22', 10),
      username: optional(env.RELAY_USERNAME),
      password: optional(env.RELAY_PASSWORD),
      privateKeyPath: optional(env.RELAY_PRIVATE_KEY_PATH),
    },
    session: {
      targetPort: parseInt(env.TARGET_SSH_PORT || '22', 10),
      connectTimeoutMs: parseInt(env.CONNECT_TIMEOUT_MS || '90000', 10),
      initialPromptTimeoutMs: parseInt(env.INITIAL_PROMPT_TIMEOUT_MS || '20000', 10),
      quietPeriodMs: parseInt(env.QUIET_PERIOD_MS || '300', 10),
    },
    run: {
      deadlineMs: parseInt(env.RUN_DEADLINE_MS || '0', 10),
    },
    persistence: {
      attempts: parseInt(env.PERSIST_ATTEMPTS || '3', 10),
      backoffMs: parseInt(env.PERSIST_BACKOFF_MS || '50', 10),
    },
    lookup: {
      environments: lookupEnvironments(env),
      token: optional(env.LOOKUP_TOKEN),
      metric: env.LOOKUP_METRIC || 'device_cpe_list',
      timeoutMs: parseInt(env.LOOKUP_TIMEOUT_MS || '15000', 10),
    },
  });
}

// Parse and validate configuration
const config = loadConfig();

export default config;
