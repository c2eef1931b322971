import dotenv from 'dotenv';
import { ConfigError } from '../lib/errors';

dotenv.config();

export type Config = {
  debug: boolean;
  dryRun: boolean;
  kube: {
    local: boolean;
    kubeconfig?: string;
    namespace?: string;
  };
  metrics: {
    host: string;
    port: number;
    endpoint: string;
  };
};

/** Values given on the command line; they win over the environment. */
export type ConfigOverrides = {
  debug?: boolean;
  dryRun?: boolean;
  local?: boolean;
  kubeconfig?: string;
  namespace?: string;
  metricsPort?: string;
};

type Env = Record<string, string | undefined>;

const getEnv = (env: Env, key: string, fallback?: string): string => {
  const value = env[key] ?? fallback;
  if (!value) {
    throw new ConfigError(`Missing required env var ${key}`);
  }
  return value;
};

const getEnvOptional = (env: Env, key: string): string | undefined => {
  const value = env[key];
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toPort = (value: string, key: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new ConfigError(`${key} must be a port number (0-65535)`);
  }
  return parsed;
};

const toBoolean = (value: string, key: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) return true;
  if (['false', '0', 'no', 'n'].includes(normalized)) return false;
  throw new ConfigError(`Env var ${key} must be boolean-like (true/false)`);
};

const toEndpoint = (value: string): string => (value.startsWith('/') ? value : `/${value}`);

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): Config {
  const flag = (override: boolean | undefined, key: string): boolean =>
    override ?? toBoolean(getEnv(env, key, 'false'), key);

  return {
    debug: flag(overrides.debug, 'DEBUG'),
    dryRun: flag(overrides.dryRun, 'DRY_RUN'),
    kube: {
      local: flag(overrides.local, 'LOCAL'),
      kubeconfig: overrides.kubeconfig ?? getEnvOptional(env, 'KUBECONFIG'),
      namespace: overrides.namespace ?? getEnvOptional(env, 'WATCH_NAMESPACE'),
    },
    metrics: {
      host: getEnv(env, 'METRICS_HOST', '0.0.0.0'),
      port: overrides.metricsPort !== undefined
        ? toPort(overrides.metricsPort, '--metrics-port')
        : toPort(getEnv(env, 'METRICS_PORT', '2112'), 'METRICS_PORT'),
      endpoint: toEndpoint(getEnv(env, 'METRICS_ENDPOINT', '/metrics')),
    },
  };
}
