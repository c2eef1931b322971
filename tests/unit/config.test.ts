import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config';
import { parseFlags } from '../../src/config/flags';
import { ConfigError } from '../../src/lib/errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      debug: false,
      dryRun: false,
      kube: { local: false, kubeconfig: undefined, namespace: undefined },
      metrics: { host: '0.0.0.0', port: 2112, endpoint: '/metrics' },
    });
  });

  it('reads settings from the environment', () => {
    const config = loadConfig({
      DEBUG: 'true',
      DRY_RUN: 'yes',
      LOCAL: '1',
      KUBECONFIG: '/home/ops/.kube/config',
      WATCH_NAMESPACE: ' databases ',
      METRICS_PORT: '9100',
      METRICS_ENDPOINT: 'prom',
    });

    expect(config.debug).toBe(true);
    expect(config.dryRun).toBe(true);
    expect(config.kube).toEqual({ local: true, kubeconfig: '/home/ops/.kube/config', namespace: 'databases' });
    expect(config.metrics).toEqual({ host: '0.0.0.0', port: 9100, endpoint: '/prom' });
  });

  it('lets command-line flags win over the environment', () => {
    const config = loadConfig(
      { DRY_RUN: 'false', WATCH_NAMESPACE: 'databases', METRICS_PORT: '9100' },
      { dryRun: true, namespace: 'web', metricsPort: '9200' }
    );

    expect(config.dryRun).toBe(true);
    expect(config.kube.namespace).toBe('web');
    expect(config.metrics.port).toBe(9200);
  });

  it('rejects values it cannot interpret', () => {
    expect(() => loadConfig({ DRY_RUN: 'sometimes' })).toThrow(ConfigError);
    expect(() => loadConfig({ METRICS_PORT: 'http' })).toThrow('METRICS_PORT must be a port number (0-65535)');
    expect(() => loadConfig({}, { metricsPort: '70000' })).toThrow('--metrics-port must be a port number');
  });
});

describe('parseFlags', () => {
  it('maps flags to overrides', () => {
    const overrides = parseFlags(
      ['node', 'kube-tagger', '--dry-run', '--local', '--kubeconfig', '/tmp/kc', '--namespace', 'databases', '--metrics-port', '9100'],
      '1.0.0'
    );

    expect(overrides).toEqual({
      dryRun: true,
      local: true,
      kubeconfig: '/tmp/kc',
      namespace: 'databases',
      metricsPort: '9100',
    });
  });

  it('leaves unset flags undefined', () => {
    const overrides = parseFlags(['node', 'kube-tagger'], '1.0.0');

    expect(overrides.debug).toBeUndefined();
    expect(overrides.dryRun).toBeUndefined();
    expect(overrides.namespace).toBeUndefined();
  });
});
