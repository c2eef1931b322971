#!/usr/bin/env node
import { readFileSync } from 'fs';
import path from 'path';
import { loadConfig } from './config';
import { parseFlags } from './config/flags';
import { ClaimsController } from './controllers/claims.controller';
import { TagsController } from './controllers/tags.controller';
import logger, { setLogLevel } from './lib/logger';
import { PrometheusMetrics } from './lib/metrics';
import { Ec2Api } from './services/ec2-api';
import { KubeApi, loadKubeConfig } from './services/kube-api';

const readVersion = (): string => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    logger.debug('cannot read package version', { err });
  }
  return 'snapshot';
};

async function start(): Promise<void> {
  const version = readVersion();
  const config = loadConfig(process.env, parseFlags(process.argv, version));
  if (config.debug) {
    setLogLevel('debug');
  }

  logger.info('starting kube-tagger', {
    version,
    dryRun: config.dryRun,
    local: config.kube.local,
    namespace: config.kube.namespace ?? '(all)',
  });

  const metrics = new PrometheusMetrics(config.metrics);
  const kube = KubeApi.fromKubeConfig(loadKubeConfig(config.kube), { namespace: config.kube.namespace });
  const ec2 = new Ec2Api();

  const tagsController = new TagsController(ec2, metrics, { dryRun: config.dryRun });
  const claimsController = new ClaimsController(kube, tagsController, metrics);

  await metrics.start();

  const shutdown = async (signal: string) => {
    logger.info('shutting down', { signal });
    kube.close();
    ec2.destroy();
    logger.debug('final counters', { metrics: await metrics.render() });
    await metrics.shutdown();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err) => {
      logger.error('shutdown failed', { err });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  await kube.watchClaims(async (event) => {
    await claimsController.handle(event);
  });
}

start().catch((err) => {
  logger.error('fatal error, exiting', { err });
  process.exit(1);
});
