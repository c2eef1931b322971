import { Command } from 'commander';
import type { ConfigOverrides } from './index';

type FlagValues = {
  debug?: boolean;
  local?: boolean;
  kubeconfig?: string;
  dryRun?: boolean;
  namespace?: string;
  metricsPort?: string;
};

/**
 * Parse command-line flags. Unset flags stay undefined so the environment
 * (or its default) still applies.
 */
export function parseFlags(argv: string[], version: string): ConfigOverrides {
  const program = new Command()
    .name('kube-tagger')
    .description('Copy PersistentVolumeClaim tag annotations onto the backing EBS volumes')
    .version(version)
    .option('--debug', 'Enable debug logging')
    .option('--local', 'Run outside the cluster using a kubeconfig file')
    .option('--kubeconfig <path>', 'Path to kubeconfig (local mode)')
    .option('--dry-run', "Don't actually tag the volumes")
    .option('--namespace <namespace>', 'Only watch claims in this namespace')
    .option('--metrics-port <port>', 'Port for the Prometheus scrape endpoint')
    .allowExcessArguments(false);

  program.parse(argv);
  const opts = program.opts<FlagValues>();

  return {
    debug: opts.debug,
    local: opts.local,
    kubeconfig: opts.kubeconfig,
    dryRun: opts.dryRun,
    namespace: opts.namespace,
    metricsPort: opts.metricsPort,
  };
}
