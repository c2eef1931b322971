import type { Counter } from '@opentelemetry/api';
import { PrometheusExporter, PrometheusSerializer } from '@opentelemetry/exporter-prometheus';
import { Resource } from '@opentelemetry/resources';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { SEMRESATTRS_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import logger from '../logger';

export type CounterName = 'eventsProcessed' | 'tagsAdded' | 'tagsExisting' | 'volumesTagged' | 'processingErrors';

export const COUNTERS: Record<CounterName, { name: string; description: string }> = {
  eventsProcessed: {
    name: 'kubetagger_processed_events_total',
    description: 'The total number of processed events',
  },
  tagsAdded: {
    name: 'kubetagger_volume_tags_added',
    description: 'Number of tags added to volumes',
  },
  tagsExisting: {
    name: 'kubetagger_volume_tags_existing',
    description: 'Number of tags already existing on volumes',
  },
  volumesTagged: {
    name: 'kubetagger_volumes_tagged',
    description: 'Number of volumes that received at least one new tag',
  },
  processingErrors: {
    name: 'kubetagger_errors',
    description: 'Number of errors while processing',
  },
};

/** Counters the reconciler reports into; owned by the process and injected. */
export interface MetricsRegistry {
  inc(counter: CounterName, value?: number): void;
}

export class InMemoryMetrics implements MetricsRegistry {
  private readonly values = new Map<CounterName, number>();

  inc(counter: CounterName, value = 1): void {
    this.values.set(counter, this.get(counter) + value);
  }

  get(counter: CounterName): number {
    return this.values.get(counter) ?? 0;
  }

  snapshot(): Record<CounterName, number> {
    return {
      eventsProcessed: this.get('eventsProcessed'),
      tagsAdded: this.get('tagsAdded'),
      tagsExisting: this.get('tagsExisting'),
      volumesTagged: this.get('volumesTagged'),
      processingErrors: this.get('processingErrors'),
    };
  }
}

const SERVICE_NAME = 'kube-tagger';

export type PrometheusMetricsOptions = {
  host: string;
  port: number;
  endpoint: string;
};

/**
 * OpenTelemetry counters exposed through the Prometheus exporter's own
 * scrape listener. The listener is only bound by `start()`.
 */
export class PrometheusMetrics implements MetricsRegistry {
  private readonly log = logger.child('metrics');
  private readonly exporter: PrometheusExporter;
  private readonly provider: MeterProvider;
  private readonly counters: Record<CounterName, Counter>;

  constructor(private readonly options: PrometheusMetricsOptions) {
    this.exporter = new PrometheusExporter({
      host: options.host,
      port: options.port,
      endpoint: options.endpoint,
      preventServerStart: true,
    });
    this.provider = new MeterProvider({
      resource: Resource.default().merge(new Resource({ [SEMRESATTRS_SERVICE_NAME]: SERVICE_NAME })),
      readers: [this.exporter],
    });

    const meter = this.provider.getMeter(SERVICE_NAME);
    const counter = (key: CounterName): Counter =>
      meter.createCounter(COUNTERS[key].name, { description: COUNTERS[key].description });
    this.counters = {
      eventsProcessed: counter('eventsProcessed'),
      tagsAdded: counter('tagsAdded'),
      tagsExisting: counter('tagsExisting'),
      volumesTagged: counter('volumesTagged'),
      processingErrors: counter('processingErrors'),
    };
  }

  async start(): Promise<void> {
    await this.exporter.startServer();
    this.log.info('metrics endpoint listening', {
      host: this.options.host,
      port: this.options.port,
      endpoint: this.options.endpoint,
    });
  }

  inc(counter: CounterName, value = 1): void {
    this.counters[counter].add(value);
  }

  /** Current counters in the Prometheus text exposition format. */
  async render(): Promise<string> {
    const { resourceMetrics, errors } = await this.exporter.collect();
    if (errors.length > 0) {
      this.log.warn('metric collection reported errors', { errors });
    }
    return new PrometheusSerializer().serialize(resourceMetrics);
  }

  async shutdown(): Promise<void> {
    await this.provider.shutdown();
  }
}
