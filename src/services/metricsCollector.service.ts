import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import {
  loadResourceCatalogue,
  minimumIntervalMs,
  type ContainerDefinition,
  type ResourceCatalogue,
} from '../integrations/mercedes/catalogue';
import type {
  ContainerResult,
  VehicleDataClient,
} from '../integrations/mercedes/vehicleData.client';
import { ResourceGauges } from '../metrics/vehicleMetrics';
import { describeError, isReauthorizationRequired, isTokenError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { TokenManager } from './tokenManager.service';

export const AuthStatus = {
  reauthorizationRequired: 0,
  ok: 1,
  transientFailure: 2,
} as const;

type ContainerSchedule = {
  definition: ContainerDefinition;
  resources: ResourceGauges[];
  lastCalledAt: number | null;
};

type ScrapeContext = {
  token: string;
  recovery: Promise<string | null> | null;
  tokenLost: boolean;
};

export type MetricsCollectorOptions = {
  tokenManager: Pick<TokenManager, 'getValidToken' | 'refreshAfterRejection' | 'status'>;
  client: VehicleDataClient;
  vin: string;
  catalogue?: ResourceCatalogue;
  registry?: Registry;
  collectDefaults?: boolean;
  now?: () => number;
};

export type RenderedMetrics = {
  contentType: string;
  body: string;
};

export class MetricsCollector {
  readonly registry: Registry;

  private readonly tokenManager: MetricsCollectorOptions['tokenManager'];

  private readonly client: VehicleDataClient;

  private readonly vin: string;

  private readonly now: () => number;

  private readonly containers: ContainerSchedule[];

  private readonly authStatus: Gauge;

  private readonly tokenExpiry: Gauge;

  private readonly vendorRequests: Counter<'container' | 'outcome'>;

  private inFlight: Promise<void> | null = null;

  constructor(options: MetricsCollectorOptions) {
    this.tokenManager = options.tokenManager;
    this.client = options.client;
    this.vin = options.vin;
    this.now = options.now ?? Date.now;
    this.registry = options.registry ?? new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.authStatus = new Gauge({
      name: 'mb_exporter_auth_status',
      help: 'Vendor authorization: 0 reauthorization required, 1 ok, 2 transient failure',
      registers: [this.registry],
    });
    this.tokenExpiry = new Gauge({
      name: 'mb_exporter_access_token_expiry_timestamp_seconds',
      help: 'Margin-adjusted expiry of the current access token, 0 when none is held',
      registers: [this.registry],
    });
    this.vendorRequests = new Counter({
      name: 'mb_exporter_vendor_requests_total',
      help: 'Vehicle data requests by container and outcome',
      labelNames: ['container', 'outcome'],
      registers: [this.registry],
    });

    const catalogue = options.catalogue ?? loadResourceCatalogue();
    this.containers = catalogue.containers.map((definition) => ({
      definition,
      resources: catalogue.resources
        .filter((resource) => resource.container === definition.name)
        .map((resource) => new ResourceGauges(resource, this.registry)),
      lastCalledAt: null,
    }));
  }

  /** Concurrent scrapes share one collection pass. */
  collect(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const collection = this.runCollection().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = collection;
    return collection;
  }

  async render(): Promise<RenderedMetrics> {
    try {
      await this.collect();
    } catch (error) {
      logger.error({ err: error }, 'metrics collection failed; serving last known values');
    }

    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }

  private async runCollection(): Promise<void> {
    let token: string;
    try {
      token = await this.tokenManager.getValidToken();
    } catch (error) {
      this.recordTokenFailure(error);
      this.dropVehicleMetrics();
      this.updateTokenExpiry();
      return;
    }

    this.authStatus.set(AuthStatus.ok);

    const now = this.now();
    const due = this.containers.filter(
      (schedule) =>
        schedule.lastCalledAt === null ||
        now - schedule.lastCalledAt >= minimumIntervalMs(schedule.definition),
    );

    const context: ScrapeContext = { token, recovery: null, tokenLost: false };
    await Promise.all(due.map((schedule) => this.refreshContainer(schedule, context)));
    if (context.tokenLost) {
      this.dropVehicleMetrics();
    }

    this.updateTokenExpiry();
  }

  private async refreshContainer(
    schedule: ContainerSchedule,
    context: ScrapeContext,
  ): Promise<void> {
    const container = schedule.definition.name;
    const previousCall = schedule.lastCalledAt;
    schedule.lastCalledAt = this.now();

    let result = await this.request(container, context.token);
    if (result.outcome === 'unauthorized') {
      const retryToken = await this.recover(context);
      if (retryToken === null) {
        return;
      }

      result = await this.request(container, retryToken);
      if (result.outcome === 'unauthorized') {
        logger.error({ container }, 'vendor rejected a freshly refreshed access token');
      }
    }

    if (result.outcome === 'error' && result.status === undefined) {
      // nothing reached the vendor, so the hourly budget is untouched
      schedule.lastCalledAt = previousCall;
    }

    this.apply(schedule, result);
  }

  private async request(container: string, token: string): Promise<ContainerResult> {
    const result = await this.client.fetchContainer(this.vin, container, token);
    this.vendorRequests.labels({ container, outcome: result.outcome }).inc();
    return result;
  }

  // At most one forced refresh per scrape, shared by every container that saw a 401.
  private recover(context: ScrapeContext): Promise<string | null> {
    if (!context.recovery) {
      context.recovery = this.tokenManager.refreshAfterRejection(context.token).then(
        (token) => token,
        (error: unknown) => {
          this.recordTokenFailure(error);
          context.tokenLost = true;
          return null;
        },
      );
    }

    return context.recovery;
  }

  private apply(schedule: ContainerSchedule, result: ContainerResult): void {
    const container = schedule.definition.name;
    const now = this.now();

    switch (result.outcome) {
      case 'ok': {
        const expected = new Set(schedule.resources.map((gauges) => gauges.definition.resource));
        Array.from(result.samples.keys())
          .filter((resource) => !expected.has(resource))
          .forEach((resource) => {
            logger.warn({ container, resource }, 'unexpected resource in container payload');
          });

        schedule.resources.forEach((gauges) => {
          const sample = result.samples.get(gauges.definition.resource);
          if (sample) {
            gauges.newValue(this.vin, sample, now);
          } else {
            gauges.noNewValue(this.vin, now);
          }
        });
        return;
      }
      case 'no_content':
        schedule.resources.forEach((gauges) => gauges.noNewValue(this.vin, now));
        return;
      case 'rate_limited':
        logger.warn({ container }, 'vehicle data rate limited');
        return;
      case 'unauthorized':
        return;
      case 'error':
        logger.error(
          { container, status: result.status, reason: result.message },
          'vehicle data request failed',
        );
        return;
      default: {
        const unreachable: never = result;
        throw new Error(`unhandled container result ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private recordTokenFailure(error: unknown): void {
    if (isReauthorizationRequired(error)) {
      this.authStatus.set(AuthStatus.reauthorizationRequired);
      logger.warn({ kind: error.kind }, 'no usable credential; vehicle metrics skipped');
      return;
    }

    this.authStatus.set(AuthStatus.transientFailure);
    logger.warn(
      { kind: isTokenError(error) ? error.kind : undefined, reason: describeError(error) },
      'access token unavailable; vehicle metrics skipped',
    );
  }

  // Without a token nothing vendor-derived is exported; the next good scrape refetches.
  private dropVehicleMetrics(): void {
    this.containers.forEach((schedule) => {
      schedule.resources.forEach((gauges) => gauges.reset());
      schedule.lastCalledAt = null;
    });
  }

  private updateTokenExpiry(): void {
    const { expiresAt } = this.tokenManager.status();
    this.tokenExpiry.set(expiresAt ? expiresAt.getTime() / 1000 : 0);
  }
}
