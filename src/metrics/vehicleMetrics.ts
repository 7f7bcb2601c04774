import { Gauge, type Registry } from 'prom-client';

import {
  metricNameFor,
  valueMappers,
  type ResourceDefinition,
} from '../integrations/mercedes/catalogue';
import type { ResourceSample } from '../integrations/mercedes/vehicleData.client';
import { logger } from '../utils/logger';

/**
 * Value, measurement time and update time gauges for one vendor resource,
 * all labelled by VIN.
 */
export class ResourceGauges {
  readonly definition: ResourceDefinition;

  private readonly value: Gauge<'vin'>;

  private readonly measurementTime: Gauge<'vin'>;

  private readonly updateTime: Gauge<'vin'>;

  constructor(definition: ResourceDefinition, registry: Registry) {
    this.definition = definition;
    const metricName = metricNameFor(definition);

    this.value = new Gauge({
      name: metricName,
      help: definition.help,
      labelNames: ['vin'],
      registers: [registry],
    });
    this.measurementTime = new Gauge({
      name: `${definition.metric}_measurement_time_seconds`,
      help: `Measurement time of ${metricName}`,
      labelNames: ['vin'],
      registers: [registry],
    });
    this.updateTime = new Gauge({
      name: `${definition.metric}_update_time_seconds`,
      help: `Update time of ${metricName}`,
      labelNames: ['vin'],
      registers: [registry],
    });
  }

  newValue(vin: string, sample: ResourceSample, nowMs: number): void {
    const mapped = valueMappers[this.definition.mapper](sample.value);
    if (Number.isNaN(mapped)) {
      logger.warn(
        { resource: this.definition.resource, value: sample.value },
        'vendor value could not be mapped',
      );
    } else {
      this.value.labels({ vin }).set(mapped);
    }

    this.measurementTime.labels({ vin }).set(sample.timestamp / 1000);
    this.updateTime.labels({ vin }).set(nowMs / 1000);
  }

  noNewValue(vin: string, nowMs: number): void {
    this.updateTime.labels({ vin }).set(nowMs / 1000);
  }

  reset(): void {
    this.value.reset();
    this.measurementTime.reset();
    this.updateTime.reset();
  }
}
