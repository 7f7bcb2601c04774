import { ofetch, type $Fetch } from 'ofetch';
import { z } from 'zod';

import { describeError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ResourceValue } from './catalogue';

const resourceSampleSchema = z.object({
  value: z.union([z.string(), z.number(), z.boolean()]),
  timestamp: z.number(),
});

const containerPayloadSchema = z.array(z.record(resourceSampleSchema));

export type ResourceSample = {
  value: ResourceValue;
  timestamp: number;
};

export type ContainerResult =
  | { outcome: 'ok'; samples: Map<string, ResourceSample> }
  | { outcome: 'no_content' }
  | { outcome: 'rate_limited' }
  | { outcome: 'unauthorized' }
  | { outcome: 'error'; status?: number; message: string };

export interface VehicleDataClient {
  fetchContainer(vin: string, container: string, accessToken: string): Promise<ContainerResult>;
}

export type VehicleDataClientOptions = {
  baseUrl: string;
  timeoutMs: number;
};

export class MercedesVehicleDataClient implements VehicleDataClient {
  private readonly baseUrl: string;

  private readonly fetcher: $Fetch;

  constructor(options: VehicleDataClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetcher = ofetch.create({
      timeout: options.timeoutMs,
      retry: 0,
      ignoreResponseError: true,
    });
  }

  async fetchContainer(
    vin: string,
    container: string,
    accessToken: string,
  ): Promise<ContainerResult> {
    const url = `${this.baseUrl}/vehicles/${encodeURIComponent(vin)}/containers/${encodeURIComponent(container)}`;

    let status: number;
    let payload: unknown;
    try {
      const response = await this.fetcher.raw<unknown>(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: 'application/json;charset=utf-8',
        },
      });
      status = response.status;
      payload = response._data;
    } catch (error) {
      return { outcome: 'error', message: describeError(error) };
    }

    if (status === 204) {
      return { outcome: 'no_content' };
    }

    if (status === 429) {
      return { outcome: 'rate_limited' };
    }

    if (status === 401) {
      return { outcome: 'unauthorized' };
    }

    if (status !== 200) {
      logger.error({ container, status }, 'unexpected vehicle data status');
      return { outcome: 'error', status, message: `unexpected status ${status}` };
    }

    const parsed = containerPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return { outcome: 'error', status, message: 'malformed container payload' };
    }

    const samples = new Map<string, ResourceSample>();
    parsed.data.forEach((item) => {
      Object.entries(item).forEach(([resource, sample]) => {
        samples.set(resource, sample);
      });
    });

    return { outcome: 'ok', samples };
  }
}
