import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { MercedesVehicleDataClient } from '../../src/integrations/mercedes/vehicleData.client';
import { startFakeVendor, type FakeVendor } from '../helpers/fakeVendor';

const VIN = 'VIN-TEST';

describe('MercedesVehicleDataClient', () => {
  let vendor: FakeVendor;
  let client: MercedesVehicleDataClient;

  beforeEach(async () => {
    vendor = await startFakeVendor();
    client = new MercedesVehicleDataClient({ baseUrl: `${vendor.apiBaseUrl}/`, timeoutMs: 1000 });
  });

  afterEach(async () => {
    await vendor.close();
  });

  it('flattens the container payload into samples', async () => {
    vendor.onContainer(() => ({
      status: 200,
      body: [
        { soc: { value: '80', timestamp: 1_699_999_990_000 } },
        { rangeelectric: { value: 250, timestamp: 1_699_999_991_000 } },
      ],
    }));

    const result = await client.fetchContainer(VIN, 'electricvehicle', 'access-1');

    expect(result.outcome).toBe('ok');
    if (result.outcome !== 'ok') {
      return;
    }

    expect(Array.from(result.samples.entries())).toEqual([
      ['soc', { value: '80', timestamp: 1_699_999_990_000 }],
      ['rangeelectric', { value: 250, timestamp: 1_699_999_991_000 }],
    ]);
    expect(vendor.containerRequests).toEqual([
      { container: 'electricvehicle', authorization: 'Bearer access-1' },
    ]);
  });

  it.each([
    [204, 'no_content'],
    [429, 'rate_limited'],
    [401, 'unauthorized'],
  ] as const)('maps status %i to %s', async (status, outcome) => {
    vendor.onContainer(() => ({ status }));

    const result = await client.fetchContainer(VIN, 'vehiclestatus', 'access-1');

    expect(result).toEqual({ outcome });
  });

  it('reports other statuses as errors that reached the vendor', async () => {
    vendor.onContainer(() => ({ status: 500, body: { message: 'boom' } }));

    const result = await client.fetchContainer(VIN, 'vehiclestatus', 'access-1');

    expect(result).toEqual({ outcome: 'error', status: 500, message: 'unexpected status 500' });
  });

  it('rejects a payload that is not a list of resources', async () => {
    vendor.onContainer(() => ({ status: 200, body: { soc: '80' } }));

    const result = await client.fetchContainer(VIN, 'electricvehicle', 'access-1');

    expect(result).toEqual({ outcome: 'error', status: 200, message: 'malformed container payload' });
  });

  it('reports a timeout as an error without a status', async () => {
    const impatient = new MercedesVehicleDataClient({ baseUrl: vendor.apiBaseUrl, timeoutMs: 50 });
    vendor.onContainer(() => ({ status: 204, delayMs: 200 }));

    const result = await impatient.fetchContainer(VIN, 'vehiclestatus', 'access-1');

    expect(result.outcome).toBe('error');
    expect('status' in result).toBe(false);
  });
});
