import { describe, expect, it } from 'vitest';

import {
  loadResourceCatalogue,
  metricNameFor,
  minimumIntervalMs,
  valueMappers,
} from '../../src/integrations/mercedes/catalogue';

describe('resource catalogue', () => {
  it('loads the bundled containers and resources', () => {
    const catalogue = loadResourceCatalogue();

    expect(catalogue.containers.map((container) => container.name)).toEqual([
      'electricvehicle',
      'fuelstatus',
      'payasyoudrive',
      'vehiclelockstatus',
      'vehiclestatus',
    ]);
    expect(catalogue.resources).toHaveLength(25);
    expect(catalogue.resources.find((resource) => resource.resource === 'rangeelectric')).toMatchObject({
      container: 'electricvehicle',
      unit: 'meters',
      mapper: 'kilometersToMeters',
    });
  });

  it('rejects resources that point at an unknown container', () => {
    expect(() =>
      loadResourceCatalogue({
        containers: [{ name: 'vehiclestatus', callsPerHour: 50 }],
        resources: [
          {
            container: 'tirestatus',
            resource: 'tirepressurefrontleft',
            metric: 'mb_tire_pressure',
            help: 'Tire pressure',
            mapper: 'number',
          },
        ],
      }),
    ).toThrow('unknown container tirestatus');
  });

  it('appends the unit to the metric name', () => {
    const catalogue = loadResourceCatalogue();
    const names = catalogue.resources.map(metricNameFor);

    expect(names).toContain('mb_electric_range_meters');
    expect(names).toContain('mb_electric_state_of_charge');
  });

  it('spaces calls to stay within the hourly budget', () => {
    expect(minimumIntervalMs({ name: 'electricvehicle', callsPerHour: 2 })).toBe(1_800_000);
    expect(minimumIntervalMs({ name: 'vehiclestatus', callsPerHour: 50 })).toBe(72_000);
    expect(minimumIntervalMs({ name: 'fuelstatus', callsPerHour: 7 })).toBe(515_000);
  });

  describe('value mappers', () => {
    it('parses numbers from strings', () => {
      expect(valueMappers.number('42.5')).toBe(42.5);
      expect(valueMappers.number(7)).toBe(7);
      expect(valueMappers.kilometersToMeters('12')).toBe(12_000);
    });

    it('maps boolean spellings and flags the rest as unmappable', () => {
      expect(valueMappers.boolean('true')).toBe(1);
      expect(valueMappers.boolean('0')).toBe(0);
      expect(valueMappers.boolean(false)).toBe(0);
      expect(valueMappers.boolean('open')).toBeNaN();
    });

    it('negates booleans without negating unmappable values', () => {
      expect(valueMappers.negatedBoolean('false')).toBe(1);
      expect(valueMappers.negatedBoolean('true')).toBe(0);
      expect(valueMappers.negatedBoolean('unknown')).toBeNaN();
    });
  });
});
