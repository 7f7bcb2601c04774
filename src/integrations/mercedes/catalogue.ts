import { z } from 'zod';

import catalogueDocument from './resources.json';

export const valueMapperNames = [
  'number',
  'kilometersToMeters',
  'boolean',
  'negatedBoolean',
] as const;

export type ValueMapperName = (typeof valueMapperNames)[number];

export type ResourceValue = string | number | boolean;

const parseBoolean = (value: ResourceValue): number => {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return 1;
  }

  if (normalized === 'false' || normalized === '0') {
    return 0;
  }

  return Number.NaN;
};

const parseNumber = (value: ResourceValue): number => {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  return typeof value === 'number' ? value : Number.parseFloat(value);
};

/** Maps a vendor value to a gauge value; NaN means "not representable". */
export const valueMappers: Record<ValueMapperName, (value: ResourceValue) => number> = {
  number: parseNumber,
  kilometersToMeters: (value) => parseNumber(value) * 1000,
  boolean: parseBoolean,
  negatedBoolean: (value) => {
    const parsed = parseBoolean(value);
    return Number.isNaN(parsed) ? parsed : 1 - parsed;
  },
};

const containerSchema = z.object({
  name: z.string().min(1),
  callsPerHour: z.number().positive(),
});

const resourceSchema = z.object({
  container: z.string().min(1),
  resource: z.string().min(1),
  metric: z.string().regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/),
  help: z.string().min(1),
  unit: z.string().optional(),
  mapper: z.enum(valueMapperNames),
});

const catalogueSchema = z
  .object({
    containers: z.array(containerSchema),
    resources: z.array(resourceSchema),
  })
  .superRefine((catalogue, context) => {
    const names = new Set(catalogue.containers.map((container) => container.name));
    catalogue.resources.forEach((resource, index) => {
      if (!names.has(resource.container)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['resources', index, 'container'],
          message: `unknown container ${resource.container}`,
        });
      }
    });
  });

export type ContainerDefinition = z.infer<typeof containerSchema>;
export type ResourceDefinition = z.infer<typeof resourceSchema>;
export type ResourceCatalogue = z.infer<typeof catalogueSchema>;

export const loadResourceCatalogue = (document: unknown = catalogueDocument): ResourceCatalogue =>
  catalogueSchema.parse(document);

export const metricNameFor = (resource: ResourceDefinition): string =>
  resource.unit ? `${resource.metric}_${resource.unit}` : resource.metric;

/** Milliseconds between calls that keep a container inside its hourly budget. */
export const minimumIntervalMs = (container: ContainerDefinition): number =>
  Math.ceil(3600 / container.callsPerHour) * 1000;
