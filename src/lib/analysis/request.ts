import { z } from 'zod';
import { isLayerKey, LAYER_KEYS, type LayerKey } from '../../../lib/geo/types';
import { toCalendarDate } from '../insights/records';
import { InvalidRequestError } from '../errors';
import type { AreaRequest } from './types';

export const MAX_RADIUS_METERS = 1000;
export const RADIUS_STEP_METERS = 100;

/**
 * Radius typed by the user, rounded to the nearest step and clamped to the
 * allowed range. Blank or non-numeric input becomes 0.
 */
export function normalizeRadius(input: string): number {
  const value = Number(input.trim());
  if (!Number.isFinite(value)) return 0;
  const stepped = Math.round(value / RADIUS_STEP_METERS) * RADIUS_STEP_METERS;
  return Math.min(MAX_RADIUS_METERS, Math.max(0, stepped));
}

const calendarDate = z
  .string()
  .refine((value) => toCalendarDate(value) === value, { message: 'Expected a date as YYYY-MM-DD' });

const layerList = z
  .string()
  .optional()
  .transform((value) => (value ? value.split(',').map((item) => item.trim()).filter(Boolean) : []))
  .pipe(
    z.array(
      z.string().refine(isLayerKey, (value) => ({
        message: `Unknown layer "${value}", expected one of ${LAYER_KEYS.join(', ')}`,
      })),
    ),
  );

const AreaQuerySchema = z
  .object({
    q: z.string().trim().min(1, 'Enter an address or postcode'),
    radius: z.coerce
      .number()
      .int()
      .min(0)
      .max(MAX_RADIUS_METERS)
      .multipleOf(RADIUS_STEP_METERS, `Radius must be a multiple of ${RADIUS_STEP_METERS}`)
      .default(0),
    layers: layerList,
    crimes: z.array(z.string().trim().min(1)).default([]),
    start: calendarDate.optional(),
    end: calendarDate.optional(),
    feature: z
      .string()
      .refine(isLayerKey, { message: `Expected one of ${LAYER_KEYS.join(', ')}` })
      .optional(),
  })
  .refine((value) => (value.start === undefined) === (value.end === undefined), {
    message: 'Give both start and end, or neither',
    path: ['start'],
  })
  .refine((value) => !value.start || !value.end || value.start <= value.end, {
    message: 'Start date must not be after end date',
    path: ['start'],
  });

/**
 * Validate the insight query string. `layers` is a comma-separated list;
 * `crimes` is repeated once per crime type since type names are free text.
 */
export function parseAreaRequest(params: URLSearchParams): AreaRequest {
  const parsed = AreaQuerySchema.safeParse({
    q: params.get('q') ?? undefined,
    radius: params.get('radius') ?? undefined,
    layers: params.get('layers') ?? undefined,
    crimes: params.getAll('crimes'),
    start: params.get('start') ?? undefined,
    end: params.get('end') ?? undefined,
    feature: params.get('feature') ?? undefined,
  });

  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`),
    );
  }

  const { q, radius, layers, crimes, start, end, feature } = parsed.data;
  return Object.freeze({
    query: q,
    radiusMeters: radius,
    layers: new Set<LayerKey>(layers),
    crimeTypes: new Set(crimes),
    dateRange: start && end ? { start, end } : null,
    feature: feature ?? null,
  });
}

/**
 * Query string for a request, with lists in a stable order. Doubles as the
 * memoization key of the analysis.
 */
export function areaRequestToSearchParams(request: AreaRequest): URLSearchParams {
  const params = new URLSearchParams();
  params.set('q', request.query.trim());
  params.set('radius', String(request.radiusMeters));
  const layers = LAYER_KEYS.filter((key) => request.layers.has(key));
  if (layers.length > 0) params.set('layers', layers.join(','));
  for (const type of [...request.crimeTypes].sort()) params.append('crimes', type);
  if (request.dateRange) {
    params.set('start', request.dateRange.start);
    params.set('end', request.dateRange.end);
  }
  if (request.feature) params.set('feature', request.feature);
  return params;
}

export function areaRequestKey(request: AreaRequest): string {
  return areaRequestToSearchParams(request).toString();
}
