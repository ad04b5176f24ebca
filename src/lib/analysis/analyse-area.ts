import type { GeoFeatureTable, LayerKey } from '../../../lib/geo/types';
import { TtlCache } from '../cache';
import { buildTrendChart } from '../charts/trend-chart';
import { buildBuffer } from '../geo/buffer';
import type { Geocoder } from '../geocoding';
import {
  computeInsight,
  crimeTypeOptions,
  dateExtent,
  filterCrimeEvents,
  toCrimeEvents,
  toHexCells,
} from '../insights';
import { buildMapModel } from '../map/map-model';
import type { GeodataFetcher } from '../store/geodata';
import { GRID_SOURCE, LAYER_SOURCES } from '../store/sources';
import { buildSpatialQuery } from '../store/spatial-query';
import type { CrimeEvent } from '../types/crime';
import { areaRequestKey } from './request';
import { notice, type AreaAnalysis, type AreaRequest, type Notice } from './types';

export const TREND_CHART_TITLE = 'Monthly Crime Statistics';

export interface AreaServices {
  geocoder: Geocoder;
  fetcher: GeodataFetcher;
  tileApiKey: string | null;
}

type FeatureLayers = Partial<Record<Exclude<LayerKey, 'crime'>, GeoFeatureTable>>;

/**
 * Run the whole page for one request: geocode, fetch the selected layers
 * inside the buffer, filter crime and, when a feature is chosen, join crime
 * to the environmental grid and build the insight.
 *
 * Problems the user can fix come back as notices; upstream failures throw.
 */
export async function analyseArea(request: AreaRequest, services: AreaServices): Promise<AreaAnalysis> {
  const { geocoder, fetcher, tileApiKey } = services;
  const notices: Notice[] = [];

  const address = await geocoder.geocode(request.query);
  if (!address) {
    return {
      address: null,
      radiusMeters: request.radiusMeters,
      notices: [notice('no-match')],
      map: buildMapModel({ address: null, buffer: null, layers: {}, crimeEvents: null, tileApiKey }),
      crime: null,
      insight: null,
    };
  }

  if (request.radiusMeters === 0) {
    return {
      address,
      radiusMeters: 0,
      notices: [notice('increase-buffer')],
      map: buildMapModel({ address, buffer: null, layers: {}, crimeEvents: null, tileApiKey }),
      crime: null,
      insight: null,
    };
  }

  const { lon, lat } = address.location;
  const buffer = buildBuffer(address.location, request.radiusMeters);
  const selected = [...request.layers];

  const tables = await Promise.all(
    selected.map((key) => fetcher.fetch(buildSpatialQuery(LAYER_SOURCES[key], lon, lat, request.radiusMeters))),
  );

  const featureLayers: FeatureLayers = {};
  let crimeTable: GeoFeatureTable | null = null;
  for (const [index, key] of selected.entries()) {
    if (key === 'crime') crimeTable = tables[index];
    else featureLayers[key] = tables[index];
  }

  let events: CrimeEvent[] | null = null;
  let filtered: CrimeEvent[] = [];
  let crime: AreaAnalysis['crime'] = null;

  if (crimeTable) {
    events = toCrimeEvents(crimeTable);
    const extent = dateExtent(events);
    if (request.crimeTypes.size === 0) {
      notices.push(notice('select-crime-type'));
    } else {
      filtered = filterCrimeEvents(events, {
        crimeTypes: request.crimeTypes,
        dateRange: request.dateRange ?? extent ?? undefined,
      });
    }
    crime = { options: crimeTypeOptions(events), extent, total: events.length, filteredCount: filtered.length };
  } else {
    notices.push(notice('select-crime-data'));
  }

  let insight: AreaAnalysis['insight'] = null;
  if (events && request.crimeTypes.size > 0) {
    if (filtered.length === 0) {
      notices.push(notice('no-filtered-crime'));
    } else if (!request.feature) {
      notices.push(notice('select-feature'));
    } else if (!request.layers.has(request.feature)) {
      notices.push(notice('feature-not-in-layers'));
    } else {
      const gridTable = await fetcher.fetch(buildSpatialQuery(GRID_SOURCE, lon, lat, request.radiusMeters));
      const { insight: result, duplicateCellIds } = computeInsight(request.feature, toHexCells(gridTable), filtered);
      if (duplicateCellIds.length > 0) {
        console.warn('[insight] Duplicate grid cells, keeping the first of each:', {
          source: GRID_SOURCE,
          cellIds: duplicateCellIds,
        });
      }
      console.info('[insight] Computed', {
        feature: request.feature,
        filtered: filtered.length,
        joinedTotal: result.joinedTotal,
      });
      insight = { result, chart: buildTrendChart(result.series, TREND_CHART_TITLE) };
    }
  }

  // Map shows the filtered crime once types are chosen, all crime before that
  const mapCrime = events === null ? null : request.crimeTypes.size > 0 ? filtered : events;

  return {
    address,
    radiusMeters: request.radiusMeters,
    notices,
    map: buildMapModel({ address, buffer, layers: featureLayers, crimeEvents: mapCrime, tileApiKey }),
    crime,
    insight,
  };
}

/**
 * `analyseArea` memoized per normalized request for `ttlMs`.
 */
export function createAreaAnalyser(services: AreaServices, ttlMs: number) {
  const cache = new TtlCache<AreaAnalysis>(ttlMs);

  return async function analyse(request: AreaRequest): Promise<AreaAnalysis> {
    const { value } = await cache.getOrLoad(areaRequestKey(request), () => analyseArea(request, services));
    return value;
  };
}
