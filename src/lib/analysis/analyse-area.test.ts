import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { MemorySpatialStore, pointGeography, squareGeography } from '@/test/memory-store';
import { GeocodingError, GridDataError } from '../errors';
import type { AddressMatch, Geocoder } from '../geocoding';
import { GeodataFetcher } from '../store/geodata';
import { GRID_SOURCE, LAYER_SOURCES } from '../store/sources';
import { analyseArea, createAreaAnalyser, type AreaServices } from './analyse-area';
import { parseAreaRequest } from './request';

const MATCH: AddressMatch = {
  address: '1, TEST ROAD, BIRMINGHAM, B1 1AA',
  administrativeArea: 'BIRMINGHAM',
  classification: 'Terraced',
  status: 'In use',
  matchScore: 1,
  bng: { x: 406000, y: 286500 },
  location: { lon: -1.9, lat: 52.48 },
};

function crimeRow(id: number, type: string, date: string, cell: string) {
  return { id, crime_type: type, crime_date: `${date}T12:00:00`, h3_11: cell, geography: pointGeography(-1.9, 52.48) };
}

function gridRow(cell: string, lightCount: number) {
  return {
    h3_cell_11: cell,
    light_count: lightCount,
    greenspace_count: 0,
    residential_building_count: 0,
    retail_building_count: 0,
    mixed_use_count: 0,
    residential_site_count: 0,
    retail_site_count: 0,
    industrial_site_count: 0,
    geography: squareGeography(-1.9, 52.48),
  };
}

function request(query: string) {
  return parseAreaRequest(new URLSearchParams(query));
}

describe('analyseArea', () => {
  let store: MemorySpatialStore;
  let geocode: Mock<Geocoder['geocode']>;
  let services: AreaServices;

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    store = new MemorySpatialStore({
      [LAYER_SOURCES.crime]: [
        crimeRow(1, 'Burglary', '2024-01-03', 'A'),
        crimeRow(2, 'Burglary', '2024-01-09', 'A'),
        crimeRow(3, 'Burglary', '2024-02-11', 'A'),
        crimeRow(4, 'Burglary', '2024-01-20', 'B'),
        crimeRow(5, 'Burglary', '2024-02-02', 'B'),
        crimeRow(6, 'Assault', '2024-01-25', 'C'),
      ],
      [LAYER_SOURCES.streetLights]: [{ description: 'Column lamp', geography: pointGeography(-1.9, 52.48) }],
      [GRID_SOURCE]: [gridRow('A', 0), gridRow('B', 1), gridRow('C', 5)],
    });
    geocode = vi.fn<Geocoder['geocode']>(async () => MATCH);
    services = { geocoder: { geocode }, fetcher: new GeodataFetcher(store, 60_000), tileApiKey: null };
  });

  it('stops at the address lookup when nothing matches', async () => {
    geocode.mockResolvedValue(null);

    const analysis = await analyseArea(request('q=nowhere&radius=300&layers=crime'), services);

    expect(analysis.notices).toEqual([{ kind: 'no-match', message: 'No address match found' }]);
    expect(analysis.address).toBeNull();
    expect(analysis.map.view).toEqual({ kind: 'center', center: [52.4814, -1.8998], zoom: 14 });
    expect(store.queries).toEqual([]);
  });

  it('asks for a bigger buffer and queries nothing at radius zero', async () => {
    const analysis = await analyseArea(request('q=B1&radius=0&layers=crime'), services);

    expect(analysis.notices.map((item) => item.kind)).toEqual(['increase-buffer']);
    expect(analysis.map.view).toEqual({ kind: 'center', center: [52.48, -1.9], zoom: 16 });
    expect(store.queries).toEqual([]);
  });

  it('draws the selected layers and asks for crime data when it is off', async () => {
    const analysis = await analyseArea(request('q=B1&radius=300&layers=streetLights'), services);

    expect(analysis.notices.map((item) => item.kind)).toEqual(['select-crime-data']);
    expect(analysis.map.layers.map((layer) => layer.key)).toEqual(['streetLights']);
    expect(analysis.crime).toBeNull();
    expect(store.queries.map((query) => query.source)).toEqual([LAYER_SOURCES.streetLights]);
  });

  it('lists crime types and plots all crime before any type is chosen', async () => {
    const analysis = await analyseArea(request('q=B1&radius=300&layers=crime'), services);

    expect(analysis.notices.map((item) => item.kind)).toEqual(['select-crime-type']);
    expect(analysis.crime).toEqual({
      options: ['Burglary', 'Assault'],
      extent: { start: '2024-01-03', end: '2024-02-11' },
      total: 6,
      filteredCount: 0,
    });
    expect(analysis.map.crime?.points).toHaveLength(6);
    expect(analysis.insight).toBeNull();
  });

  it('asks for a feature once crime is filtered', async () => {
    const analysis = await analyseArea(request('q=B1&radius=300&layers=crime&crimes=Burglary'), services);

    expect(analysis.notices.map((item) => item.kind)).toEqual(['select-feature']);
    expect(analysis.crime?.filteredCount).toBe(5);
    expect(analysis.map.crime?.points).toHaveLength(5);
  });

  it('reports a filter that matches no crime', async () => {
    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime&crimes=Burglary&start=2023-01-01&end=2023-12-31&feature=crime'),
      services,
    );

    expect(analysis.notices.map((item) => item.kind)).toEqual(['no-filtered-crime']);
    expect(analysis.insight).toBeNull();
  });

  it('requires the feature to be one of the map layers', async () => {
    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime&crimes=Burglary&feature=streetLights'),
      services,
    );

    expect(analysis.notices.map((item) => item.kind)).toEqual(['feature-not-in-layers']);
    expect(store.countFor(GRID_SOURCE)).toBe(0);
  });

  it('builds the lighting insight from the grid', async () => {
    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime,streetLights&crimes=Burglary&feature=streetLights'),
      services,
    );

    expect(analysis.notices).toEqual([]);
    expect(analysis.insight?.result.totals.map(({ label, total }) => [label, total])).toEqual([
      ['Dark Areas', 3],
      ['Slightly lit', 2],
      ['Well Lit', 0],
    ]);
    expect(analysis.insight?.result.overallTotal).toBe(5);
    expect(analysis.insight?.chart.title).toBe('Monthly Crime Statistics');
    expect(analysis.insight?.chart.groups).toEqual(['Total crime', 'Dark Areas', 'Slightly lit']);
    expect(analysis.insight?.chart.months).toEqual(['2024-01', '2024-02']);
    expect(store.countFor(GRID_SOURCE)).toBe(1);
  });

  it('narrows crime to the chosen dates, inclusive', async () => {
    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime&crimes=Burglary&start=2024-01-09&end=2024-01-20&feature=crime'),
      services,
    );

    expect(analysis.crime?.filteredCount).toBe(2);
    expect(analysis.insight?.result.series).toEqual([{ month: '2024-01', count: 2, group: 'Total crime' }]);
  });

  it('warns about duplicate grid cells', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    store.setTable(GRID_SOURCE, [gridRow('A', 0), gridRow('A', 4), gridRow('B', 1)]);

    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime,streetLights&crimes=Burglary&feature=streetLights'),
      services,
    );

    expect(analysis.insight?.result.totals[0].total).toBe(3);
    expect(warn).toHaveBeenCalledWith('[insight] Duplicate grid cells, keeping the first of each:', {
      source: GRID_SOURCE,
      cellIds: ['A'],
    });
  });

  it('leaves undated crime out of every count', async () => {
    store.setTable(LAYER_SOURCES.crime, [
      { ...crimeRow(1, 'Burglary', '2024-01-03', 'A'), crime_date: 'unknown' },
      { ...crimeRow(2, 'Burglary', '2024-01-09', 'A'), crime_date: null },
    ]);

    const analysis = await analyseArea(
      request('q=B1&radius=300&layers=crime,streetLights&crimes=Burglary&feature=streetLights'),
      services,
    );

    expect(analysis.crime).toEqual({ options: ['Burglary'], extent: null, total: 2, filteredCount: 0 });
    expect(analysis.notices.map((item) => item.kind)).toEqual(['no-filtered-crime']);
    expect(analysis.insight).toBeNull();
  });

  it('fails on a grid count that is not a whole number', async () => {
    store.setTable(GRID_SOURCE, [{ ...gridRow('A', 0), light_count: '0.5' }, gridRow('B', 1)]);

    await expect(
      analyseArea(request('q=B1&radius=300&layers=crime,streetLights&crimes=Burglary&feature=streetLights'), services),
    ).rejects.toBeInstanceOf(GridDataError);
  });

  it('lets a geocoder failure through', async () => {
    geocode.mockRejectedValue(new GeocodingError('Address lookup failed with HTTP 500'));

    await expect(analyseArea(request('q=B1&radius=300'), services)).rejects.toBeInstanceOf(GeocodingError);
  });

  it('lets a store failure through instead of reporting no crime', async () => {
    store.failOn(LAYER_SOURCES.crime, new Error('warehouse offline'));

    await expect(analyseArea(request('q=B1&radius=300&layers=crime'), services)).rejects.toThrow('warehouse offline');
  });
});

describe('createAreaAnalyser', () => {
  it('reuses the analysis of an equivalent request', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const geocode = vi.fn<Geocoder['geocode']>(async () => MATCH);
    const store = new MemorySpatialStore();
    const analyse = createAreaAnalyser(
      { geocoder: { geocode }, fetcher: new GeodataFetcher(store, 60_000), tileApiKey: null },
      60_000,
    );

    const first = await analyse(parseAreaRequest(new URLSearchParams('q=B1&radius=200&layers=streetLights,greenspace')));
    const second = await analyse(parseAreaRequest(new URLSearchParams('q=B1&radius=200&layers=greenspace,streetLights')));

    expect(second).toBe(first);
    expect(geocode).toHaveBeenCalledTimes(1);
  });
});
