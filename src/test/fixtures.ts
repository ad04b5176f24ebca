import type { CrimeEvent, HexCell } from '@/lib/types/crime';

let nextId = 0;

export function crimeEvent(overrides: Partial<CrimeEvent> = {}): CrimeEvent {
  nextId += 1;
  return {
    id: `event-${nextId}`,
    type: 'Burglary',
    date: '2024-01-15',
    timestamp: null,
    cellId: null,
    lon: -1.9,
    lat: 52.48,
    ...overrides,
  };
}

export function hexCell(cellId: string, overrides: Partial<Omit<HexCell, 'cellId'>> = {}): HexCell {
  return {
    cellId,
    lightCount: 0,
    greenspaceCount: 0,
    residentialBuildingCount: 0,
    retailBuildingCount: 0,
    mixedUseCount: 0,
    residentialSiteCount: 0,
    retailSiteCount: 0,
    industrialSiteCount: 0,
    ...overrides,
  };
}
