import type { LayerKey } from '../../../lib/geo/types';

/**
 * Store tables behind each map layer, plus the environmental hex grid
 * (H3 resolution 11) that the insight engine joins crime onto.
 *
 * These identifiers are interpolated into query text unchecked, so they
 * must only ever come from this registry.
 */
export const LAYER_SOURCES: Record<LayerKey, string> = {
  buildings: 'environment.building_footprints',
  streetLights: 'environment.street_lights',
  landUse: 'environment.land_use_sites',
  greenspace: 'environment.greenspace_sites',
  crime: 'environment.crime_events',
};

export const GRID_SOURCE = 'environment.hex_grid_h3_11';
