import { getServerConfig, getTileApiKey, type ServerConfig } from '../config';
import { createOsPlacesGeocoder } from '../geocoding';
import { GeodataFetcher } from '../store/geodata';
import { SupabaseSpatialStore } from '../store/supabase-store';
import { getSupabase } from '../supabase/client';
import { createAreaAnalyser, type AreaServices } from './analyse-area';

export function createAreaServices(config: ServerConfig = getServerConfig()): AreaServices {
  return {
    geocoder: createOsPlacesGeocoder({
      apiKey: config.OS_PLACES_API_KEY,
      url: config.OS_PLACES_URL,
      timeoutMs: config.UPSTREAM_TIMEOUT_MS,
    }),
    fetcher: new GeodataFetcher(
      new SupabaseSpatialStore(getSupabase(), config.UPSTREAM_TIMEOUT_MS),
      config.GEODATA_CACHE_TTL_SECONDS * 1000,
    ),
    tileApiKey: getTileApiKey(),
  };
}

let analyser: ReturnType<typeof createAreaAnalyser> | null = null;

/**
 * Process-wide analyser for the route handler, created on first request
 */
export function getAreaAnalyser(): ReturnType<typeof createAreaAnalyser> {
  if (analyser) return analyser;
  const config = getServerConfig();
  analyser = createAreaAnalyser(createAreaServices(config), config.GEODATA_CACHE_TTL_SECONDS * 1000);
  return analyser;
}
