import type { LayerKey } from '../../../lib/geo/types';
import type { CountThreshold, ThemeDefinition, ThemeKey } from './types';

/**
 * Context buckets per theme. Adding a bucket or a theme is a change to this
 * table only; exclusive themes must keep their thresholds disjoint and
 * covering every non-negative count.
 */
export const THEMES: Record<ThemeKey, ThemeDefinition> = {
  lighting: {
    key: 'lighting',
    title: 'Street lighting',
    exclusive: true,
    buckets: [
      { key: 'dark', label: 'Dark Areas', statLabel: 'Crimes in dark areas', attribute: 'lightCount', threshold: { eq: 0 } },
      { key: 'slightlyLit', label: 'Slightly lit', statLabel: 'Crimes in slightly lit areas', attribute: 'lightCount', threshold: { gte: 1, lte: 2 } },
      { key: 'wellLit', label: 'Well Lit', statLabel: 'Crimes in well lit areas', attribute: 'lightCount', threshold: { gt: 2 } },
    ],
  },
  greenspace: {
    key: 'greenspace',
    title: 'Greenspace',
    exclusive: true,
    buckets: [
      { key: 'notNearGreenspace', label: 'Not near greenspace', statLabel: 'Crimes not near greenspaces', attribute: 'greenspaceCount', threshold: { eq: 0 } },
      { key: 'nearGreenspace', label: 'Near greenspace', statLabel: 'Crimes near greenspaces', attribute: 'greenspaceCount', threshold: { gte: 1 } },
    ],
  },
  buildings: {
    key: 'buildings',
    title: 'Buildings',
    exclusive: false,
    buckets: [
      { key: 'residential', label: 'Near residential buildings', statLabel: 'Crimes near residential buildings', attribute: 'residentialBuildingCount', threshold: { gte: 1 } },
      { key: 'retail', label: 'Near retail buildings', statLabel: 'Crimes near retail buildings', attribute: 'retailBuildingCount', threshold: { gte: 1 } },
      { key: 'mixedUse', label: 'Near mixed use buildings', statLabel: 'Crimes near mixed use buildings', attribute: 'mixedUseCount', threshold: { gte: 1 } },
    ],
  },
  landUseSites: {
    key: 'landUseSites',
    title: 'Land use',
    exclusive: false,
    buckets: [
      { key: 'residentialSite', label: 'Near residential sites', statLabel: 'Crimes near residential sites', attribute: 'residentialSiteCount', threshold: { gte: 1 } },
      { key: 'retailSite', label: 'Near retail sites', statLabel: 'Crimes near retail sites', attribute: 'retailSiteCount', threshold: { gte: 1 } },
      { key: 'industrialSite', label: 'Near industrial sites', statLabel: 'Crimes near industrial sites', attribute: 'industrialSiteCount', threshold: { gte: 1 } },
    ],
  },
};

/**
 * Theme behind each selectable insight feature. Crime has no buckets and
 * yields the overall series only.
 */
export const FEATURE_THEMES: Record<LayerKey, ThemeKey | null> = {
  streetLights: 'lighting',
  greenspace: 'greenspace',
  buildings: 'buildings',
  landUse: 'landUseSites',
  crime: null,
};

export function matchesThreshold(value: number | null, threshold: CountThreshold): boolean {
  if (value === null) return false;
  if (threshold.eq !== undefined && value !== threshold.eq) return false;
  if (threshold.gte !== undefined && value < threshold.gte) return false;
  if (threshold.gt !== undefined && value <= threshold.gt) return false;
  if (threshold.lte !== undefined && value > threshold.lte) return false;
  return true;
}
