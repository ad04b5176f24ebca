'use client';

import { useCallback, useMemo, useState } from 'react';
import type { LayerKey } from '../../../lib/geo/types';
import { useAreaAnalysis } from '@/lib/analysis/hooks';
import type { AreaRequest, DateRange } from '@/lib/analysis/types';
import { getTileApiKey } from '@/lib/config';
import { buildMapModel } from '@/lib/map/map-model';
import { MapWrapper } from '@/components/Map/MapContainer';
import { ErrorBanner, NoticeBanner } from '@/components/ui/NoticeBanner';
import { InsightPanel } from './InsightPanel';
import { Sidebar } from './Sidebar';

const EMPTY_MAP = buildMapModel({ address: null, buffer: null, layers: {}, crimeEvents: null, tileApiKey: getTileApiKey() });

function toggle<T>(set: ReadonlySet<T>, value: T): Set<T> {
  const next = new Set(set);
  if (next.has(value)) next.delete(value);
  else next.add(value);
  return next;
}

export function InsightDashboard() {
  const [query, setQuery] = useState('');
  const [radius, setRadius] = useState(0);
  const [layers, setLayers] = useState<ReadonlySet<LayerKey>>(new Set());
  const [crimeTypes, setCrimeTypes] = useState<ReadonlySet<string>>(new Set());
  const [dateRange, setDateRange] = useState<DateRange | null>(null);
  const [feature, setFeature] = useState<LayerKey | null>(null);
  // Feature the insight was generated for; any other change clears it
  const [generated, setGenerated] = useState<LayerKey | null>(null);

  const request = useMemo<AreaRequest | null>(
    () =>
      query
        ? Object.freeze({ query, radiusMeters: radius, layers, crimeTypes, dateRange, feature: generated })
        : null,
    [query, radius, layers, crimeTypes, dateRange, generated],
  );

  const { data: analysis, error, isLoading } = useAreaAnalysis(request);

  const handleSearch = useCallback((next: string) => {
    setQuery(next);
    setCrimeTypes(new Set());
    setDateRange(null);
    setGenerated(null);
  }, []);

  const handleRadius = useCallback((next: number) => {
    setRadius(next);
    setGenerated(null);
  }, []);

  const handleToggleLayer = useCallback((layer: LayerKey) => {
    setLayers((current) => toggle(current, layer));
    setFeature((current) => (current === layer ? null : current));
    setGenerated(null);
  }, []);

  const handleToggleCrimeType = useCallback((type: string) => {
    setCrimeTypes((current) => toggle(current, type));
    setGenerated(null);
  }, []);

  const handleDateRange = useCallback((range: DateRange) => {
    setDateRange(range);
    setGenerated(null);
  }, []);

  const handleFeature = useCallback((next: LayerKey | null) => {
    setFeature(next);
    setGenerated(null);
  }, []);

  const handleGenerate = useCallback(() => setGenerated(feature), [feature]);

  return (
    <div className="flex h-screen flex-col md:flex-row">
      <Sidebar
        query={query}
        onSearch={handleSearch}
        radius={radius}
        onRadiusChange={handleRadius}
        layers={layers}
        onToggleLayer={handleToggleLayer}
        address={analysis?.address ?? null}
        isLoading={isLoading}
      >
        {error && <ErrorBanner message={error.message} />}
        {analysis?.notices.map((item) => <NoticeBanner key={item.kind} notice={item} />)}
        {analysis?.address && radius > 0 && (
          <InsightPanel
            analysis={analysis}
            layers={layers}
            crimeTypes={crimeTypes}
            onToggleCrimeType={handleToggleCrimeType}
            dateRange={dateRange}
            onDateRangeChange={handleDateRange}
            feature={feature}
            onFeatureChange={handleFeature}
            onGenerate={handleGenerate}
            isLoading={isLoading}
          />
        )}
      </Sidebar>

      <main className="relative min-h-[400px] flex-1">
        <MapWrapper model={analysis?.map ?? EMPTY_MAP} />
      </main>
    </div>
  );
}
