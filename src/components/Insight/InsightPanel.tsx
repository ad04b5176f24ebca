'use client';

import { LAYER_KEYS, LAYERS, isLayerKey, type LayerKey } from '../../../lib/geo/types';
import { formatNumber } from '../../../lib/utils/formatters';
import type { AreaAnalysis, DateRange } from '@/lib/analysis/types';
import { StatsCard } from '@/components/ui/StatsCard';
import { TrendChart } from './TrendChart';

interface InsightPanelProps {
  analysis: AreaAnalysis;
  layers: ReadonlySet<LayerKey>;
  crimeTypes: ReadonlySet<string>;
  onToggleCrimeType: (type: string) => void;
  dateRange: DateRange | null;
  onDateRangeChange: (range: DateRange) => void;
  feature: LayerKey | null;
  onFeatureChange: (feature: LayerKey | null) => void;
  onGenerate: () => void;
  isLoading: boolean;
}

export function InsightPanel({
  analysis,
  layers,
  crimeTypes,
  onToggleCrimeType,
  dateRange,
  onDateRangeChange,
  feature,
  onFeatureChange,
  onGenerate,
  isLoading,
}: InsightPanelProps) {
  const { crime, insight } = analysis;
  const range = dateRange ?? crime?.extent ?? null;
  const featureOptions = LAYER_KEYS.filter((key) => layers.has(key));

  return (
    <section className="flex flex-col gap-3">
      <h2 className="text-2xl font-bold text-ink">Community insight</h2>
      <p className="text-sm text-gray-600">
        Please customise your search requirements to retrieve insight about your chosen area
      </p>

      {crime && (
        <details open className="rounded bg-white p-2">
          <summary className="cursor-pointer text-sm font-semibold">
            Select crime ({formatNumber(crime.total)} recorded)
          </summary>
          <div className="mt-2 flex flex-col gap-1">
            {crime.options.map((type) => (
              <label key={type} className="flex items-center gap-2 text-sm">
                <input type="checkbox" checked={crimeTypes.has(type)} onChange={() => onToggleCrimeType(type)} />
                {type}
              </label>
            ))}
          </div>

          {crimeTypes.size > 0 && range && (
            <div className="mt-2 grid grid-cols-2 gap-2">
              <label className="flex flex-col text-sm">
                Start date
                <input
                  type="date"
                  value={range.start}
                  max={range.end}
                  onChange={(e) => e.target.value && onDateRangeChange({ start: e.target.value, end: range.end })}
                  className="rounded border border-gray-300 px-1"
                />
              </label>
              <label className="flex flex-col text-sm">
                End date
                <input
                  type="date"
                  value={range.end}
                  min={range.start}
                  onChange={(e) => e.target.value && onDateRangeChange({ start: range.start, end: e.target.value })}
                  className="rounded border border-gray-300 px-1"
                />
              </label>
            </div>
          )}
        </details>
      )}

      {crime && crime.filteredCount > 0 && (
        <div className="flex flex-col gap-2">
          <h3 className="text-sm text-gray-600">Community statistics</h3>
          <label className="flex flex-col text-sm">
            Select data
            <select
              value={feature ?? ''}
              onChange={(e) => onFeatureChange(isLayerKey(e.target.value) ? e.target.value : null)}
              className="rounded border border-gray-300 px-1 py-1"
            >
              <option value="">No value</option>
              {featureOptions.map((key) => (
                <option key={key} value={key}>
                  {LAYERS[key].label}
                </option>
              ))}
            </select>
          </label>
          <button
            type="button"
            onClick={onGenerate}
            disabled={!feature || isLoading}
            className="rounded bg-brand px-3 py-1 text-white disabled:opacity-50"
          >
            Generate insight
          </button>
        </div>
      )}

      {insight && (
        <div className="flex flex-col gap-3">
          <h3 className="text-sm text-gray-600">Overall crime statistics</h3>
          <TrendChart model={insight.chart} />
          {insight.result.totals.length > 0 && (
            <>
              <h3 className="text-sm text-gray-600">Spatial insight at a glance</h3>
              <div className="grid grid-cols-1 gap-2">
                {insight.result.totals.map((bucket) => (
                  <StatsCard
                    key={bucket.key}
                    label={bucket.statLabel}
                    value={formatNumber(bucket.total)}
                    subtext={`${formatNumber(bucket.cellCount)} grid cells`}
                  />
                ))}
              </div>
            </>
          )}
        </div>
      )}
    </section>
  );
}
