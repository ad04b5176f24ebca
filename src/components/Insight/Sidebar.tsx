'use client';

import { useEffect, useState, type FormEvent } from 'react';
import { LAYER_KEYS, LAYERS, type LayerKey } from '../../../lib/geo/types';
import { MAX_RADIUS_METERS, normalizeRadius, RADIUS_STEP_METERS } from '@/lib/analysis/request';
import type { AddressMatch } from '@/lib/geocoding';
import { AddressCard } from './AddressCard';

interface SidebarProps {
  query: string;
  onSearch: (query: string) => void;
  radius: number;
  onRadiusChange: (radius: number) => void;
  layers: ReadonlySet<LayerKey>;
  onToggleLayer: (layer: LayerKey) => void;
  address: AddressMatch | null;
  isLoading: boolean;
  children?: React.ReactNode;
}

export function Sidebar({
  query,
  onSearch,
  radius,
  onRadiusChange,
  layers,
  onToggleLayer,
  address,
  isLoading,
  children,
}: SidebarProps) {
  const [draft, setDraft] = useState(query);
  // Typed text is kept as is and only rounded once the user leaves the field
  const [radiusDraft, setRadiusDraft] = useState(String(radius));

  useEffect(() => {
    setRadiusDraft(String(radius));
  }, [radius]);

  const commitRadius = () => {
    const next = normalizeRadius(radiusDraft);
    setRadiusDraft(String(next));
    if (next !== radius) onRadiusChange(next);
  };

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    commitRadius();
    onSearch(draft.trim());
  };

  return (
    <aside className="flex w-full flex-col gap-4 overflow-y-auto bg-paper p-4 md:w-96">
      <h1 className="text-2xl font-bold text-ink">Community search</h1>

      <form onSubmit={handleSubmit} className="flex flex-col gap-2">
        <label htmlFor="address" className="text-sm text-ink">
          Enter address or postcode
        </label>
        <div className="flex gap-2">
          <input
            id="address"
            type="search"
            value={draft}
            onChange={(e) => setDraft(e.target.value)}
            className="flex-1 rounded border border-gray-300 px-2 py-1"
            autoComplete="street-address"
          />
          <button
            type="submit"
            disabled={isLoading || draft.trim() === ''}
            className="rounded bg-brand px-3 py-1 text-white disabled:opacity-50"
          >
            Search
          </button>
        </div>

        <label htmlFor="radius" className="text-sm text-ink">
          Enter address search distance (m)
        </label>
        <input
          id="radius"
          type="number"
          min={0}
          max={MAX_RADIUS_METERS}
          step={RADIUS_STEP_METERS}
          value={radiusDraft}
          onChange={(e) => setRadiusDraft(e.target.value)}
          onBlur={commitRadius}
          className="rounded border border-gray-300 px-2 py-1"
        />
      </form>

      {radius > 0 && (
        <fieldset className="flex flex-col gap-1">
          <legend className="mb-1 font-semibold text-ink">Select layers</legend>
          {LAYER_KEYS.map((key) => (
            <label key={key} className="flex items-center gap-2 text-sm">
              <input type="checkbox" checked={layers.has(key)} onChange={() => onToggleLayer(key)} />
              {LAYERS[key].label}
            </label>
          ))}
        </fieldset>
      )}

      {address && <AddressCard address={address} />}

      {children}
    </aside>
  );
}
