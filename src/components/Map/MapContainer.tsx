'use client';

import dynamic from 'next/dynamic';
import type { MapModel } from '@/lib/map/map-model';

// Leaflet touches `window` on import, so the map only renders in the browser
const InsightMap = dynamic(
  () => import('./InsightMap').then((mod) => mod.InsightMap),
  {
    ssr: false,
    loading: () => (
      <div className="w-full h-full flex items-center justify-center bg-[#f3f2f2]">
        <div className="flex flex-col items-center gap-3">
          <div className="w-8 h-8 border-4 border-brand border-t-transparent rounded-full animate-spin" />
          <span className="text-gray-600">Loading map...</span>
        </div>
      </div>
    ),
  }
);

export function MapWrapper({ model }: { model: MapModel }) {
  return <InsightMap model={model} />;
}
