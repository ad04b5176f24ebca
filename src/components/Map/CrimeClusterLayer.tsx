'use client';

import { useMemo, useState } from 'react';
import { CircleMarker, Marker, Tooltip, useMap, useMapEvents } from 'react-leaflet';
import type { DivIcon } from 'leaflet';
import L from 'leaflet';
import { clusterCrimePoints, type CrimePoint, type PathStyle } from '@/lib/map/map-model';

interface CrimeClusterLayerProps {
  points: CrimePoint[];
  style: PathStyle;
}

function clusterIcon(count: number, color: string): DivIcon {
  return L.divIcon({
    html: `<div style="background-color:${color};color:white;border-radius:50%;width:40px;height:40px;display:flex;align-items:center;justify-content:center;"><span>${count}</span></div>`,
    className: 'crime-cluster',
    iconSize: [40, 40],
  });
}

export function CrimeClusterLayer({ points, style }: CrimeClusterLayerProps) {
  const map = useMap();
  const [zoom, setZoom] = useState(() => map.getZoom());

  useMapEvents({
    zoomend: () => setZoom(map.getZoom()),
  });

  const clusters = useMemo(() => clusterCrimePoints(points, zoom), [points, zoom]);

  return (
    <>
      {clusters.map((cluster) => {
        if (cluster.points.length === 1) {
          const [point] = cluster.points;
          return (
            <CircleMarker
              key={cluster.id}
              center={point.position}
              radius={style.radius}
              pathOptions={{
                color: style.color,
                fillColor: style.fillColor,
                fillOpacity: style.fillOpacity,
                weight: style.weight,
                fill: style.fill,
              }}
            >
              <Tooltip>{point.tooltip}</Tooltip>
            </CircleMarker>
          );
        }

        return (
          <Marker
            key={cluster.id}
            position={cluster.position}
            icon={clusterIcon(cluster.points.length, style.fillColor)}
            eventHandlers={{
              click: () => map.setView(cluster.position, Math.min(map.getZoom() + 2, map.getMaxZoom())),
            }}
          >
            <Tooltip>{cluster.points.length} crimes</Tooltip>
          </Marker>
        );
      })}
    </>
  );
}
