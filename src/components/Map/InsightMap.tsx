'use client';

import { useEffect, useMemo, useRef } from 'react';
import { CircleMarker, GeoJSON, LayersControl, MapContainer, TileLayer, Tooltip, useMap } from 'react-leaflet';
import type { Feature, FeatureCollection, Geometry } from 'geojson';
import type { PathOptions } from 'leaflet';
import L from 'leaflet';
import 'leaflet/dist/leaflet.css';
import { formatMeters } from '../../../lib/utils/formatters';
import {
  DEFAULT_CENTER,
  DEFAULT_ZOOM,
  type MapLayerModel,
  type MapModel,
  type MapView,
  type PathStyle,
  viewKey,
} from '@/lib/map/map-model';
import { CrimeClusterLayer } from './CrimeClusterLayer';
import { Legend } from './Legend';

interface InsightMapProps {
  model: MapModel;
}

function toPathOptions(style: PathStyle): PathOptions {
  return {
    color: style.color,
    fillColor: style.fillColor,
    weight: style.weight,
    fillOpacity: style.fillOpacity,
    fill: style.fill,
  };
}

function toCollection(layer: MapLayerModel): FeatureCollection<Geometry, { tooltip: string }> {
  return {
    type: 'FeatureCollection',
    features: layer.features.map((feature): Feature<Geometry, { tooltip: string }> => ({
      type: 'Feature',
      id: feature.id,
      geometry: feature.geometry,
      properties: { tooltip: feature.tooltip },
    })),
  };
}

function tooltipOf(properties: unknown): string {
  if (typeof properties === 'object' && properties !== null && 'tooltip' in properties && typeof properties.tooltip === 'string') {
    return properties.tooltip;
  }
  return '';
}

/**
 * Moves the map when the analysis asks for a different view; an equal view
 * from a filter change leaves the user's pan and zoom alone.
 */
function ViewController({ view }: { view: MapView }) {
  const map = useMap();
  const latest = useRef(view);
  latest.current = view;
  const key = viewKey(view);

  useEffect(() => {
    const current = latest.current;
    if (current.kind === 'bounds') map.fitBounds(current.bounds);
    else map.setView(current.center, current.zoom);
  }, [map, key]);

  return null;
}

function FeatureLayer({ layer, version }: { layer: MapLayerModel; version: string }) {
  const style = toPathOptions(layer.style);
  const data = useMemo(() => toCollection(layer), [layer]);

  return (
    <GeoJSON
      // GeoJSON data is read once on mount; remount when it changes
      key={`${layer.key}:${version}:${layer.features.length}`}
      data={data}
      style={() => style}
      pointToLayer={(_feature, latlng) => L.circleMarker(latlng, { ...style, radius: layer.style.radius })}
      onEachFeature={(feature, leafletLayer) => {
        const tooltip = tooltipOf(feature.properties);
        if (tooltip) leafletLayer.bindTooltip(tooltip);
      }}
    />
  );
}

export function InsightMap({ model }: InsightMapProps) {
  const version = [model.marker?.position.join(','), model.buffer?.radiusMeters].join('|');
  const bufferStyle = model.buffer ? toPathOptions(model.buffer.style) : undefined;

  return (
    <div className="relative h-full w-full">
      <MapContainer
        center={DEFAULT_CENTER}
        zoom={DEFAULT_ZOOM}
        maxZoom={model.maxZoom}
        className="h-full w-full"
      >
        <ViewController view={model.view} />

        {model.tiles.length > 0 && (
          <LayersControl position="topright">
            {model.tiles.map((tile, index) => (
              <LayersControl.BaseLayer key={tile.id} name={tile.name} checked={index === 0}>
                <TileLayer url={tile.url} attribution={tile.attribution} maxZoom={model.maxZoom} />
              </LayersControl.BaseLayer>
            ))}
          </LayersControl>
        )}

        {model.layers.map((layer) => (
          <FeatureLayer key={layer.key} layer={layer} version={version} />
        ))}

        {model.crime && <CrimeClusterLayer points={model.crime.points} style={model.crime.style} />}

        {model.buffer && (
          <GeoJSON
            key={`buffer:${version}`}
            data={model.buffer.polygon}
            style={bufferStyle}
          >
            <Tooltip>Buffer: {formatMeters(model.buffer.radiusMeters)}</Tooltip>
          </GeoJSON>
        )}

        {model.marker && (
          <CircleMarker
            center={model.marker.position}
            radius={8}
            pathOptions={{ color: '#ffffff', weight: 2, fillColor: '#00008b', fillOpacity: 1 }}
          >
            <Tooltip>{model.marker.label}</Tooltip>
          </CircleMarker>
        )}
      </MapContainer>

      <div className="pointer-events-none absolute bottom-12 left-12 z-[1000]">
        <Legend entries={model.legend} />
      </div>
    </div>
  );
}
