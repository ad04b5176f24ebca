import type { LegendEntry } from '@/lib/map/map-model';

function LegendSymbol({ entry }: { entry: LegendEntry }) {
  if (entry.symbol === 'line') {
    return <span className="inline-block h-0.5 w-7 align-middle" style={{ backgroundColor: entry.color }} />;
  }
  return (
    <span
      className={`inline-block h-3 w-3 align-middle ${entry.symbol === 'circle' ? 'rounded-full' : ''}`}
      style={{ backgroundColor: entry.color }}
    />
  );
}

export function Legend({ entries }: { entries: LegendEntry[] }) {
  if (entries.length === 0) return null;

  return (
    <div className="pointer-events-auto w-56 border-2 border-gray-400 bg-white/85 p-2.5 text-sm">
      <b>Features</b>
      <ul className="mt-1 space-y-1">
        {entries.map((entry) => (
          <li key={entry.label} className="flex items-center gap-2">
            <LegendSymbol entry={entry} />
            {entry.label}
          </li>
        ))}
      </ul>
    </div>
  );
}
