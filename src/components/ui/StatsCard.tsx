interface StatsCardProps {
  label: string;
  value: string | number;
  subtext?: string;
}

export function StatsCard({ label, value, subtext }: StatsCardProps) {
  return (
    <div className="rounded-lg bg-white p-3 text-center shadow-sm">
      <div className="text-sm text-ink mb-1">{label}</div>
      <div className="text-2xl font-bold text-ink">{value}</div>
      {subtext && <div className="text-xs text-gray-500 mt-1">{subtext}</div>}
    </div>
  );
}
