import type { AddressMatch } from '@/lib/geocoding';

export function AddressCard({ address }: { address: AddressMatch }) {
  const rows: Array<[string, string]> = [
    ['Administrative area', address.administrativeArea ?? '–'],
    ['Address', address.address],
    ['Classification', address.classification ?? '–'],
    ['Address status', address.status ?? '–'],
    ['Matching confidence', `Score: ${address.matchScore}`],
  ];

  return (
    <section>
      <h2 className="mb-2 font-semibold text-ink">Selected address</h2>
      <table className="w-full rounded-lg bg-[#f3f2f2]/40 text-sm">
        <tbody>
          {rows.map(([label, value]) => (
            <tr key={label}>
              <td className="p-1.5 align-top">{label}:</td>
              <td className="p-1.5">{value}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </section>
  );
}
