// frontend/src/components/AggregateTable.tsx
import { AGG_LABELS, GROUP_LABELS, METRIC_LABELS, formatMetric } from "../lib/formatters";
import type { AggregateResponse } from "../lib/schema";

type Props = {
  result: AggregateResponse;
};

export default function AggregateTable({ result }: Props) {
  const { rows, groupBy, metric, agg } = result;

  if (rows.length === 0) {
    return <div className="text-sm text-slate-500">No rows for the selected filters.</div>;
  }

  return (
    <table className="w-full text-sm">
      <thead className="bg-slate-50 text-left text-xs font-semibold uppercase text-slate-500">
        <tr>
          <th className="px-3 py-2">Period</th>
          {groupBy.map((g) => (
            <th key={g} className="px-3 py-2">
              {GROUP_LABELS[g]}
            </th>
          ))}
          <th className="px-3 py-2 text-right">
            {AGG_LABELS[agg]} {METRIC_LABELS[metric].toLowerCase()}
          </th>
        </tr>
      </thead>
      <tbody>
        {rows.map((r) => (
          <tr
            key={`${r.bucket}|${groupBy.map((g) => r.groups[g] ?? "").join("|")}`}
            className="border-t border-slate-100"
          >
            <td className="px-3 py-2 text-slate-600">{r.label}</td>
            {groupBy.map((g) => (
              <td key={g} className="px-3 py-2">
                {r.groups[g] ?? "—"}
              </td>
            ))}
            <td className="px-3 py-2 text-right font-medium">{formatMetric(metric, r.value)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
