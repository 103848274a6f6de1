// frontend/src/components/PeriodPicker.tsx
import { PERIOD_LABELS } from "../lib/formatters";
import { PERIODS, PeriodSchema, type Period } from "../lib/schema";

type Props = {
  value: Period;
  onChange: (period: Period) => void;
  label?: string;
  disabled?: boolean;
};

export default function PeriodPicker({ value, onChange, label = "Time resolution", disabled }: Props) {
  return (
    <label className="flex items-center gap-2 text-sm text-slate-600">
      {label}
      <select
        value={value}
        disabled={disabled}
        onChange={(e) => {
          const parsed = PeriodSchema.safeParse(e.target.value);
          if (parsed.success) onChange(parsed.data);
        }}
        className="rounded-lg border border-slate-300 bg-white px-2 py-1"
      >
        {PERIODS.map((p) => (
          <option key={p} value={p}>
            {PERIOD_LABELS[p]}
          </option>
        ))}
      </select>
    </label>
  );
}
