// frontend/src/components/UploadCard.tsx
// Opplasting av CSV/Excel med valgfri kolonnemapping + info om gjeldende datasett.
import { useState, type FormEvent } from "react";
import { formatCount, formatDay } from "../lib/formatters";
import { COLUMN_FIELDS, type ColumnField, type ColumnMapping, type DatasetDescription } from "../lib/schema";

type Props = {
  dataset: DatasetDescription | null;
  uploading: boolean;
  message: string | null;
  error: string | null;
  onUpload: (file: File, mapping: ColumnMapping) => void;
  onReset: () => void;
};

const ACCEPT = ".csv,.xlsx,.xls,text/csv,application/vnd.ms-excel,application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export default function UploadCard({ dataset, uploading, message, error, onUpload, onReset }: Props) {
  const [file, setFile] = useState<File | null>(null);
  const [mapping, setMapping] = useState<ColumnMapping>({});
  const [localError, setLocalError] = useState<string | null>(null);

  const setColumn = (col: ColumnField, value: string) => {
    setMapping((prev) => ({ ...prev, [col]: value }));
  };

  const submit = (e: FormEvent) => {
    e.preventDefault();
    if (!file) {
      setLocalError("Choose a file first.");
      return;
    }
    setLocalError(null);

    const filled: ColumnMapping = {};
    for (const col of COLUMN_FIELDS) {
      const v = mapping[col]?.trim();
      if (v) filled[col] = v;
    }
    onUpload(file, filled);
  };

  const shownError = localError ?? error;

  return (
    <form
      onSubmit={submit}
      className="flex flex-col gap-3 rounded-xl border border-slate-200 bg-white p-4"
      aria-label="Upload ride data"
    >
      <div className="flex items-start justify-between gap-4">
        <div>
          <h2 className="text-lg font-semibold">Upload ride data</h2>
          {dataset && (
            <p className="text-sm text-slate-600" data-testid="dataset-info">
              {dataset.source === "sample" ? "Sample data" : "Uploaded"}
              {dataset.fileName ? ` · ${dataset.fileName}` : ""} · {formatCount(dataset.recordCount)} records
              {dataset.dateRange
                ? ` · ${formatDay(dataset.dateRange.from)} → ${formatDay(dataset.dateRange.to)}`
                : ""}
              {dataset.droppedRows > 0 ? ` · ${formatCount(dataset.droppedRows)} rows skipped` : ""}
            </p>
          )}
        </div>
        {dataset?.source === "upload" && (
          <button
            type="button"
            onClick={onReset}
            className="shrink-0 rounded-lg border border-slate-300 px-3 py-1.5 text-sm hover:bg-slate-50"
          >
            Back to sample data
          </button>
        )}
      </div>

      <label className="text-sm text-slate-600">
        CSV or Excel file
        <input
          type="file"
          accept={ACCEPT}
          onChange={(e) => setFile(e.target.files?.[0] ?? null)}
          className="mt-1 block w-full text-sm"
        />
      </label>

      <details className="text-sm">
        <summary className="cursor-pointer text-slate-600">Column mapping (optional)</summary>
        <div className="mt-2 grid grid-cols-2 gap-2">
          {COLUMN_FIELDS.map((col) => (
            <label key={col} className="flex flex-col text-xs text-slate-500">
              {col}
              <input
                type="text"
                value={mapping[col] ?? ""}
                placeholder="auto"
                onChange={(e) => setColumn(col, e.target.value)}
                className="rounded-md border border-slate-300 px-2 py-1 text-sm"
              />
            </label>
          ))}
        </div>
      </details>

      <div className="flex items-center gap-3">
        <button
          type="submit"
          disabled={uploading}
          className="rounded-lg bg-slate-900 px-4 py-2 text-sm font-medium text-white disabled:opacity-50"
        >
          {uploading ? "Uploading…" : "Upload"}
        </button>
        {message && !shownError && (
          <span role="status" className="text-sm text-emerald-700">
            {message}
          </span>
        )}
      </div>

      {shownError && (
        <div role="alert" className="rounded-lg border border-red-200 bg-red-50 p-2 text-sm text-red-800">
          {shownError}
        </div>
      )}
    </form>
  );
}
