// server/src/state/datasetStore.ts
// Ett gjeldende datasett i minnet. Eksempeldata lastes lat ved første behov.
import { loadDatasetFromFile } from "../lib/loader";
import { dateRange } from "../lib/summaries";
import type { Dataset, DatasetSource } from "../lib/types";
import type { CanonicalColumn, ColumnMapping } from "../lib/columns";

export type DatasetDescription = {
  source: DatasetSource;
  fileName: string | null;
  recordCount: number;
  columns: CanonicalColumn[];
  mapping: ColumnMapping;
  droppedRows: number;
  loadedAt: string;
  dateRange: { from: string; to: string } | null;
};

export type SampleLoader = () => Promise<Dataset>;

export class DatasetStore {
  private dataset: Dataset | null = null;
  private pendingSample: Promise<Dataset> | null = null;

  constructor(private readonly loadSample: SampleLoader) {}

  static fromSampleFile(samplePath: string): DatasetStore {
    return new DatasetStore(() => loadDatasetFromFile(samplePath, { source: "sample" }));
  }

  async current(): Promise<Dataset> {
    if (this.dataset) return this.dataset;

    // samtidige kall deler samme innlasting
    if (!this.pendingSample) {
      console.log("[datasetStore] laster eksempeldata");
      this.pendingSample = this.loadSample().finally(() => {
        this.pendingSample = null;
      });
    }
    const sample = await this.pendingSample;
    // en opplasting kan ha kommet mens eksempeldata lastet
    if (!this.dataset) this.dataset = sample;
    return this.dataset;
  }

  replace(dataset: Dataset): void {
    console.log(
      "[datasetStore] erstatter datasett:",
      dataset.fileName ?? "(uten navn)",
      `${dataset.records.length} rader`
    );
    this.dataset = dataset;
  }

  reset(): void {
    console.log("[datasetStore] tilbakestiller til eksempeldata");
    this.dataset = null;
  }

  async describe(): Promise<DatasetDescription> {
    const ds = await this.current();
    return describeDataset(ds);
  }
}

export function describeDataset(ds: Dataset): DatasetDescription {
  return {
    source: ds.source,
    fileName: ds.fileName,
    recordCount: ds.records.length,
    columns: ds.columns,
    mapping: ds.mapping,
    droppedRows: ds.droppedRows,
    loadedAt: ds.loadedAt,
    dateRange: dateRange(ds.records),
  };
}
