import type { CategoryId, Dataset } from "../types.js";

/**
 * Persistence keyed by (station id, category). `load` resolves `undefined`
 * when nothing is stored; any other failure rejects with a `StoreError`.
 * A `save` either replaces the stored dataset completely or leaves it as it was.
 */
export interface DatasetStore {
  load(station: string, category: CategoryId): Promise<Dataset | undefined>;
  save(station: string, category: CategoryId, dataset: Dataset): Promise<void>;
}

export { FileStore } from "./file.js";
export { MemoryStore } from "./memory.js";
export { decodeDataset, encodeDataset } from "./codec.js";
