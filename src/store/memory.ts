import { StoreError } from "../errors.js";
import type { CategoryId, Dataset } from "../types.js";
import { decodeDataset, encodeDataset } from "./codec.js";
import type { DatasetStore } from "./index.js";

/**
 * In-process store. Datasets go through the same encoding as `FileStore`, so
 * what can be saved here can be saved to disk.
 */
export class MemoryStore implements DatasetStore {
  private readonly entries = new Map<string, string>();

  async load(
    station: string,
    category: CategoryId,
  ): Promise<Dataset | undefined> {
    const content = this.entries.get(`${station}/${category}`);
    return content === undefined ? undefined : decodeDataset(JSON.parse(content));
  }

  async save(
    station: string,
    category: CategoryId,
    dataset: Dataset,
  ): Promise<void> {
    if (dataset.station !== station || dataset.category !== category) {
      throw new StoreError(
        `Cannot save ${dataset.station}/${dataset.category} as ${station}/${category}`,
      );
    }
    this.entries.set(
      `${station}/${category}`,
      JSON.stringify(encodeDataset(dataset)),
    );
  }

  has(station: string, category: CategoryId): boolean {
    return this.entries.has(`${station}/${category}`);
  }

  delete(station: string, category: CategoryId): boolean {
    return this.entries.delete(`${station}/${category}`);
  }
}
