import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { StoreError } from "../errors.js";
import type { CategoryId, Dataset } from "../types.js";
import { decodeDataset, encodeDataset } from "./codec.js";
import type { DatasetStore } from "./index.js";

/**
 * Stores each dataset as JSON at `<dataDir>/<station>/<realtime|historical>/<name>.json`.
 */
export class FileStore implements DatasetStore {
  constructor(readonly dataDir: string) {}

  path(station: string, category: CategoryId): string {
    if (!/^[A-Za-z0-9_-]+$/.test(station)) {
      throw new StoreError(`Invalid station id: ${station}`);
    }
    return join(this.dataDir, station, `${category}.json`);
  }

  async load(
    station: string,
    category: CategoryId,
  ): Promise<Dataset | undefined> {
    const filePath = this.path(station, category);

    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new StoreError(`Unable to read ${filePath}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`${filePath} is not valid JSON`, { cause: error });
    }

    const dataset = decodeDataset(data);
    if (dataset.station !== station || dataset.category !== category) {
      throw new StoreError(
        `${filePath} holds ${dataset.station}/${dataset.category}`,
      );
    }
    return dataset;
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

    const filePath = this.path(station, category);
    const content = JSON.stringify(encodeDataset(dataset), null, 2) + "\n";
    // Written next to the target and renamed over it, so readers never see a partial file
    const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tmpPath, content);
      await rename(tmpPath, filePath);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw new StoreError(`Unable to write ${filePath}`, { cause: error });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
