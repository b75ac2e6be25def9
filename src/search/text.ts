import MiniSearch, { type Options } from "minisearch";
import type { CatalogStation } from "./index.js";

interface SearchDocument {
  id: string;
  name: string;
  owner: string;
  type: string;
}

const textIndexOptions: Options<SearchDocument> = {
  fields: ["id", "name", "owner", "type"],
  searchOptions: {
    boost: {
      name: 3,
      id: 2,
    },
    fuzzy: 0.2,
    prefix: true,
  },
};

export function createTextIndex(
  stations: readonly CatalogStation[],
): MiniSearch<SearchDocument> {
  const index = new MiniSearch<SearchDocument>(textIndexOptions);
  index.addAll(
    stations.map((station) => ({
      id: station.id,
      name: station.name ?? "",
      owner: station.owner ?? "",
      type: station.type ?? "",
    })),
  );
  return index;
}
