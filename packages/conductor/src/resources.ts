import type { ModelCatalog } from "@research-agent/shared";

import { findModel } from "./catalog";

export interface LoadedModelRef {
  name: string;
}

/**
 * Resident memory of the loaded models, using the catalog's declared sizes.
 * Models the catalog does not know about are not counted.
 */
export function estimateMemoryUsage(
  catalog: ModelCatalog,
  loaded: readonly LoadedModelRef[],
): number {
  const names = new Set(loaded.map((model) => model.name));
  let total = 0;
  for (const name of names) {
    total += findModel(catalog, name)?.sizeGb ?? 0;
  }
  return total;
}

/**
 * Whether loading `name` keeps the estimate within `maxMemoryGb`.
 * Unknown and already-loaded models are always allowed.
 */
export function canLoadModel(
  catalog: ModelCatalog,
  name: string,
  loaded: readonly LoadedModelRef[],
  maxMemoryGb: number,
): boolean {
  const model = findModel(catalog, name);
  if (!model) return true;
  if (loaded.some((entry) => entry.name === name)) return true;
  return estimateMemoryUsage(catalog, loaded) + model.sizeGb <= maxMemoryGb;
}
