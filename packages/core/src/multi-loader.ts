/**
 * Batch import of several SEG-Y files into one name-keyed set.
 *
 * Files are loaded one after another. Names come from the file stem and
 * get a `_2`, `_3`, ... suffix on collision; the chosen name is written
 * back into each line's metadata.
 */

import { resolveLoadConfig } from './config.js';
import { lineNameFromPath, loadLine } from './line-loader.js';
import type { Line, LoadConfigInput, LoadFailure, LoadManyResult } from './types.js';

export interface LoadManyOptions {
  /** Lines already loaded; their names are taken. The map is copied, not mutated. */
  existing?: ReadonlyMap<string, Line>;
  /** Rethrow the first failure instead of collecting it. Default: false */
  abortOnError?: boolean;
  onProgress?: (progress: number, message: string) => void;
}

/** First of `base`, `base_2`, `base_3`, ... not in `taken`. */
export function uniqueLineName(base: string, taken: { has(name: string): boolean }): string {
  let name = base;
  let counter = 1;
  while (taken.has(name)) {
    counter++;
    name = `${base}_${counter}`;
  }
  return name;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function loadMany(
  paths: readonly string[],
  config: LoadConfigInput = {},
  options: LoadManyOptions = {},
): LoadManyResult {
  const { existing, abortOnError = false, onProgress } = options;
  const lines = new Map<string, Line>(existing ?? []);
  const failures: LoadFailure[] = [];
  // Validated once up front; batch names always come from file stems.
  const fieldConfig = resolveLoadConfig({ ...config, name: undefined });

  paths.forEach((path, i) => {
    onProgress?.(i / paths.length, `Loading ${lineNameFromPath(path)} (${i + 1}/${paths.length})...`);

    let line: Line;
    try {
      line = loadLine(path, fieldConfig);
    } catch (err) {
      if (abortOnError) throw err;
      const error = toError(err);
      console.warn(`[SEGY] Skipping ${path}: ${error.message}`);
      failures.push({ path, error });
      return;
    }

    const name = uniqueLineName(line.metadata.name, lines);
    line.metadata.name = name;
    lines.set(name, line);
  });

  onProgress?.(
    1,
    `Loaded ${lines.size - (existing?.size ?? 0)}/${paths.length} file(s)` +
    (failures.length > 0 ? `, ${failures.length} failed.` : '.'),
  );

  return { lines, failures };
}
