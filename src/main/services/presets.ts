/**
 * Mastering preset table.
 *
 * Genre presets are looked up by inferred genre tag; use-case presets
 * (radio, audiophile, streaming) can only be chosen explicitly. The table
 * lives in src/presets/masteringPresets.json.
 */

import presetData from '../../presets/masteringPresets.json';
import { GENRE_TAGS } from '../../shared/types';
import type { GenreTag, MasteringConfig } from '../../shared/types';
import { UnknownPresetError } from './errors';

/** One row of the preset table */
export interface PresetDefinition {
  label: string;
  description: string;
  threshold: number;
  limiter: boolean;
  normalize: boolean;
  rmsCorrectionSteps: number;
  lowessFrac: number | null;
}

export type PresetKind = 'default' | 'genre' | 'use-case';

/** Preset with its key, for listings */
export interface PresetInfo {
  name: string;
  kind: PresetKind;
  label: string;
  description: string;
  config: MasteringConfig;
}

/** Preset applied to candidates without an inferred genre */
export const DEFAULT_PRESET_NAME = 'general';

function toConfig(name: string, definition: PresetDefinition): MasteringConfig {
  return {
    name,
    threshold: definition.threshold,
    limiter: definition.limiter,
    normalize: definition.normalize,
    rmsCorrectionSteps: definition.rmsCorrectionSteps,
    lowessFrac: definition.lowessFrac,
  };
}

function buildTable(): Map<string, PresetInfo> {
  const table = new Map<string, PresetInfo>();
  const add = (name: string, kind: PresetKind, definition: PresetDefinition): void => {
    if (!(definition.threshold > 0 && definition.threshold <= 1)) {
      throw new RangeError(`Preset "${name}" has threshold ${definition.threshold} outside (0, 1]`);
    }
    table.set(name, {
      name,
      kind,
      label: definition.label,
      description: definition.description,
      config: toConfig(name, definition),
    });
  };

  add(DEFAULT_PRESET_NAME, 'default', presetData.general);
  const genres: Array<[string, PresetDefinition]> = Object.entries(presetData.genres);
  for (const [name, definition] of genres) {
    add(name, 'genre', definition);
  }
  const useCases: Array<[string, PresetDefinition]> = Object.entries(presetData.useCases);
  for (const [name, definition] of useCases) {
    add(name, 'use-case', definition);
  }

  for (const tag of GENRE_TAGS) {
    if (!table.has(tag)) {
      throw new Error(`Preset table is missing genre "${tag}"`);
    }
  }
  return table;
}

const PRESETS = buildTable();

function copyConfig(info: PresetInfo): MasteringConfig {
  return { ...info.config };
}

/**
 * Preset for a genre tag. Unknown or missing tags get the default preset;
 * this never throws.
 */
export function presetFor(genreTag: GenreTag | string | null): MasteringConfig {
  const info = genreTag === null ? undefined : PRESETS.get(genreTag);
  if (info && info.kind === 'genre') {
    return copyConfig(info);
  }
  const fallback = PRESETS.get(DEFAULT_PRESET_NAME);
  if (!fallback) {
    throw new Error('Default preset is missing');
  }
  return copyConfig(fallback);
}

/**
 * Preset selected by name (CLI --preset). Accepts genre, use-case and the
 * default preset.
 *
 * @throws UnknownPresetError for a name not in the table
 */
export function resolvePresetName(name: string): MasteringConfig {
  const info = PRESETS.get(name.trim().toLowerCase());
  if (!info) {
    throw new UnknownPresetError(name, [...PRESETS.keys()]);
  }
  return copyConfig(info);
}

/**
 * All presets: default first, then genres, then use cases (table order).
 */
export function listPresets(): PresetInfo[] {
  return [...PRESETS.values()].map((info) => ({ ...info, config: copyConfig(info) }));
}
