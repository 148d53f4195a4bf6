/**
 * Strategy Store
 *
 * Process-wide holder of the active extraction/retrieval pair.
 *
 * Every write validates a complete new pair, deep-freezes it and swaps a
 * single reference. The revision counts writes that changed something.
 * Readers call `get()` once per operation and keep that
 * snapshot; a concurrent write never changes what they see.
 */

import type { z } from 'zod';
import { DEFAULT_EXTRACTION, DEFAULT_RETRIEVAL } from './defaults';
import { StrategyValidationError, UnknownPresetError } from './errors';
import { deepFreeze, deepMerge } from './merge';
import { BUILTIN_PRESETS } from './presets';
import { extractionStrategySchema, retrievalStrategySchema } from './schemas';
import type {
  PresetSummary,
  StrategyKind,
  StrategyPreset,
  StrategySnapshot,
  StrategyTrees
} from './types';

export interface StrategyStoreOptions {
  /** Preset registry (default: the built-in presets) */
  presets?: readonly StrategyPreset[];
  /** Preset to start from instead of the defaults */
  initialPreset?: string;
}

function parseStrategy<T>(schema: z.ZodType<T>, kind: StrategyKind, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw StrategyValidationError.fromZod(kind, result.error);
  }
  return result.data;
}

export class StrategyStore {
  private snapshot: StrategySnapshot;
  private readonly registry: ReadonlyMap<string, StrategyPreset>;

  constructor(options: StrategyStoreOptions = {}) {
    const presets = options.presets ?? BUILTIN_PRESETS;
    this.registry = new Map(presets.map((preset) => [preset.name, preset]));
    this.snapshot = this.build(
      {
        extraction: parseStrategy(extractionStrategySchema, 'extraction', DEFAULT_EXTRACTION),
        retrieval: parseStrategy(retrievalStrategySchema, 'retrieval', DEFAULT_RETRIEVAL)
      },
      null,
      0
    );

    if (options.initialPreset !== undefined) {
      this.loadPreset(options.initialPreset);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Reads
  // ═══════════════════════════════════════════════════════════════════════════

  get(): StrategySnapshot {
    return this.snapshot;
  }

  presets(): PresetSummary[] {
    return [...this.registry.values()].map((preset) => ({
      name: preset.name,
      extraction_description: preset.extraction.description,
      retrieval_description: preset.retrieval.description
    }));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Writes
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Replace both strategies with a registered preset.
   * @throws UnknownPresetError
   */
  loadPreset(name: string): StrategySnapshot {
    const preset = this.registry.get(name);
    if (!preset) {
      throw new UnknownPresetError(name, [...this.registry.keys()]);
    }
    return this.commit({ extraction: preset.extraction, retrieval: preset.retrieval }, name);
  }

  /**
   * Deep-merge a partial tree into one strategy. Objects merge key-wise;
   * scalars and arrays replace. The active preset is cleared.
   * @throws StrategyValidationError when the merged tree is invalid
   */
  update(kind: StrategyKind, patch: unknown): StrategySnapshot {
    const current = this.snapshot;
    return this.replaceTree(kind, deepMerge(current[kind], patch));
  }

  /**
   * Swap one strategy for a complete new tree. The active preset is cleared.
   * @throws StrategyValidationError
   */
  replace(kind: StrategyKind, strategy: unknown): StrategySnapshot {
    return this.replaceTree(kind, strategy);
  }

  /**
   * Return to the default pair with no active preset.
   */
  reset(): StrategySnapshot {
    return this.commit(
      {
        extraction: parseStrategy(extractionStrategySchema, 'extraction', DEFAULT_EXTRACTION),
        retrieval: parseStrategy(retrievalStrategySchema, 'retrieval', DEFAULT_RETRIEVAL)
      },
      null
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════════

  private replaceTree(kind: StrategyKind, candidate: unknown): StrategySnapshot {
    const current = this.snapshot;
    const trees: StrategyTrees =
      kind === 'extraction'
        ? {
            extraction: parseStrategy(extractionStrategySchema, kind, candidate),
            retrieval: current.retrieval
          }
        : {
            extraction: current.extraction,
            retrieval: parseStrategy(retrievalStrategySchema, kind, candidate)
          };
    return this.commit(trees, null);
  }

  /** A write that changes nothing keeps the current snapshot and revision */
  private commit(trees: StrategyTrees, activePreset: string | null): StrategySnapshot {
    const current = this.snapshot;
    const unchanged =
      activePreset === current.active_preset &&
      JSON.stringify(trees.extraction) === JSON.stringify(current.extraction) &&
      JSON.stringify(trees.retrieval) === JSON.stringify(current.retrieval);
    if (unchanged) return current;

    this.snapshot = this.build(trees, activePreset, current.revision + 1);
    return this.snapshot;
  }

  private build(
    trees: StrategyTrees,
    activePreset: string | null,
    revision: number
  ): StrategySnapshot {
    return deepFreeze({
      extraction: trees.extraction,
      retrieval: trees.retrieval,
      active_preset: activePreset,
      revision
    });
  }
}
