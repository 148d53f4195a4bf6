/**
 * Strategy Types
 */

import type { z } from 'zod';
import type {
  chunkTextMethods,
  extractionStrategySchema,
  keyTermMethods,
  retrievalStrategySchema,
  validationModes
} from './schemas';

/** Deep partial type for nested overrides */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type ExtractionStrategy = z.infer<typeof extractionStrategySchema>;
export type RetrievalStrategy = z.infer<typeof retrievalStrategySchema>;

export type ValidationMode = (typeof validationModes)[number];
export type KeyTermMethod = (typeof keyTermMethods)[number];
export type ChunkTextMethod = (typeof chunkTextMethods)[number];

export type StrategyKind = 'extraction' | 'retrieval';

export interface StrategyTrees {
  extraction: ExtractionStrategy;
  retrieval: RetrievalStrategy;
}

/**
 * Both strategies as one deep-frozen value. A reader keeps the snapshot it
 * took for the whole operation, whatever writes happen meanwhile.
 */
export interface StrategySnapshot {
  readonly extraction: ExtractionStrategy;
  readonly retrieval: RetrievalStrategy;
  /** Name of the preset the pair came from; null once edited */
  readonly active_preset: string | null;
  /** Increments on every write */
  readonly revision: number;
}

export interface PresetSummary {
  name: string;
  extraction_description: string;
  retrieval_description: string;
}

export interface StrategyPreset {
  name: string;
  extraction: ExtractionStrategy;
  retrieval: RetrievalStrategy;
}
