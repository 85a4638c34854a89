/**
 * Stage Registry — the fixed, ordered stage set of a data pipeline.
 *
 * Adding or removing a stage type is a change here, not in the status
 * protocol. Names are written exactly as listed; callers that pass
 * `data_generation`-style names are matched through `normalizeStageName`
 * at lookup time.
 */

import type { StageDefinition } from '../types/index.js';

export const STAGE_NAMES = {
  GENERATION: 'Data Generation',
  INGESTION: 'Data Ingestion',
  PROCESSING: 'Spark Processing',
  TRANSFORMATION: 'DBT Transformation',
  EXPORT: 'Data Export',
} as const;

export type StageName = (typeof STAGE_NAMES)[keyof typeof STAGE_NAMES];

const ORDER: readonly StageName[] = [
  STAGE_NAMES.GENERATION,
  STAGE_NAMES.INGESTION,
  STAGE_NAMES.PROCESSING,
  STAGE_NAMES.TRANSFORMATION,
  STAGE_NAMES.EXPORT,
];

export function defaultStages(): StageDefinition[] {
  return ORDER.map(name => ({ name, description: `Pipeline stage: ${name}` }));
}

/**
 * `data_generation` → `Data Generation`, `  spark   processing ` → `Spark Processing`.
 */
export function normalizeStageName(raw: string): string {
  return raw
    .replace(/_/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
