import { METRIC_DEFINITIONS } from './metric-definitions.js';
import type { Metric, RawFact } from '../core/types.js';

/**
 * Fact Mapper: classifies each raw fact's concept name into at most one
 * tracked metric. Pure classification, no numeric work.
 */

interface ConceptEntry {
  metric: Metric;
  /** Position in the metric's synonym list (0 = preferred) */
  rank: number;
}

/** concept -> owning metric, built once; earlier metrics claim shared concepts */
const CONCEPT_INDEX: ReadonlyMap<string, ConceptEntry> = (() => {
  const index = new Map<string, ConceptEntry>();
  for (const def of METRIC_DEFINITIONS) {
    def.concepts.forEach((concept, rank) => {
      if (!index.has(concept)) index.set(concept, { metric: def.id, rank });
    });
  }
  return index;
})();

/** The metric a concept name denotes, if it's tracked */
export function metricForConcept(conceptName: string): Metric | undefined {
  return CONCEPT_INDEX.get(conceptName)?.metric;
}

/**
 * Synonym rank of a concept within a metric (lower = preferred).
 * Concepts the metric doesn't own rank last.
 */
export function conceptPriority(metric: Metric, conceptName: string): number {
  const entry = CONCEPT_INDEX.get(conceptName);
  return entry && entry.metric === metric ? entry.rank : Number.MAX_SAFE_INTEGER;
}

/**
 * Group facts by the metric they denote.
 * Unmapped concepts are dropped; input order is kept within each metric.
 */
export function mapFacts(facts: readonly RawFact[]): Map<Metric, RawFact[]> {
  const mapped = new Map<Metric, RawFact[]>();

  for (const fact of facts) {
    const metric = metricForConcept(fact.concept_name);
    if (!metric) continue;

    const bucket = mapped.get(metric);
    if (bucket) bucket.push(fact);
    else mapped.set(metric, [fact]);
  }

  return mapped;
}
