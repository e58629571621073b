/** Free text from the oracle, or the structured object it returned. */
export type Insight = string | Record<string, unknown>;

/** Which path produced the labels of an enriched record. */
export type ClassificationSource = 'oracle' | 'rules';

/**
 * Outcome of asking the oracle about a single record.
 * `fallback` means the call itself failed and the rules must label the record.
 */
export type OracleOutcome<T> =
  | { readonly kind: 'classified'; readonly result: T }
  | { readonly kind: 'fallback'; readonly reason: string };

export interface EnrichmentFields {
  readonly insights: Insight;
  readonly confidence: number | null;
  readonly classificationSource: ClassificationSource;
  readonly processedAt: Date;
}
