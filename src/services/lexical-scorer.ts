// Lexical-overlap ranking used when no query vector is available.
// Scores are distinct shared terms, so they are tagged 'lexical' and never
// compared with cosine similarities.
import type { CatalogRecord, RankedCandidate } from '@/types/catalog';
import { catalogRecordToText } from '@/services/providers/catalog/catalog-provider';
import { sharedTermCount, tokenize } from '@/services/providers/retrieval-vector-utils';

export class LexicalScorer {
  private readonly docTokens: readonly string[][];

  constructor(private readonly records: readonly CatalogRecord[]) {
    this.docTokens = records.map((r) => tokenize(catalogRecordToText(r)));
  }

  /** Top `n` records by shared-term count; ties keep catalog order. */
  topN(queryText: string, n: number): RankedCandidate[] {
    const limit = Math.max(0, Math.min(Math.floor(n), this.records.length));
    if (limit === 0) return [];

    const queryTokens = tokenize(queryText);
    const scored = this.docTokens.map((tokens, position) => ({
      position,
      sharedTerms: sharedTermCount(queryTokens, tokens),
    }));
    scored.sort((a, b) => b.sharedTerms - a.sharedTerms);

    return scored.slice(0, limit).map((s, rank): RankedCandidate => ({
      record: this.records[s.position],
      rank,
      score: { kind: 'lexical', sharedTerms: s.sharedTerms },
    }));
  }
}
