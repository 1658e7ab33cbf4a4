/**
 * Lexical relevance ranking over a small corpus of guide snippets. Scores are
 * computed with Okapi BM25 using the non-negative inverse document frequency
 * popularised by Lucene, so a term present in every document still counts a
 * little instead of dragging the score below zero.
 */

/** A candidate passage before ranking. */
export interface CorpusDocument {
  readonly id: string;
  /** Provenance tag: the entity or topic the passage concerns. */
  readonly topic: string;
  readonly text: string;
}

/** A ranked passage kept as evidence for a run. */
export interface EvidenceSnippet extends CorpusDocument {
  readonly score: number;
}

export interface Bm25Parameters {
  /** Term-frequency saturation. */
  readonly k1: number;
  /** Length normalisation strength in [0, 1]. */
  readonly b: number;
}

export const DEFAULT_BM25: Bm25Parameters = { k1: 1.2, b: 0.75 };

/** Hard bounds applied to `k` so a misconfigured caller cannot request huge slices. */
const MIN_K = 0;
const MAX_K = 50;

/** Lowercases and splits text into Unicode letter/number runs. */
export function tokenise(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function clampK(k: number): number {
  if (!Number.isFinite(k)) {
    return MIN_K;
  }
  return Math.min(MAX_K, Math.max(MIN_K, Math.floor(k)));
}

/** Keeps the first document of every identifier, preserving corpus order. */
function dedupeById(corpus: readonly CorpusDocument[]): CorpusDocument[] {
  const seen = new Set<string>();
  const unique: CorpusDocument[] = [];
  for (const document of corpus) {
    if (seen.has(document.id)) {
      continue;
    }
    seen.add(document.id);
    unique.push(document);
  }
  return unique;
}

/**
 * Scores every document of `corpus` against `query`. The returned array is
 * aligned with the input order.
 */
export function scoreDocuments(
  query: string,
  corpus: readonly CorpusDocument[],
  parameters: Bm25Parameters = DEFAULT_BM25,
): number[] {
  const documents = corpus.map((document) => tokenise(`${document.topic} ${document.text}`));
  const queryTerms = Array.from(new Set(tokenise(query)));
  if (documents.length === 0 || queryTerms.length === 0) {
    return documents.map(() => 0);
  }

  const documentCount = documents.length;
  const averageLength = documents.reduce((total, tokens) => total + tokens.length, 0) / documentCount;
  const frequencies = documents.map((tokens) => {
    const counts = new Map<string, number>();
    for (const token of tokens) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
  });

  const idf = new Map<string, number>();
  for (const term of queryTerms) {
    const containing = frequencies.reduce((total, counts) => total + (counts.has(term) ? 1 : 0), 0);
    idf.set(term, Math.log(1 + (documentCount - containing + 0.5) / (containing + 0.5)));
  }

  const { k1, b } = parameters;
  return frequencies.map((counts, index) => {
    const length = documents[index]?.length ?? 0;
    const norm = averageLength > 0 ? 1 - b + (b * length) / averageLength : 1;
    let score = 0;
    for (const term of queryTerms) {
      const tf = counts.get(term) ?? 0;
      if (tf === 0) {
        continue;
      }
      score += (idf.get(term) ?? 0) * ((tf * (k1 + 1)) / (tf + k1 * norm));
    }
    return score;
  });
}

/**
 * Ranks `corpus` against `query` and keeps the top `k` snippets. Equal scores
 * keep their corpus order, so a query matching nothing returns the corpus
 * prefix. Duplicated identifiers are dropped before scoring.
 */
export function rank(
  query: string,
  corpus: readonly CorpusDocument[],
  k: number,
  parameters: Bm25Parameters = DEFAULT_BM25,
): EvidenceSnippet[] {
  const limit = clampK(k);
  const unique = dedupeById(corpus);
  if (unique.length === 0 || limit === 0) {
    return [];
  }

  const scores = scoreDocuments(query, unique, parameters);
  const ranked = unique.map((document, position) => ({ document, position, score: scores[position] ?? 0 }));
  ranked.sort((left, right) => right.score - left.score || left.position - right.position);

  return ranked.slice(0, limit).map(({ document, score }) => ({
    id: document.id,
    topic: document.topic,
    text: document.text,
    score: roundScore(score),
  }));
}

/** Rounds to four decimals so serialised results stay stable across platforms. */
function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}
