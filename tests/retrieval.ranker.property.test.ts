import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { rank, type CorpusDocument } from "../src/retrieval/ranker.js";

/** Property-based coverage of the ranking contract over random small corpora. */
describe("retrieval ranker (property-based)", () => {
  const vocabulary = ["heal", "armor", "poke", "dive", "burst", "tank", "relic", "engage"];
  const textArb = fc.array(fc.constantFrom(...vocabulary), { maxLength: 8 }).map((words) => words.join(" "));
  const corpusArb: fc.Arbitrary<CorpusDocument[]> = fc.array(
    fc.record({
      id: fc.constantFrom("a", "b", "c", "d", "e", "f", "g"),
      topic: fc.constantFrom(...vocabulary),
      text: textArb,
    }),
    { maxLength: 10 },
  );
  const kArb = fc.integer({ min: 0, max: 10 });

  it("returns min(k, unique documents) snippets without duplicates", () => {
    fc.assert(
      fc.property(textArb, corpusArb, kArb, (query, corpus, k) => {
        const ranked = rank(query, corpus, k);
        const unique = new Set(corpus.map((document) => document.id));
        expect(ranked).to.have.length(Math.min(k, unique.size));
        expect(new Set(ranked.map((snippet) => snippet.id)).size).to.equal(ranked.length);
      }),
    );
  });

  it("orders scores non-increasingly", () => {
    fc.assert(
      fc.property(textArb, corpusArb, kArb, (query, corpus, k) => {
        const scores = rank(query, corpus, k).map((snippet) => snippet.score);
        for (let index = 1; index < scores.length; index += 1) {
          expect(scores[index]).to.be.at.most(scores[index - 1] ?? Number.POSITIVE_INFINITY);
        }
        expect(scores.every((score) => score >= 0)).to.equal(true);
      }),
    );
  });

  it("is deterministic for identical inputs", () => {
    fc.assert(
      fc.property(textArb, corpusArb, kArb, (query, corpus, k) => {
        expect(JSON.stringify(rank(query, corpus, k))).to.equal(JSON.stringify(rank(query, corpus, k)));
      }),
    );
  });
});
