import { describe, it } from "mocha";
import { expect } from "chai";

import { CachedFactsLoader } from "../src/facts/cache.js";
import type { FactsLoader } from "../src/facts/loader.js";
import type { FactSet } from "../src/facts/types.js";
import { testFacts } from "./helpers/fixtures.js";

/** Loader whose results are settled by the test. */
class DeferredLoader implements FactsLoader {
  public readonly calls: string[] = [];
  private readonly pending = new Map<string, { resolve: (facts: FactSet) => void; reject: (error: Error) => void }>();

  load(patch: string): Promise<FactSet> {
    this.calls.push(patch);
    return new Promise<FactSet>((resolve, reject) => {
      this.pending.set(patch, { resolve, reject });
    });
  }

  resolve(patch: string): void {
    this.pending.get(patch)?.resolve(testFacts(patch));
  }

  reject(patch: string, error: Error): void {
    this.pending.get(patch)?.reject(error);
  }
}

describe("cached facts loader", () => {
  it("shares one load between concurrent callers", async () => {
    const inner = new DeferredLoader();
    const cache = new CachedFactsLoader(inner);

    const first = cache.load("14.99");
    const second = cache.load("14.99");
    inner.resolve("14.99");

    expect(await first).to.equal(await second);
    expect(inner.calls).to.deep.equal(["14.99"]);
    expect(cache.stats()).to.include({ hits: 1, misses: 1, size: 1 });
  });

  it("evicts the least recently used patch", async () => {
    const inner = new DeferredLoader();
    const cache = new CachedFactsLoader(inner, 2);

    for (const patch of ["a", "b"]) {
      const pending = cache.load(patch);
      inner.resolve(patch);
      await pending;
    }
    await cache.load("a");
    const pending = cache.load("c");
    inner.resolve("c");
    await pending;

    expect(cache.stats()).to.include({ size: 2, evictions: 1 });
    const reload = cache.load("b");
    inner.resolve("b");
    await reload;
    expect(inner.calls).to.deep.equal(["a", "b", "c", "b"]);
  });

  it("forgets failed loads so the next call retries", async () => {
    const inner = new DeferredLoader();
    const cache = new CachedFactsLoader(inner);

    const failing = cache.load("x");
    inner.reject("x", new Error("disk unavailable"));
    let failure: unknown = null;
    try {
      await failing;
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(Error);

    const retry = cache.load("x");
    inner.resolve("x");
    expect((await retry).patch).to.equal("x");
    expect(inner.calls).to.deep.equal(["x", "x"]);
  });

  it("lets one caller stop waiting without cancelling the shared load", async () => {
    const inner = new DeferredLoader();
    const cache = new CachedFactsLoader(inner);
    const controller = new AbortController();

    const abandoned = cache.load("14.99", controller.signal);
    const kept = cache.load("14.99");
    controller.abort(new Error("caller left"));
    inner.resolve("14.99");

    let failure: unknown = null;
    try {
      await abandoned;
    } catch (error) {
      failure = error;
    }
    expect(failure instanceof Error ? failure.message : null).to.equal("caller left");
    expect((await kept).patch).to.equal("14.99");
  });

  it("rejects non-positive capacities", () => {
    expect(() => new CachedFactsLoader(new DeferredLoader(), 0)).to.throw(/positive integer/);
  });
});
