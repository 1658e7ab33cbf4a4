import { describe, it } from "mocha";
import { expect } from "chai";

import { PevCancelledError } from "../src/pev/errors.js";
import { PevOrchestrator } from "../src/pev/orchestrator.js";
import { createRequestContext } from "../src/pev/request.js";
import { StaticCorpus } from "../src/retrieval/corpus.js";
import {
  ScriptedGenerator,
  StubFactsLoader,
  TEST_CORPUS,
  TEST_PATCH,
  TEST_SETTINGS,
  validDraft,
} from "./helpers/fixtures.js";

const REQUEST = createRequestContext({ team: ["A"], opponents: ["F", "H"] }, { defaultPatch: TEST_PATCH });

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return null;
}

function build(generator: ScriptedGenerator, facts = new StubFactsLoader()): PevOrchestrator {
  return new PevOrchestrator({ facts, corpus: new StaticCorpus(TEST_CORPUS), generator, config: TEST_SETTINGS });
}

describe("pev cancellation", () => {
  it("rejects before touching collaborators when already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("client went away"));
    const facts = new StubFactsLoader();
    const generator = ScriptedGenerator.returning(validDraft());

    const error = await rejection(build(generator, facts).run(REQUEST, { signal: controller.signal }));

    expect(error).to.be.instanceOf(PevCancelledError);
    if (error instanceof PevCancelledError) {
      expect(error.code).to.equal("E-PEV-CANCELLED");
      expect(error.details).to.deep.equal({ phase: "init", reason: "client went away" });
    }
    expect(facts.calls).to.deep.equal([]);
    expect(generator.inputs).to.have.length(0);
  });

  it("aborts an in-flight generation and propagates cancellation", async () => {
    const controller = new AbortController();
    const seen: AbortSignal[] = [];
    const generator = new ScriptedGenerator([
      (_input, signal) => {
        seen.push(signal);
        controller.abort(new Error("stop"));
        return new Promise<unknown>(() => undefined);
      },
    ]);

    const error = await rejection(build(generator).run(REQUEST, { signal: controller.signal }));

    expect(error).to.be.instanceOf(PevCancelledError);
    if (error instanceof PevCancelledError) {
      expect(error.details).to.deep.equal({ phase: "scored", reason: "stop" });
    }
    expect(seen[0]?.aborted).to.equal(true);
  });

  it("checks cancellation before every transition", async () => {
    const controller = new AbortController();
    const generator = ScriptedGenerator.returning(validDraft({ summary: "One. Two. Three. Four." }));

    const error = await rejection(
      build(generator).run(REQUEST, {
        signal: controller.signal,
        onTransition: (transition) => {
          if (transition.to === "validated") {
            controller.abort("deadline");
          }
        },
      }),
    );

    expect(error).to.be.instanceOf(PevCancelledError);
    if (error instanceof PevCancelledError) {
      expect(error.details).to.deep.equal({ phase: "validated", reason: "deadline" });
    }
    expect(generator.inputs).to.have.length(1);
  });
});
