import { describe, it } from "mocha";
import { expect } from "chai";

import { IllegalTransitionError } from "../src/pev/errors.js";
import { createRequestContext } from "../src/pev/request.js";
import { advance, canTransition, createRunState } from "../src/pev/state.js";

const REQUEST = createRequestContext({ opponents: ["F"] }, { defaultPatch: "14.99" });

describe("pev state machine", () => {
  it("follows the pipeline edges and records every transition", () => {
    const state = createRunState(REQUEST);
    for (const phase of ["facts_loaded", "evidence_gathered", "scored", "drafted", "validated"] as const) {
      advance(state, phase);
    }
    state.attempts = 1;
    advance(state, "final");

    expect(state.phase).to.equal("final");
    expect(state.terminal).to.equal(true);
    expect(state.history).to.have.length(6);
    expect(state.history[5]).to.deep.equal({ from: "validated", to: "final", attempt: 1 });
  });

  it("only loops back to drafting through refining", () => {
    expect(canTransition("validated", "refining")).to.equal(true);
    expect(canTransition("refining", "drafted")).to.equal(true);
    expect(canTransition("validated", "drafted")).to.equal(false);
    expect(canTransition("scored", "final")).to.equal(false);
  });

  it("rejects skipped phases and moves out of final", () => {
    const state = createRunState(REQUEST);
    expect(() => advance(state, "scored")).to.throw(IllegalTransitionError, "illegal transition init -> scored");

    for (const phase of ["facts_loaded", "evidence_gathered", "scored", "drafted", "validated", "final"] as const) {
      advance(state, phase);
    }
    expect(() => advance(state, "refining")).to.throw(IllegalTransitionError);
    expect(state.history).to.have.length(6);
  });
});
