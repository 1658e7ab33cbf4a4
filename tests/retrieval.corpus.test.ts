import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DataCorruptError, PatchNotFoundError } from "../src/facts/loader.js";
import { createRequestContext } from "../src/pev/request.js";
import { buildEvidenceQuery, PatchGuideCorpus, StaticCorpus } from "../src/retrieval/corpus.js";
import { TEST_CORPUS } from "./helpers/fixtures.js";

describe("retrieval corpus", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "coach-corpus-"));
    await mkdir(join(dataDir, "14.99"));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  const request = (patch = "14.99") => createRequestContext({ patch, team: ["A"], opponents: ["F"] }, { defaultPatch: "14.99" });

  it("reads guides stored beside the patch facts", async () => {
    await writeFile(
      join(dataDir, "14.99", "guides.json"),
      JSON.stringify([
        { id: 7, topic: "poke", text: "Poke first." },
        { id: "g2", topic: "engage", text: "Engage second." },
      ]),
    );
    const documents = await new PatchGuideCorpus(dataDir).documents(request());
    expect(documents).to.deep.equal([
      { id: "7", topic: "poke", text: "Poke first." },
      { id: "g2", topic: "engage", text: "Engage second." },
    ]);
  });

  it("treats a missing guide file as an empty corpus", async () => {
    expect(await new PatchGuideCorpus(dataDir).documents(request())).to.deep.equal([]);
  });

  it("reports malformed guides as corrupt data", async () => {
    await writeFile(join(dataDir, "14.99", "guides.json"), JSON.stringify([{ id: "g1", topic: "poke" }]));
    let failure: unknown = null;
    try {
      await new PatchGuideCorpus(dataDir).documents(request());
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(DataCorruptError);
  });

  it("rejects patch identifiers that escape the data directory", async () => {
    let failure: unknown = null;
    try {
      await new PatchGuideCorpus(dataDir).documents(request("../etc"));
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(PatchNotFoundError);
  });

  it("serves a static corpus as given", async () => {
    const corpus = new StaticCorpus(TEST_CORPUS);
    expect(await corpus.documents()).to.deep.equal(TEST_CORPUS);
  });

  it("builds the query from question, focus and both compositions", () => {
    const context = createRequestContext(
      { mode: "ingame_qa", question: "how to beat Foxtrot", focus: "A", team: ["A", "B"], opponents: ["F", "G"] },
      { defaultPatch: "14.99" },
    );
    expect(buildEvidenceQuery(context)).to.equal("how to beat Foxtrot A A B F G");
  });
});
