import { describe, it } from "mocha";
import { expect } from "chai";
import path from "node:path";

import { DEFAULT_PATCH, loadCoachConfig } from "../../src/config/coachConfig.js";

const CWD = path.resolve("/srv/coach");

describe("coach configuration", () => {
  it("falls back to the documented defaults", () => {
    expect(loadCoachConfig({}, CWD)).to.deep.equal({
      defaultPatch: DEFAULT_PATCH,
      dataDir: path.resolve(CWD, "data/patches"),
      maxAttempts: 1,
      evidenceCap: 5,
      generationTimeoutMs: 15_000,
      summaryMaxSentences: 3,
      summaryMaxChars: 400,
      statTolerance: 0.05,
      signalWeight: 0.35,
      signalConcurrency: 4,
      logFile: null,
      logLevel: "info",
      logRedact: false,
    });
  });

  it("reads overrides and resolves paths against the working directory", () => {
    const config = loadCoachConfig(
      {
        COACH_DEFAULT_PATCH: "15.1",
        COACH_DATA_DIR: "fixtures/patches",
        COACH_MAX_ATTEMPTS: "3",
        COACH_EVIDENCE_CAP: "8",
        COACH_SIGNAL_WEIGHT: "0",
        COACH_LOG_FILE: "logs/coach.log",
        COACH_LOG_LEVEL: "DEBUG",
        COACH_LOG_REDACT: "yes",
      },
      CWD,
    );
    expect(config.defaultPatch).to.equal("15.1");
    expect(config.dataDir).to.equal(path.resolve(CWD, "fixtures/patches"));
    expect(config.maxAttempts).to.equal(3);
    expect(config.evidenceCap).to.equal(8);
    expect(config.signalWeight).to.equal(0);
    expect(config.logFile).to.equal(path.resolve(CWD, "logs/coach.log"));
    expect(config.logLevel).to.equal("debug");
    expect(config.logRedact).to.equal(true);
  });

  it("ignores values outside their bounds", () => {
    const config = loadCoachConfig(
      { COACH_MAX_ATTEMPTS: "9", COACH_EVIDENCE_CAP: "0", COACH_STAT_TOLERANCE: "-1", COACH_GENERATION_TIMEOUT_MS: "5" },
      CWD,
    );
    expect(config.maxAttempts).to.equal(1);
    expect(config.evidenceCap).to.equal(5);
    expect(config.statTolerance).to.equal(0.05);
    expect(config.generationTimeoutMs).to.equal(15_000);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadCoachConfig({}, CWD))).to.equal(true);
  });
});
