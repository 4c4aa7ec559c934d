import { describe, it } from "mocha";
import { expect } from "chai";

import { DEFAULT_MAX_INPUT_LENGTH, loadRuntimeSettings } from "../../src/config/settings.js";

describe("config/settings", () => {
  it("falls back to defaults when nothing is configured", () => {
    expect(loadRuntimeSettings({})).to.deep.equal({
      maxInputLength: DEFAULT_MAX_INPUT_LENGTH,
      logFile: null,
      traceComputations: false,
      outputFormat: "text",
    });
  });

  it("reads every EDIT_DISTANCE_* variable", () => {
    const settings = loadRuntimeSettings({
      EDIT_DISTANCE_MAX_INPUT_LENGTH: "256",
      EDIT_DISTANCE_LOG_FILE: " /tmp/edit-distance.log ",
      EDIT_DISTANCE_TRACE: "true",
      EDIT_DISTANCE_OUTPUT_FORMAT: "Json",
    });
    expect(settings).to.deep.equal({
      maxInputLength: 256,
      logFile: "/tmp/edit-distance.log",
      traceComputations: true,
      outputFormat: "json",
    });
  });

  it("ignores limits below one and unknown formats", () => {
    const settings = loadRuntimeSettings({
      EDIT_DISTANCE_MAX_INPUT_LENGTH: "0",
      EDIT_DISTANCE_OUTPUT_FORMAT: "yaml",
    });
    expect(settings.maxInputLength).to.equal(DEFAULT_MAX_INPUT_LENGTH);
    expect(settings.outputFormat).to.equal("text");
  });
});
