import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_OCTAVE, resolveConfig } from "../config.js";
import { UsageError } from "../errors.js";

describe("resolveConfig", () => {
  it("leaves render options to the library defaults", () => {
    assert.deepEqual(resolveConfig({}, {}), {
      render: { program: undefined, velocity: undefined, channel: undefined },
      octave: DEFAULT_OCTAVE,
      quiet: false
    });
  });

  it("reads MOIRA_* environment variables", () => {
    const config = resolveConfig(
      {},
      { MOIRA_PROGRAM: "40", MOIRA_VELOCITY: " 90 ", MOIRA_CHANNEL: "", MOIRA_QUIET: "1", HOME: "/tmp" }
    );
    assert.deepEqual(config.render, { program: 40, velocity: 90, channel: undefined });
    assert.strictEqual(config.quiet, true);
  });

  it("lets flags override the environment", () => {
    const config = resolveConfig(
      { program: "10", octave: "-1", quiet: false },
      { MOIRA_PROGRAM: "40", MOIRA_CHANNEL: "9", MOIRA_QUIET: "true" }
    );
    assert.deepEqual(config.render, { program: 10, velocity: undefined, channel: 9 });
    assert.strictEqual(config.octave, -1);
    assert.strictEqual(config.quiet, false);
  });

  it("treats only affirmative MOIRA_QUIET values as true", () => {
    assert.strictEqual(resolveConfig({}, { MOIRA_QUIET: "false" }).quiet, false);
    assert.strictEqual(resolveConfig({}, { MOIRA_QUIET: "0" }).quiet, false);
    assert.strictEqual(resolveConfig({}, { MOIRA_QUIET: "Yes" }).quiet, true);
  });

  it("rejects values that are not integers in range", () => {
    assert.throws(() => resolveConfig({}, { MOIRA_VELOCITY: "loud" }), {
      name: "UsageError",
      message: "MOIRA_VELOCITY should be an integer between 1 and 127"
    });
    assert.throws(() => resolveConfig({}, { MOIRA_CHANNEL: "16" }), {
      message: "MOIRA_CHANNEL should be an integer between 0 and 15"
    });
    assert.throws(() => resolveConfig({ octave: "10" }, {}), {
      message: "--octave should be an integer between -1 and 9"
    });
    assert.throws(() => resolveConfig({ channel: "1.5" }, {}), UsageError);
  });
});
