import { describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readEnum,
  readInt,
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalString,
} from "../../src/config/env.js";

/**
 * Regression coverage for the environment helpers. Each reader receives an
 * explicit environment so the tests never mutate `process.env`.
 */
describe("config/env helpers", () => {
  it("parses boolean literals case-insensitively", () => {
    const env = { FLAG_ON: " Yes ", FLAG_OFF: "off", FLAG_ODD: "maybe", FLAG_BLANK: "  " };
    expect(readOptionalBool("FLAG_ON", env)).to.equal(true);
    expect(readOptionalBool("FLAG_OFF", env)).to.equal(false);
    expect(readOptionalBool("FLAG_ODD", env)).to.equal(undefined);
    expect(readOptionalBool("FLAG_BLANK", env)).to.equal(undefined);
    expect(readBool("FLAG_ODD", true, env)).to.equal(true);
    expect(readBool("FLAG_MISSING", false, env)).to.equal(false);
  });

  it("reads base-10 integers within bounds", () => {
    const env = { LIMIT: " 42 ", NEGATIVE: "-3", DECIMAL: "2.5", HUGE: "99999999999999999999", WORD: "ten" };
    expect(readOptionalInt("LIMIT", undefined, env)).to.equal(42);
    expect(readOptionalInt("NEGATIVE", undefined, env)).to.equal(-3);
    expect(readOptionalInt("NEGATIVE", { min: 0 }, env)).to.equal(undefined);
    expect(readOptionalInt("LIMIT", { max: 10 }, env)).to.equal(undefined);
    expect(readOptionalInt("DECIMAL", undefined, env)).to.equal(undefined);
    expect(readOptionalInt("HUGE", undefined, env)).to.equal(undefined);
    expect(readInt("WORD", 7, undefined, env)).to.equal(7);
    expect(readInt("LIMIT", 7, { min: 1 }, env)).to.equal(42);
  });

  it("trims strings and treats blank values as unset", () => {
    const env = { PATH_VALUE: "  /tmp/edit.log  ", EMPTY: "" };
    expect(readOptionalString("PATH_VALUE", env)).to.equal("/tmp/edit.log");
    expect(readOptionalString("EMPTY", env)).to.equal(undefined);
  });

  it("returns the canonical spelling of enum values", () => {
    const allowed = ["text", "json"] as const;
    const env = { FORMAT: "JSON", OTHER: "yaml" };
    expect(readOptionalEnum("FORMAT", allowed, env)).to.equal("json");
    expect(readOptionalEnum("OTHER", allowed, env)).to.equal(undefined);
    expect(readEnum("OTHER", allowed, "text", env)).to.equal("text");
  });
});
