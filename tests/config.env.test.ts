import { describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readEnum,
  readInt,
  readList,
  readOptionalBool,
  readOptionalInt,
  readString,
} from "../src/config/env.js";

describe("config/env", () => {
  it("reads booleans from the usual literals and ignores the rest", () => {
    const source = { A: "YES", B: " off ", C: "maybe", D: "" };
    expect(readBool(source, "A", false)).to.equal(true);
    expect(readBool(source, "B", true)).to.equal(false);
    expect(readBool(source, "C", true)).to.equal(true);
    expect(readOptionalBool(source, "D")).to.equal(undefined);
    expect(readOptionalBool(source, "MISSING")).to.equal(undefined);
  });

  it("reads integers within bounds", () => {
    const source = { PORT: " 5432 ", BIG: "99999999999999999999", NEG: "-3", TEXT: "12abc" };
    expect(readInt(source, "PORT", 1, { min: 1, max: 65535 })).to.equal(5432);
    expect(readOptionalInt(source, "BIG")).to.equal(undefined);
    expect(readInt(source, "NEG", 4, { min: 1 })).to.equal(4);
    expect(readInt(source, "TEXT", 7)).to.equal(7);
  });

  it("treats blank strings as unset", () => {
    expect(readString({ NAME: "   " }, "NAME", "fallback")).to.equal("fallback");
    expect(readString({ NAME: "  value " }, "NAME", "fallback")).to.equal("value");
  });

  it("splits lists and drops duplicates in order", () => {
    expect(readList({ FIELDS: "customfield_1, customfield_2,,customfield_1" }, "FIELDS")).to.deep.equal([
      "customfield_1",
      "customfield_2",
    ]);
    expect(readList({}, "FIELDS")).to.deep.equal([]);
  });

  it("returns the canonical enum literal regardless of case", () => {
    const levels = ["debug", "info", "warn", "error"] as const;
    expect(readEnum({ LEVEL: "WARN" }, "LEVEL", levels, "info")).to.equal("warn");
    expect(readEnum({ LEVEL: "loud" }, "LEVEL", levels, "info")).to.equal("info");
  });
});
