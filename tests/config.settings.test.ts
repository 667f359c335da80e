import { expect } from "chai";

import { readEnum, readInt, readOptionalInt, readOptionalString } from "../src/config/env.js";
import { DEFAULT_SETTINGS, loadSettings } from "../src/config/settings.js";

const KEYS = [
  "DIGRAPH_TEST_VALUE",
  "DIGRAPH_MAX_WEIGHT",
  "DIGRAPH_ECCENTRICITY_CACHE_SIZE",
  "DIGRAPH_RANDOM_SEED",
  "DIGRAPH_LOG_LEVEL",
];

describe("configuration", () => {
  afterEach(() => {
    for (const key of KEYS) {
      delete process.env[key];
    }
  });

  describe("environment readers", () => {
    it("parses base-10 integers within bounds", () => {
      process.env.DIGRAPH_TEST_VALUE = " 42 ";
      expect(readOptionalInt("DIGRAPH_TEST_VALUE")).to.equal(42);
      expect(readInt("DIGRAPH_TEST_VALUE", 7, { max: 10 })).to.equal(7);

      process.env.DIGRAPH_TEST_VALUE = "4.2";
      expect(readInt("DIGRAPH_TEST_VALUE", 7)).to.equal(7);

      process.env.DIGRAPH_TEST_VALUE = "-3";
      expect(readInt("DIGRAPH_TEST_VALUE", 7, { min: 1 })).to.equal(7);
      expect(readOptionalInt("DIGRAPH_TEST_VALUE")).to.equal(-3);
    });

    it("treats blank strings as unset", () => {
      process.env.DIGRAPH_TEST_VALUE = "   ";
      expect(readOptionalString("DIGRAPH_TEST_VALUE")).to.equal(undefined);
      expect(readOptionalInt("DIGRAPH_TEST_VALUE")).to.equal(undefined);
    });

    it("matches enum literals case-insensitively", () => {
      process.env.DIGRAPH_TEST_VALUE = "WARN";
      expect(readEnum("DIGRAPH_TEST_VALUE", ["info", "warn"] as const, "info")).to.equal("warn");

      process.env.DIGRAPH_TEST_VALUE = "verbose";
      expect(readEnum("DIGRAPH_TEST_VALUE", ["info", "warn"] as const, "info")).to.equal("info");
    });
  });

  describe("loadSettings", () => {
    it("returns the defaults when nothing is configured", () => {
      expect(loadSettings()).to.deep.equal(DEFAULT_SETTINGS);
    });

    it("reads overrides and ignores invalid values", () => {
      process.env.DIGRAPH_MAX_WEIGHT = "10";
      process.env.DIGRAPH_ECCENTRICITY_CACHE_SIZE = "0";
      process.env.DIGRAPH_RANDOM_SEED = " seed-1 ";
      process.env.DIGRAPH_LOG_LEVEL = "Debug";

      expect(loadSettings()).to.deep.equal({
        maxWeight: 10,
        cacheCapacity: 512,
        randomSeed: "seed-1",
        logLevel: "debug",
      });
    });
  });
});
