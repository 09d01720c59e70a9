// test/cli/chefscript.spec.ts
// Tests for the chefscript command's argument handling

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  summarizeProgram,
} from "../../bin/chefscript-cli-lib";
import { buildProgram } from "../../src/core/program/build";
import { parseRecipes } from "../../src/core/reader/parse";
import { programText } from "../helpers/recipes";

describe("chefscript CLI", () => {
  describe("argument parsing", () => {
    it("parses help and version flags in both spellings", () => {
      expect(parseCliArgs(["-h"]).help).toBe(true);
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
      expect(parseCliArgs(["--version"]).version).toBe(true);
    });

    it("parses a file, inline code and input", () => {
      const parsed = parseCliArgs(["-e", "Soup.", "--input", "1 2", "soup.chef", "other.chef"]);
      expect(parsed.eval).toBe("Soup.");
      expect(parsed.input).toBe("1 2");
      expect(parsed.file).toBe("soup.chef");
      expect(parsed.errors).toEqual([]);
    });

    it("parses numeric options", () => {
      const parsed = parseCliArgs(["--seed", "42", "--max-steps", "1000"]);
      expect(parsed.seed).toBe(42);
      expect(parsed.maxSteps).toBe(1000);
    });

    it("collects errors for bad values and unknown options", () => {
      const parsed = parseCliArgs(["--seed", "many", "--frobnicate", "--max-steps"]);
      expect(parsed.errors).toEqual([
        '--seed expects an integer, got "many"',
        "Unknown option: --frobnicate",
        "--max-steps expects an integer, got nothing",
      ]);
    });

    it("parses the switches", () => {
      const parsed = parseCliArgs(["--check", "--trace", "--verbose", "-c", "chef.yml"]);
      expect(parsed).toMatchObject({ check: true, trace: true, verbose: true, config: "chef.yml" });
    });
  });

  describe("mode detection", () => {
    it("prefers check over print over run", () => {
      expect(detectMode({})).toBe("run");
      expect(detectMode({ print: true })).toBe("print");
      expect(detectMode({ check: true, print: true })).toBe("check");
    });
  });

  describe("configuration building", () => {
    it("turns flags into overrides", () => {
      const config = buildConfig(parseCliArgs(["--seed", "5", "--trace", "-i", "3", "cake.chef"]));
      expect(config).toEqual({
        mode: "run",
        verbose: false,
        trace: true,
        file: "cake.chef",
        input: "3",
        overrides: { runtime: { seed: 5 } },
      });
    });

    it("leaves overrides empty without numeric flags", () => {
      expect(buildConfig(parseCliArgs(["--print", "x.chef"])).overrides).toEqual({ runtime: {} });
    });
  });

  describe("help and version", () => {
    it("lists every option", () => {
      const help = getHelpText();
      for (const flag of ["--help", "--version", "--eval", "--input", "--seed", "--max-steps", "--config", "--check", "--print", "--trace", "--verbose"]) {
        expect(help).toContain(flag);
      }
    });

    it("reports the package version", () => {
      expect(getVersion()).toBe("chefscript v0.1.0");
    });
  });

  describe("summaries", () => {
    it("describes each recipe", () => {
      const parsed = parseRecipes(
        programText(
          {
            title: "Main",
            ingredients: ["3 g n", "1 g x"],
            method: ["Heat the n.", "Put x into the mixing bowl.", "Heat the n until heated."],
            serves: 1,
          },
          { title: "Helper", method: ["Refrigerate."] }
        )
      );
      expect(summarizeProgram(parsed, buildProgram(parsed))).toEqual([
        "Main (main): 2 ingredients, 4 instructions, 1 loops, serves 1",
        "Helper (auxiliary): 0 ingredients, 1 instructions, 0 loops",
      ]);
    });
  });
});
