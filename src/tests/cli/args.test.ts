import { describe, it, expect } from "vitest";
import { parseArgs } from "../../cli/args.js";
import { ConfigError } from "../../core/errors/index.js";

describe("parseArgs", () => {
  it("should default to no options", () => {
    expect(parseArgs([])).toEqual({ verbose: false, help: false });
  });

  it("should accept separate and inline values", () => {
    expect(parseArgs(["--input", "src", "--format=html", "--backend", "mock", "--verbose"])).toEqual({
      input: "src",
      format: "html",
      backend: "mock",
      verbose: true,
      help: false,
    });
  });

  it("should keep '=' inside inline values", () => {
    expect(parseArgs(["--model=models/a=b.gguf"]).model).toBe("models/a=b.gguf");
  });

  it("should recognise --help", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("should reject unknown options", () => {
    expect(() => parseArgs(["--colour", "red"])).toThrow(ConfigError);
    expect(() => parseArgs(["--colour", "red"])).toThrow("Unknown option: --colour");
  });

  it("should reject a missing value", () => {
    expect(() => parseArgs(["--input"])).toThrow("Option --input needs a value");
    expect(() => parseArgs(["--input", "--verbose"])).toThrow("Option --input needs a value");
  });

  it("should reject positional arguments", () => {
    expect(() => parseArgs(["src"])).toThrow("Unexpected argument: src");
  });
});
