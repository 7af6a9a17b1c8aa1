import { describe, it, expect } from "vitest";
import { MockBackend } from "../../providers/mock-backend.js";
import { generationConfig } from "../helpers/fakes.js";

describe("MockBackend", () => {
  const config = generationConfig();

  it("should always be loaded", async () => {
    const mock = new MockBackend();
    expect(mock.isLoaded).toBe(true);
    expect(await mock.load()).toBe(true);
  });

  it("should describe the subject by kind and name", async () => {
    const text = await new MockBackend().generate("ignored", config, { kind: "variable", name: "premium" });
    expect(text).toBe(
      "The variable `premium` stores the premium value.\n\nIt holds configuration or state read by the surrounding code.",
    );
  });

  it("should humanize camelCase and snake_case names", async () => {
    const mock = new MockBackend();
    const camel = await mock.generate("", config, { kind: "function", name: "calculateBasicPremium" });
    const snake = await mock.generate("", config, { kind: "function", name: "calculate_basic_premium" });

    expect(camel.split("\n")[0]).toBe("The function `calculateBasicPremium` performs the calculate basic premium operation.");
    expect(snake.split("\n")[0]).toBe("The function `calculate_basic_premium` performs the calculate basic premium operation.");
  });

  it("should fall back to the prompt text without a subject", async () => {
    const text = await new MockBackend().generate("Document this.\n```\nclass Policy:\n    pass\n```", config);
    expect(text.split("\n")[0]).toBe("The class `Policy` groups the state and behaviour related to policy.");
  });

  it("should be deterministic", async () => {
    const mock = new MockBackend();
    const subject = { kind: "module" as const, name: "rates" };
    expect(await mock.generate("a", config, subject)).toBe(await mock.generate("b", config, subject));
  });
});
