import { describe, it, expect } from "vitest";
import {
  buildCondensedPrompt,
  buildMinimalPrompt,
  classifyPromptKind,
  extractCodeBlocks,
  extractEntityName,
} from "../../core/prompts/condense.js";

describe("extractCodeBlocks", () => {
  it("should return the trimmed contents of each fenced block", () => {
    const text = "intro\n```python\n  def a():\n    pass\n```\nmiddle\n```\nx = 1\n```";
    expect(extractCodeBlocks(text)).toEqual(["def a():\n    pass", "x = 1"]);
  });

  it("should return nothing without fences", () => {
    expect(extractCodeBlocks("no code here")).toEqual([]);
  });
});

describe("classifyPromptKind", () => {
  it("should prefer class over function", () => {
    expect(classifyPromptKind("class A:\n    def b(self): ...")).toBe("class");
  });

  it("should recognise functions by keyword or def", () => {
    expect(classifyPromptKind("Describe this function")).toBe("function");
    expect(classifyPromptKind("def run():")).toBe("function");
  });

  it("should fall back through variable and module to code", () => {
    expect(classifyPromptKind("A Variable")).toBe("variable");
    expect(classifyPromptKind("this module")).toBe("module");
    expect(classifyPromptKind("x = 1")).toBe("code");
  });
});

describe("extractEntityName", () => {
  it("should prefer a labelled name line", () => {
    expect(extractEntityName("Class Name: Policy \nclass Other:")).toBe("Policy");
  });

  it("should not take a name parameter in the code for the label", () => {
    const prompt = "```\nclass Policy:\n    def __init__(self, name):\n        self.name = name\n```\nClass Name: Policy";
    expect(extractEntityName(prompt)).toBe("Policy");
    expect(extractEntityName("```\ndef greet(name: str):\n    return name\n```")).toBe("greet");
    expect(extractEntityName("```\nclass Person:\n    name: str\n```")).toBe("Person");
  });

  it("should use the first class or def otherwise", () => {
    expect(extractEntityName("```\nclass Policy(Base):\n```")).toBe("Policy");
    expect(extractEntityName("```\ndef run(x):\n```")).toBe("run");
  });

  it("should fall back to the kind", () => {
    expect(extractEntityName("x = 1")).toBe("code");
  });
});

describe("buildCondensedPrompt", () => {
  it("should keep only the kind, name and first code block", () => {
    const original = "Function Name: premium\n```\ndef premium():\n    return 1\n```\n```\nignored\n```\nLong context...";
    const condensed = buildCondensedPrompt(original);

    expect(condensed.kind).toBe("function");
    expect(condensed.name).toBe("premium");
    expect(condensed.prompt).toBe(
      [
        "Generate documentation for this function: premium",
        "",
        "Here's the essential part of the code:",
        "",
        "```",
        "def premium():\n    return 1",
        "```",
        "",
        "Provide a concise explanation of its purpose and behaviour.",
      ].join("\n"),
    );
  });

  it("should embed the whole prompt when there is no code block", () => {
    const condensed = buildCondensedPrompt("rate = 3");
    expect(condensed.prompt).toContain("```\nrate = 3\n```");
    expect(condensed.kind).toBe("code");
  });
});

describe("buildMinimalPrompt", () => {
  it("should name the kind and entity", () => {
    expect(buildMinimalPrompt("class", "Policy")).toBe("Briefly describe a class named Policy.");
  });
});
