import { describe, it, expect } from "vitest";
import { isPromptVariant, renderReadme, renderSystemPrompt, rulesChecklist } from "../prompts/index.js";
import { RULES } from "../pipeline/rules.js";

describe("prompts", () => {
  it("recognises the prompt variants", () => {
    expect(isPromptVariant("system")).toBe(true);
    expect(isPromptVariant("readme")).toBe(true);
    expect(isPromptVariant("builder")).toBe(false);
  });

  it("lists blocking rules before advisory ones", () => {
    const lines = rulesChecklist().split("\n");
    const blocking = RULES.filter((r) => r.severity === "blocking").length;

    expect(lines[1]).toBe("Must hold (the page breaks otherwise):");
    expect(lines[2 + blocking]).toBe("");
    expect(lines[3 + blocking]).toBe("Should hold:");
    expect(lines).toHaveLength(4 + RULES.length);
  });

  it("renders the wrapper with the requested namespace", () => {
    const prompt = renderSystemPrompt(undefined, "Shop");

    expect(prompt).toContain("  var ns = (global.Shop = global.Shop || {});");
    expect(prompt).toContain("- Every script attaches its public API to window.Shop.<module>");
    expect(prompt).toContain("using index.js as its entry point");
  });

  it("renders a README with the module load order", () => {
    const readme = renderReadme({ appName: "Demo", modules: ["utils", "main"], namespace: "Demo" });
    const lines = readme.split("\n");

    expect(lines[0]).toBe("# Demo");
    expect(lines).toContain("1. `js/utils.js` → `Demo.utils`");
    expect(lines).toContain("2. `js/main.js` → `Demo.main`");
    expect(lines).toContain('3. Add `import "./js/<name>.js";` to `index.js` at the same position.');
  });
});
