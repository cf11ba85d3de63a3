import { detectLanguage, listSupportedLanguages, FALLBACK_LANGUAGE } from "../src/analysis/detector";

describe("detectLanguage", () => {
  it("should map file extensions to languages", () => {
    expect(detectLanguage({ filename: "app.py" })).toBe("python");
    expect(detectLanguage({ filename: "src/index.ts" })).toBe("typescript");
    expect(detectLanguage({ filename: "Button.tsx" })).toBe("typescript");
    expect(detectLanguage({ filename: "Button.jsx" })).toBe("javascript");
    expect(detectLanguage({ filename: "main.go" })).toBe("go");
    expect(detectLanguage({ filename: "lib.rs" })).toBe("rust");
    expect(detectLanguage({ filename: "Program.cs" })).toBe("csharp");
    expect(detectLanguage({ filename: "engine.cpp" })).toBe("cpp");
    expect(detectLanguage({ filename: "kernel.c" })).toBe("c");
  });

  it("should prefer the filename over code hints", () => {
    expect(detectLanguage({ filename: "main.go", code: "def handler():\n    pass" })).toBe("go");
  });

  it("should fall back to code hints when the extension is unknown", () => {
    expect(detectLanguage({ filename: "Makefile", code: "def build():\n    pass" })).toBe("python");
    expect(detectLanguage({ code: "const answer = 42;" })).toBe("javascript");
    expect(detectLanguage({ code: "function add(a, b) { return a + b; }" })).toBe("javascript");
  });

  it("should check python hints before javascript hints", () => {
    // An ES module import still reads as python
    expect(detectLanguage({ code: "import fs from 'fs';\nconst x = 1;" })).toBe("python");
  });

  it("should return the fallback tag when nothing matches", () => {
    expect(detectLanguage({})).toBe(FALLBACK_LANGUAGE);
    expect(detectLanguage({ filename: "README" })).toBe("text");
    expect(detectLanguage({ code: "SELECT 1;" })).toBe("text");
  });
});

describe("listSupportedLanguages", () => {
  it("should list each language once, sorted by name", () => {
    const names = listSupportedLanguages().map((l) => l.name);
    expect(names).toEqual([
      "c",
      "cpp",
      "csharp",
      "go",
      "java",
      "javascript",
      "php",
      "python",
      "ruby",
      "rust",
      "typescript",
    ]);
  });

  it("should group extensions per language", () => {
    const languages = listSupportedLanguages();
    expect(languages.find((l) => l.name === "typescript")?.extensions).toEqual([".ts", ".tsx"]);
    expect(languages.find((l) => l.name === "javascript")?.extensions).toEqual([".js", ".jsx"]);
    expect(languages.find((l) => l.name === "python")?.extensions).toEqual([".py"]);
  });
});
