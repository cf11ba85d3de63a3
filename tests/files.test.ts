import * as path from "path";
import { collectReviewFiles, isReviewableFile } from "../src/analysis/files";
import { loadConfigFromString } from "../src/config/loader";
import { makeTempTree, removeTempTree } from "./helpers/fakes";

describe("isReviewableFile", () => {
  it("should accept supported source extensions case-insensitively", () => {
    expect(isReviewableFile("app.py")).toBe(true);
    expect(isReviewableFile("src/Main.JAVA")).toBe(true);
    expect(isReviewableFile("component.tsx")).toBe(true);
  });

  it("should reject other files", () => {
    expect(isReviewableFile("README.md")).toBe(false);
    expect(isReviewableFile("Makefile")).toBe(false);
    expect(isReviewableFile("kernel.c")).toBe(false);
  });
});

describe("collectReviewFiles", () => {
  let root: string;

  beforeAll(() => {
    root = makeTempTree({
      "src/app.py": "print('hi')\n",
      "src/util.ts": "export const x = 1;\n",
      "src/notes.md": "# notes\n",
      "lib/Main.JAVA": "class Main {}\n",
      "generated/api.ts": "export {};\n",
      "node_modules/left-pad/index.js": "module.exports = 1;\n",
      ".git/hooks/pre-commit.py": "pass\n",
      "dist/bundle.js": "var a;\n",
      "build/out.js": "var b;\n",
      "venv/lib/site.py": "pass\n",
    });
  });

  afterAll(() => {
    removeTempTree(root);
  });

  it("should walk the tree and skip dependency, build and dot directories", async () => {
    const files = await collectReviewFiles(root);

    expect(files).toEqual([
      path.join(root, "generated/api.ts"),
      path.join(root, "lib/Main.JAVA"),
      path.join(root, "src/app.py"),
      path.join(root, "src/util.ts"),
    ]);
  });

  it("should drop files matched by the config's ignore patterns", async () => {
    const config = loadConfigFromString('files:\n  ignore:\n    - "generated/**"\n    - "**/*.JAVA"\n');

    const files = await collectReviewFiles(root, config);

    expect(files).toEqual([path.join(root, "src/app.py"), path.join(root, "src/util.ts")]);
  });

  it("should return nothing for a tree without source files", async () => {
    const empty = makeTempTree({ "docs/index.md": "# docs\n" });
    try {
      await expect(collectReviewFiles(empty)).resolves.toEqual([]);
    } finally {
      removeTempTree(empty);
    }
  });
});
