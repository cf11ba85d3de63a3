/**
 * Language detection from a filename extension, falling back to a couple of
 * keyword hints in the code itself.
 */

/**
 * Extension → language tag. Matched as a suffix, in this order.
 */
export const EXTENSION_MAP: ReadonlyArray<readonly [string, string]> = [
  [".py", "python"],
  [".js", "javascript"],
  [".ts", "typescript"],
  [".jsx", "javascript"],
  [".tsx", "typescript"],
  [".java", "java"],
  [".go", "go"],
  [".rs", "rust"],
  [".rb", "ruby"],
  [".php", "php"],
  [".c", "c"],
  [".cpp", "cpp"],
  [".cs", "csharp"],
];

export const FALLBACK_LANGUAGE = "text";

export function detectLanguage(params: { filename?: string; code?: string }): string {
  const { filename, code } = params;

  if (filename) {
    for (const [ext, language] of EXTENSION_MAP) {
      if (filename.endsWith(ext)) {
        return language;
      }
    }
  }

  if (code) {
    if (code.includes("def ") || code.includes("import ")) {
      return "python";
    }
    if (code.includes("const ") || code.includes("function ")) {
      return "javascript";
    }
  }

  return FALLBACK_LANGUAGE;
}

export interface SupportedLanguage {
  name: string;
  extensions: string[];
}

export function listSupportedLanguages(): SupportedLanguage[] {
  const byLanguage = new Map<string, string[]>();

  for (const [ext, language] of EXTENSION_MAP) {
    const existing = byLanguage.get(language) || [];
    existing.push(ext);
    byLanguage.set(language, existing);
  }

  return [...byLanguage.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, extensions]) => ({ name, extensions: [...extensions].sort() }));
}
