export type OutputLanguage = "rust" | "typescript" | "javascript" | "python" | "yaml" | "json" | "toml" | "markdown" | "unknown";

export function detectLanguage(filePath: string): OutputLanguage {
  const s = filePath.toLowerCase();
  if (s.endsWith(".rs")) return "rust";
  if (s.endsWith(".ts") || s.endsWith(".tsx") || s.endsWith(".mts") || s.endsWith(".cts")) return "typescript";
  if (s.endsWith(".js") || s.endsWith(".mjs") || s.endsWith(".cjs")) return "javascript";
  if (s.endsWith(".py")) return "python";
  if (s.endsWith(".yaml") || s.endsWith(".yml")) return "yaml";
  if (s.endsWith(".json")) return "json";
  if (s.endsWith(".toml")) return "toml";
  if (s.endsWith(".md")) return "markdown";
  return "unknown";
}
