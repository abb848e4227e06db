import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { WorkspaceConfigError, isErrnoException } from "../core/errors.js";
import { normalizeRelPath, pathSafetyViolation } from "../core/paths.js";

export const CONFIG_FILE_NAME = "proofgen.yaml";

export const DEFAULT_LIMITS = {
  max_output_files: 1000,
  max_output_bytes: 100 * 1024 * 1024,
  max_file_bytes: 10 * 1024 * 1024,
  max_ontology_bytes: 50 * 1024 * 1024,
  max_template_bytes: 1024 * 1024,
  max_query_bytes: 1024 * 1024
} as const;

const zRelPath = z.string().min(1);

export const zGenerationRule = z.object({
  name: z.string().min(1),
  query: zRelPath,
  template: zRelPath,
  output: zRelPath
});

export const zWorkspaceConfig = z.object({
  version: z.literal(1).default(1),
  generated_root: z.string().min(1).default("src/generated"),
  rules: z.array(zGenerationRule).optional(),
  guards: z
    .object({
      fail_fast: z.boolean().default(true),
      validate_only_stops_at: z.enum(["G4", "G5"]).default("G5")
    })
    .prefault({}),
  limits: z
    .object({
      max_output_files: z.int().nonnegative().default(DEFAULT_LIMITS.max_output_files),
      max_output_bytes: z.int().nonnegative().default(DEFAULT_LIMITS.max_output_bytes),
      max_file_bytes: z.int().nonnegative().default(DEFAULT_LIMITS.max_file_bytes),
      max_ontology_bytes: z.int().nonnegative().default(DEFAULT_LIMITS.max_ontology_bytes),
      max_template_bytes: z.int().nonnegative().default(DEFAULT_LIMITS.max_template_bytes),
      max_query_bytes: z.int().nonnegative().default(DEFAULT_LIMITS.max_query_bytes)
    })
    .prefault({})
});

export type GenerationRuleConfig = z.infer<typeof zGenerationRule>;
export type WorkspaceConfig = z.infer<typeof zWorkspaceConfig>;
export type WorkspaceLimits = WorkspaceConfig["limits"];

function expandEnvTokens(value: string, filePath: string): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/g, (_m, varName: string) => {
    const v = process.env[varName]?.trim();
    if (!v) throw new WorkspaceConfigError(`environment variable ${varName} is not set`, filePath);
    return v;
  });
}

export function parseWorkspaceConfig(raw: string, filePath: string): WorkspaceConfig {
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (err) {
    throw new WorkspaceConfigError(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, filePath);
  }

  const parsed = zWorkspaceConfig.safeParse(doc ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new WorkspaceConfigError(`invalid config: ${detail}`, filePath);
  }

  const generatedRoot = expandEnvTokens(parsed.data.generated_root, filePath);
  const normalized = normalizeRelPath(generatedRoot);
  if (normalized === "." || normalized === "") {
    throw new WorkspaceConfigError(`generated_root ${JSON.stringify(generatedRoot)} is the workspace root itself`, filePath);
  }
  // lexical check only; the directory the config lives in stands in for the workspace root
  const unsafe = pathSafetyViolation(path.dirname(path.resolve(filePath)), generatedRoot);
  if (unsafe) throw new WorkspaceConfigError(`generated_root ${JSON.stringify(generatedRoot)}: ${unsafe}`, filePath);
  return { ...parsed.data, generated_root: generatedRoot };
}

export function defaultWorkspaceConfig(): WorkspaceConfig {
  return zWorkspaceConfig.parse({});
}

/** Returns the parsed config and its raw bytes, or null when the workspace has no config file. */
export async function loadWorkspaceConfig(filePath: string): Promise<{ config: WorkspaceConfig; raw: Buffer } | null> {
  let raw: Buffer;
  try {
    raw = await fs.readFile(filePath);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
  return { config: parseWorkspaceConfig(raw.toString("utf8"), filePath), raw };
}
