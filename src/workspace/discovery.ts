import { promises as fs } from "fs";
import type { Dirent } from "fs";
import path from "path";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Sha256Digest } from "../core/canonicalJson.js";
import { WorkspaceIoError, isErrnoException } from "../core/errors.js";
import { createLogger } from "../core/log.js";
import { compareStrings, normalizeRelPath, pathSafetyViolation, toWorkspaceRelative } from "../core/paths.js";
import { CONFIG_FILE_NAME, defaultWorkspaceConfig, loadWorkspaceConfig } from "../config/workspaceConfig.js";
import type { WorkspaceConfig } from "../config/workspaceConfig.js";

const log = createLogger("discovery");

export const ONTOLOGY_DIR = "ontology";
export const QUERY_DIR = "queries";
export const TEMPLATE_DIR = "templates";
export const ONTOLOGY_EXT = ".ttl";
export const QUERY_EXT = ".rq";
export const TEMPLATE_EXT = ".njk";
const DEFAULT_OUTPUT_EXT = "rs";

export type InputKind = "config" | "ontology" | "query" | "template";

export interface InputDescriptor {
  path: string;
  hash: Sha256Digest;
  size: number;
  kind: InputKind;
}

export interface GenerationRule {
  name: string;
  query: string;
  template: string;
  output: string;
}

export interface WorkspaceInputs {
  config: InputDescriptor | null;
  ontologies: InputDescriptor[];
  queries: InputDescriptor[];
  templates: InputDescriptor[];
}

/** Everything later stages know about the workspace. Built once per run and never mutated. */
export interface WorkspaceContext {
  readonly root: string;
  readonly config: WorkspaceConfig;
  readonly inputs: WorkspaceInputs;
  readonly contents: ReadonlyMap<string, string>;
  readonly rules: readonly GenerationRule[];
  readonly ontologyHash: Sha256Digest;
  readonly fingerprint: Sha256Digest;
}

export function allInputs(inputs: WorkspaceInputs): InputDescriptor[] {
  return [...(inputs.config ? [inputs.config] : []), ...inputs.ontologies, ...inputs.queries, ...inputs.templates];
}

export function computeFingerprint(
  root: string,
  configHash: Sha256Digest | null,
  ontologyHashes: readonly Sha256Digest[]
): Sha256Digest {
  return sha256Prefixed(
    stableJsonStringify({
      root: path.resolve(root),
      config: configHash,
      ontologies: [...ontologyHashes].sort(compareStrings)
    })
  );
}

/** Combined digest of every ontology file, keyed by path; the tracker's notion of "the ontology". */
export function combinedOntologyHash(ontologies: readonly InputDescriptor[]): Sha256Digest {
  const pairs = [...ontologies].sort((a, b) => compareStrings(a.path, b.path)).map((d) => [d.path, d.hash]);
  return sha256Prefixed(stableJsonStringify(pairs));
}

async function listFiles(rootDir: string, relDir: string, ext: string): Promise<string[]> {
  const out: string[] = [];
  async function walk(absDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(absDir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return;
      throw new WorkspaceIoError(`cannot list ${absDir}: ${err instanceof Error ? err.message : String(err)}`, absDir, err);
    }
    for (const e of entries) {
      const abs = path.join(absDir, e.name);
      if (e.isDirectory()) await walk(abs);
      else if (e.isFile() && e.name.endsWith(ext)) out.push(toWorkspaceRelative(rootDir, abs));
    }
  }
  await walk(path.join(rootDir, relDir));
  return out.sort(compareStrings);
}

async function readInput(rootDir: string, rel: string, kind: InputKind): Promise<{ descriptor: InputDescriptor; content: string }> {
  const abs = path.join(rootDir, rel);
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(abs);
  } catch (err) {
    throw new WorkspaceIoError(`cannot read ${kind} ${rel}: ${err instanceof Error ? err.message : String(err)}`, abs, err);
  }
  return {
    descriptor: { path: rel, hash: sha256Prefixed(bytes), size: bytes.byteLength, kind },
    content: bytes.toString("utf8")
  };
}

/**
 * Pairs `queries/<stem>.rq` with every `templates/<stem>[.<ext>].njk`.
 * `entities.ts.njk` writes `<generated_root>/entities.ts`; a bare `entities.njk` writes `entities.rs`.
 */
export function inferRules(queryPaths: readonly string[], templatePaths: readonly string[], generatedRoot: string): GenerationRule[] {
  const rules: GenerationRule[] = [];
  for (const q of queryPaths) {
    const stem = path.posix.basename(q, QUERY_EXT);
    for (const t of templatePaths) {
      const base = path.posix.basename(t, TEMPLATE_EXT);
      const dot = base.indexOf(".");
      const tStem = dot === -1 ? base : base.slice(0, dot);
      if (tStem !== stem) continue;
      const ext = dot === -1 ? DEFAULT_OUTPUT_EXT : base.slice(dot + 1);
      rules.push({ name: base, query: q, template: t, output: `${normalizeRelPath(generatedRoot)}/${stem}.${ext}` });
    }
  }
  return rules.sort((a, b) => compareStrings(a.name, b.name));
}

/** Config hash and ontology hashes only: what the fingerprint needs and nothing more. */
export async function fingerprintWorkspace(rootDir: string): Promise<Sha256Digest> {
  const root = path.resolve(rootDir);
  const configPath = path.join(root, CONFIG_FILE_NAME);
  let configHash: Sha256Digest | null = null;
  try {
    configHash = sha256Prefixed(await fs.readFile(configPath));
  } catch (err) {
    if (!(isErrnoException(err) && err.code === "ENOENT")) {
      throw new WorkspaceIoError(`cannot read ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`, configPath, err);
    }
  }
  const ontologyPaths = await listFiles(root, ONTOLOGY_DIR, ONTOLOGY_EXT);
  const hashes: Sha256Digest[] = [];
  for (const rel of ontologyPaths) hashes.push((await readInput(root, rel, "ontology")).descriptor.hash);
  return computeFingerprint(root, configHash, hashes);
}

export async function discoverWorkspace(rootDir: string): Promise<WorkspaceContext> {
  const root = path.resolve(rootDir);
  const contents = new Map<string, string>();

  const loaded = await loadWorkspaceConfig(path.join(root, CONFIG_FILE_NAME));
  const config = loaded?.config ?? defaultWorkspaceConfig();
  const configDescriptor: InputDescriptor | null = loaded
    ? { path: CONFIG_FILE_NAME, hash: sha256Prefixed(loaded.raw), size: loaded.raw.byteLength, kind: "config" }
    : null;

  const ontologyPaths = await listFiles(root, ONTOLOGY_DIR, ONTOLOGY_EXT);
  const queryPaths = await listFiles(root, QUERY_DIR, QUERY_EXT);
  const templatePaths = await listFiles(root, TEMPLATE_DIR, TEMPLATE_EXT);

  const rules: GenerationRule[] = config.rules
    ? config.rules.map((r) => ({ ...r }))
    : inferRules(queryPaths, templatePaths, config.generated_root);

  // Declared rule inputs outside the conventional directories are still inputs.
  // Unsafe ones are left unread; the path-safety guard reports them.
  const extraQueries = new Set<string>();
  const extraTemplates = new Set<string>();
  for (const r of rules) {
    const q = normalizeRelPath(r.query);
    const t = normalizeRelPath(r.template);
    if (!pathSafetyViolation(root, r.query) && !queryPaths.includes(q)) extraQueries.add(q);
    if (!pathSafetyViolation(root, r.template) && !templatePaths.includes(t)) extraTemplates.add(t);
  }

  const readAll = async (paths: readonly string[], kind: InputKind): Promise<InputDescriptor[]> => {
    const out: InputDescriptor[] = [];
    for (const rel of [...paths].sort(compareStrings)) {
      const { descriptor, content } = await readInput(root, rel, kind);
      contents.set(rel, content);
      out.push(descriptor);
    }
    return out;
  };

  const ontologies = await readAll(ontologyPaths, "ontology");
  const queries = await readAll([...queryPaths, ...extraQueries], "query");
  const templates = await readAll([...templatePaths, ...extraTemplates], "template");

  const fingerprint = computeFingerprint(
    root,
    configDescriptor?.hash ?? null,
    ontologies.map((d) => d.hash)
  );

  log.debug("workspace discovered", {
    root,
    ontologies: ontologies.length,
    queries: queries.length,
    templates: templates.length,
    rules: rules.length
  });

  return {
    root,
    config,
    inputs: { config: configDescriptor, ontologies, queries, templates },
    contents,
    rules,
    ontologyHash: combinedOntologyHash(ontologies),
    fingerprint
  };
}

export function inputContent(ctx: WorkspaceContext, rel: string): string | null {
  return ctx.contents.get(normalizeRelPath(rel)) ?? null;
}
