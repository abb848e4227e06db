import { sha256Prefixed } from "../core/canonicalJson.js";
import type { Sha256Digest } from "../core/canonicalJson.js";
import { GraphParseError, QueryExecutionError, TemplateCompileError } from "../core/errors.js";
import { normalizeRelPath } from "../core/paths.js";
import type { Collaborators } from "../collaborators/index.js";
import type { LoadedGraph, OntologySource } from "../collaborators/graph.js";
import type { BindingRow } from "../collaborators/query.js";
import type { CompiledTemplate } from "../collaborators/templates.js";
import { inputContent } from "../workspace/discovery.js";
import type { WorkspaceContext } from "../workspace/discovery.js";
import type { PlannedOutput } from "./plan.js";

export interface RenderedOutput {
  path: string;
  content: string;
  hash: Sha256Digest;
  size: number;
  rows: number;
}

/**
 * Per-run memo over the collaborators. Guards and the generation stage share one
 * instance, so the graph is parsed once and each query and template is handled once.
 */
export class RuleRenderer {
  private graphPromise: Promise<LoadedGraph> | null = null;
  private readonly rowCache = new Map<string, Promise<BindingRow[]>>();
  private readonly templateCache = new Map<string, CompiledTemplate>();
  private readonly renderCache = new Map<string, Promise<RenderedOutput>>();
  private readonly templatePaths: ReadonlySet<string>;

  constructor(
    readonly workspace: WorkspaceContext,
    readonly collaborators: Collaborators
  ) {
    this.templatePaths = new Set(workspace.inputs.templates.map((d) => d.path));
  }

  graph(): Promise<LoadedGraph> {
    if (!this.graphPromise) {
      const sources: OntologySource[] = this.workspace.inputs.ontologies.map((d) => ({
        path: d.path,
        content: inputContent(this.workspace, d.path) ?? ""
      }));
      this.graphPromise = Promise.resolve().then(() => this.collaborators.graphLoader.parse(sources));
    }
    return this.graphPromise;
  }

  template(templatePath: string): CompiledTemplate {
    const key = normalizeRelPath(templatePath);
    const cached = this.templateCache.get(key);
    if (cached) return cached;
    const content = inputContent(this.workspace, key);
    if (content === null) throw new TemplateCompileError(`${key}: template was not read`, key, null, null);
    const compiled = this.collaborators.templateEngine.compile({ path: key, content }, (name) => this.includedTemplate(name));
    this.templateCache.set(key, compiled);
    return compiled;
  }

  /** Includes resolve against the discovered templates as they were read, never against the disk. */
  private includedTemplate(name: string): string | null {
    const key = normalizeRelPath(name);
    return this.templatePaths.has(key) ? inputContent(this.workspace, key) : null;
  }

  rows(queryPath: string): Promise<BindingRow[]> {
    const key = normalizeRelPath(queryPath);
    let pending = this.rowCache.get(key);
    if (!pending) {
      pending = this.executeQuery(key);
      this.rowCache.set(key, pending);
    }
    return pending;
  }

  private async executeQuery(key: string): Promise<BindingRow[]> {
    const content = inputContent(this.workspace, key);
    if (content === null) throw new QueryExecutionError(`${key}: query was not read`, key);
    let graph: LoadedGraph;
    try {
      graph = await this.graph();
    } catch (err) {
      if (err instanceof GraphParseError) {
        throw new QueryExecutionError(`${key}: graph unavailable (${err.message})`, key);
      }
      throw err;
    }
    return this.collaborators.queryExecutor.execute(graph, { path: key, content });
  }

  /** First render of a planned output; memoized. */
  render(planned: PlannedOutput): Promise<RenderedOutput> {
    const key = `${planned.rule.name}\u0000${planned.path}`;
    let pending = this.renderCache.get(key);
    if (!pending) {
      pending = this.renderWith(planned, false);
      this.renderCache.set(key, pending);
    }
    return pending;
  }

  /** Independent render: the query runs again and nothing is memoized. */
  async renderFresh(planned: PlannedOutput): Promise<RenderedOutput> {
    return this.renderWith(planned, true);
  }

  private async renderWith(planned: PlannedOutput, fresh: boolean): Promise<RenderedOutput> {
    const template = this.template(planned.rule.template);
    const rows = fresh ? await this.executeQuery(normalizeRelPath(planned.rule.query)) : await this.rows(planned.rule.query);
    const content = template.render({ rule: planned.rule.name, output: planned.path, rows });
    const bytes = Buffer.from(content, "utf8");
    return { path: planned.path, content, hash: sha256Prefixed(bytes), size: bytes.byteLength, rows: rows.length };
  }
}
