import nunjucks from "nunjucks";
import type { Template } from "nunjucks";
import { TemplateCompileError, TemplateRenderError } from "../core/errors.js";
import type { BindingRow } from "./query.js";

export interface TemplateSource {
  path: string;
  content: string;
}

export interface CompiledTemplate {
  path: string;
  render(context: RenderContext): string;
}

/** Source of a template named by `{% include %}` or `{% extends %}`, or null when there is none. */
export type TemplateResolver = (name: string) => string | null;

export interface TemplateEngine {
  compile(source: TemplateSource, resolve?: TemplateResolver): CompiledTemplate;
}

export interface RenderContext {
  rule: string;
  output: string;
  rows: BindingRow[];
}

function numberField(err: unknown, key: "lineno" | "colno"): number | null {
  if (typeof err !== "object" || err === null || !(key in err)) return null;
  const v: unknown = Reflect.get(err, key);
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function firstLine(message: string): string {
  const lines = message.split("\n").map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? message;
}

/**
 * Jinja-style templates. Nothing is auto-escaped: output is source code, not HTML.
 * Included templates come from `resolve` only; the engine never reads the filesystem.
 */
export class NunjucksTemplateEngine implements TemplateEngine {
  compile(source: TemplateSource, resolve: TemplateResolver = () => null): CompiledTemplate {
    const loader = {
      getSource: (name: string) => {
        const src = resolve(name);
        if (src === null) throw new Error(`template not found: ${name}`);
        return { src, path: name, noCache: true };
      }
    };
    const env = new nunjucks.Environment(loader, { autoescape: false, throwOnUndefined: false, trimBlocks: true, lstripBlocks: true });
    let template: Template;
    try {
      template = new nunjucks.Template(source.content, env, source.path, true);
    } catch (err) {
      const message = err instanceof Error ? firstLine(err.message) : String(err);
      const line = numberField(err, "lineno");
      const column = numberField(err, "colno");
      const where = line !== null ? ` (line ${line}${column !== null ? `, column ${column}` : ""})` : "";
      throw new TemplateCompileError(`${source.path}${where}: ${message}`, source.path, line, column);
    }

    return {
      path: source.path,
      render: (context) => {
        try {
          return template.render(context);
        } catch (err) {
          throw new TemplateRenderError(`${source.path}: ${err instanceof Error ? err.message : String(err)}`, source.path);
        }
      }
    };
  }
}

