import { QueryEngine } from "@comunica/query-sparql-rdfjs";
import { QueryExecutionError } from "../core/errors.js";
import { compareStrings } from "../core/paths.js";
import { stableJsonStringify } from "../core/canonicalJson.js";
import type { LoadedGraph } from "./graph.js";

export type BindingRow = Record<string, string>;

export interface QuerySource {
  path: string;
  content: string;
}

export interface QueryExecutor {
  execute(graph: LoadedGraph, query: QuerySource): Promise<BindingRow[]>;
}

const ORDER_BY = /\bORDER\s+BY\b/i;

/**
 * SPARQL SELECT over the loaded graph. Result sets without ORDER BY are sorted
 * by their canonical row encoding so rendering never depends on engine order.
 */
export class SparqlQueryExecutor implements QueryExecutor {
  private readonly engine = new QueryEngine();

  async execute(graph: LoadedGraph, query: QuerySource): Promise<BindingRow[]> {
    let rows: BindingRow[];
    try {
      const stream = await this.engine.queryBindings(query.content, { sources: [graph.store] });
      const bindings = await stream.toArray();
      rows = bindings.map((b) => {
        const row: BindingRow = {};
        for (const [variable, term] of b) row[variable.value] = term.value;
        return row;
      });
    } catch (err) {
      throw new QueryExecutionError(`${query.path}: ${err instanceof Error ? err.message : String(err)}`, query.path);
    }

    if (ORDER_BY.test(query.content)) return rows;
    return rows
      .map((row) => ({ row, key: stableJsonStringify(row) }))
      .sort((a, b) => compareStrings(a.key, b.key))
      .map((r) => r.row);
  }
}
