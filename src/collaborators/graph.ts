import { Parser, Store } from "n3";
import type { Quad } from "n3";
import { GraphParseError } from "../core/errors.js";
import { compareStrings } from "../core/paths.js";

export interface OntologySource {
  path: string;
  content: string;
}

export interface LoadedGraph {
  store: Store;
  tripleCounts: Record<string, number>;
}

export interface GraphLoader {
  parse(sources: readonly OntologySource[]): LoadedGraph;
}

function lineFromMessage(message: string): number | null {
  const m = /on line (\d+)/.exec(message);
  return m?.[1] ? Number(m[1]) : null;
}

/** Parses Turtle sources into one in-memory store. Parse failures raise GraphParseError. */
export class TurtleGraphLoader implements GraphLoader {
  constructor(private readonly baseIri = "urn:proofgen:") {}

  parseOne(source: OntologySource): Quad[] {
    const parser = new Parser({ baseIRI: `${this.baseIri}${source.path}`, format: "text/turtle" });
    try {
      return parser.parse(source.content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new GraphParseError(`${source.path}: ${message}`, source.path, lineFromMessage(message));
    }
  }

  parse(sources: readonly OntologySource[]): LoadedGraph {
    const store = new Store();
    const tripleCounts: Record<string, number> = {};
    for (const source of [...sources].sort((a, b) => compareStrings(a.path, b.path))) {
      const quads = this.parseOne(source);
      store.addQuads(quads);
      tripleCounts[source.path] = quads.length;
    }
    return { store, tripleCounts };
  }
}
