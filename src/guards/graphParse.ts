import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";
import { GraphParseError } from "../core/errors.js";

export const graphParseGuard: Guard = {
  id: "G4",
  name: "Graph Parse",
  description: "Every ontology file parses as Turtle.",
  remediation: "Fix the Turtle syntax in the reported ontology file.",
  async check(ctx) {
    const files = ctx.workspace.inputs.ontologies.length;
    try {
      const graph = await ctx.renderer.graph();
      const triples = Object.values(graph.tripleCounts).reduce((a, b) => a + b, 0);
      return pass(`${files} ontology files, ${triples} triples`, { files, triples });
    } catch (err) {
      if (!(err instanceof GraphParseError)) throw err;
      return fail(err.line !== null ? `${err.message} (line ${err.line})` : err.message, { files });
    }
  }
};
