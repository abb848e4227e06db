import { TurtleGraphLoader } from "./graph.js";
import type { GraphLoader } from "./graph.js";
import { SparqlQueryExecutor } from "./query.js";
import type { QueryExecutor } from "./query.js";
import { NunjucksTemplateEngine } from "./templates.js";
import type { TemplateEngine } from "./templates.js";
import { SyntaxOutputValidator } from "./validators.js";
import type { OutputValidator } from "./validators.js";

export interface Collaborators {
  graphLoader: GraphLoader;
  queryExecutor: QueryExecutor;
  templateEngine: TemplateEngine;
  validator: OutputValidator;
}

export function defaultCollaborators(): Collaborators {
  return {
    graphLoader: new TurtleGraphLoader(),
    queryExecutor: new SparqlQueryExecutor(),
    templateEngine: new NunjucksTemplateEngine(),
    validator: new SyntaxOutputValidator()
  };
}
