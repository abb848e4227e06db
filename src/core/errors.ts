/**
 * Error taxonomy.
 *
 * Collaborator errors (graph, query, template) are caught by guards and become
 * Fail verdicts. Everything else thrown out of a guard or discovery is
 * infrastructural and aborts the run.
 */

export type CollaboratorErrorCode = "GRAPH_PARSE" | "QUERY_EXECUTION" | "TEMPLATE_COMPILE" | "TEMPLATE_RENDER";

export abstract class CollaboratorError extends Error {
  abstract readonly code: CollaboratorErrorCode;

  constructor(
    message: string,
    readonly sourcePath: string | null
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class GraphParseError extends CollaboratorError {
  readonly code = "GRAPH_PARSE" as const;

  constructor(
    message: string,
    sourcePath: string | null,
    readonly line: number | null
  ) {
    super(message, sourcePath);
  }
}

export class QueryExecutionError extends CollaboratorError {
  readonly code = "QUERY_EXECUTION" as const;
}

export class TemplateCompileError extends CollaboratorError {
  readonly code = "TEMPLATE_COMPILE" as const;

  constructor(
    message: string,
    sourcePath: string | null,
    readonly line: number | null,
    readonly column: number | null
  ) {
    super(message, sourcePath);
  }
}

export class TemplateRenderError extends CollaboratorError {
  readonly code = "TEMPLATE_RENDER" as const;
}

export class WorkspaceIoError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "WorkspaceIoError";
  }
}

export class WorkspaceConfigError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(message);
    this.name = "WorkspaceConfigError";
  }
}

export class GuardInfrastructureError extends Error {
  constructor(
    readonly guardId: string,
    cause: unknown
  ) {
    super(`guard ${guardId} failed to evaluate: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "GuardInfrastructureError";
  }
}

export class UnsafePathError extends Error {
  constructor(
    readonly relPath: string,
    reason: string
  ) {
    super(`unsafe path ${JSON.stringify(relPath)}: ${reason}`);
    this.name = "UnsafePathError";
  }
}

export class ReceiptIntegrityError extends Error {
  constructor(
    message: string,
    readonly receiptPath: string
  ) {
    super(message);
    this.name = "ReceiptIntegrityError";
  }
}

export class LockTimeoutError extends Error {
  readonly code = "LOCK_HELD" as const;

  constructor(readonly lockPath: string) {
    super(`timed out waiting for lock ${lockPath}`);
    this.name = "LockTimeoutError";
  }
}

export class RunCancelledError extends Error {
  constructor(readonly stage: string) {
    super(`run cancelled before ${stage}`);
    this.name = "RunCancelledError";
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
