import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;

export interface RunsTable {
  run_id: string;
  kind: string;
  workspace_root: string;
  fingerprint: OptionalNullable<string>;
  mode: OptionalNullable<string>;
  status: string;
  receipt_id: OptionalNullable<string>;
  receipt_path: OptionalNullable<string>;
  error: OptionalNullable<string>;
  created_at: Generated<string>;
  finished_at: OptionalNullable<string>;
  summary: JsonNullable;
}

export interface RunEventsTable {
  event_id: Generated<string>;
  run_id: string;
  ts: Generated<string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  runs: RunsTable;
  run_events: RunEventsTable;
}
