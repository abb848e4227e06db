import path from "path";
import { UnsafePathError } from "./errors.js";

/** Forward slashes, no leading "./", no trailing "/". */
export function normalizeRelPath(p: string): string {
  const slashed = p.replace(/\\/g, "/");
  const norm = path.posix.normalize(slashed);
  return norm.replace(/^(\.\/)+/, "").replace(/\/+$/, "");
}

export function toWorkspaceRelative(rootDir: string, absPath: string): string {
  return path.relative(rootDir, absPath).split(path.sep).join("/");
}

/**
 * Returns why a workspace-relative path is unsafe, or null when it is safe.
 * The `..` check runs on the raw segments, so `a/../b` is rejected even though
 * it normalizes inside the root.
 */
export function pathSafetyViolation(rootDir: string, rel: string): string | null {
  if (rel.trim().length === 0) return "path is empty";
  if (rel.includes("\0")) return "path contains a NUL byte";
  if (rel.startsWith("/") || rel.startsWith("\\") || /^[A-Za-z]:/.test(rel) || path.isAbsolute(rel)) {
    return "path is absolute";
  }
  if (rel.split(/[\\/]+/).includes("..")) return "path contains a '..' segment";

  const root = path.resolve(rootDir);
  const joined = path.resolve(root, rel);
  const back = path.relative(root, joined);
  if (back === "" || back.startsWith("..") || path.isAbsolute(back)) return "path resolves outside the workspace root";
  return null;
}

export function safeJoin(rootDir: string, rel: string): string {
  const reason = pathSafetyViolation(rootDir, rel);
  if (reason) throw new UnsafePathError(rel, reason);
  return path.resolve(rootDir, rel);
}

/** Code-unit order, independent of locale. */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
