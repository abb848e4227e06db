import { createTwoFilesPatch } from "diff";

export interface OutputChange {
  path: string;
  previous: string | null;
  next: string;
}

/** One unified patch over every changed output, in path order. Unchanged outputs contribute nothing. */
export function unifiedDiff(changes: readonly OutputChange[]): string {
  const parts: string[] = [];
  for (const c of changes) {
    if (c.previous === c.next) continue;
    const oldName = c.previous === null ? "/dev/null" : `a/${c.path}`;
    parts.push(createTwoFilesPatch(oldName, `b/${c.path}`, c.previous ?? "", c.next, "", "", { context: 3 }));
  }
  return parts.join("");
}
