import YAML from "yaml";
import { detectLanguage } from "../core/detectLanguage.js";
import type { OutputLanguage } from "../core/detectLanguage.js";

export interface ValidationIssue {
  path: string;
  language: OutputLanguage;
  message: string;
}

export interface OutputValidator {
  validate(filePath: string, content: string): ValidationIssue[];
}

/** Syntax checks for the structured formats; other languages pass through unchecked. */
export class SyntaxOutputValidator implements OutputValidator {
  validate(filePath: string, content: string): ValidationIssue[] {
    const language = detectLanguage(filePath);
    switch (language) {
      case "json":
        try {
          JSON.parse(content);
          return [];
        } catch (err) {
          return [{ path: filePath, language, message: err instanceof Error ? err.message : String(err) }];
        }
      case "yaml": {
        const docs = YAML.parseAllDocuments(content);
        const issues: ValidationIssue[] = [];
        for (const doc of docs) {
          for (const e of doc.errors) issues.push({ path: filePath, language, message: e.message });
        }
        return issues;
      }
      default:
        return [];
    }
  }
}
