export type DiagnosticCategory = "lexical" | "syntax" | "semantic";
export type DiagnosticSeverity = "error" | "warning";

export type LexicalCode = "INVALID_CHARACTER" | "UNTERMINATED_COMMENT";

export type SyntaxCode =
  | "EXPECTED_KEYWORD"
  | "EXPECTED_COLON"
  | "EXPECTED_SEPARATOR"
  | "EXPECTED_DEVICE_KIND"
  | "INVALID_DEVICE_NAME"
  | "EXPECTED_NAME"
  | "EXPECTED_NUMBER"
  | "INVALID_NUMBER"
  | "EXPECTED_ARROW"
  | "EXPECTED_DOT"
  | "INVALID_INPUT_PIN"
  | "INVALID_OUTPUT_PIN"
  | "MISSING_DEVICES"
  | "UNEXPECTED_EOF"
  | "TRAILING_INPUT";

export type SemanticCode =
  | "DUPLICATE_DEVICE"
  | "UNDEFINED_DEVICE"
  | "INVALID_PIN"
  | "INPUT_CONNECTED"
  | "INVALID_ARGUMENT"
  | "DUPLICATE_MONITOR";

export type DiagnosticCode = LexicalCode | SyntaxCode | SemanticCode;

export interface Diagnostic {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  code: DiagnosticCode;
  message: string;
  line: number;
  column: number;
  /** Source line the diagnostic points into, so it can be shown without the file. */
  lineText: string;
}

const CATEGORIES: readonly DiagnosticCategory[] = ["lexical", "syntax", "semantic"];

export type DiagnosticSummary = {
  errors: number;
  warnings: number;
  byCategory: Record<DiagnosticCategory, number>;
};

export function formatDiagnostic(d: Diagnostic): string {
  const header = `Line ${d.line}, column ${d.column}: ${d.severity}: ${d.message}`;
  if (!d.lineText) return header;
  // Tabs keep their width so the caret lines up in a terminal.
  const pad = d.lineText.slice(0, Math.max(0, d.column - 1)).replace(/[^\t]/g, " ");
  return `${header}\n  ${d.lineText}\n  ${pad}^`;
}

export function summarize(diagnostics: readonly Diagnostic[]): DiagnosticSummary {
  const byCategory: Record<DiagnosticCategory, number> = { lexical: 0, syntax: 0, semantic: 0 };
  let errors = 0;
  let warnings = 0;
  for (const d of diagnostics) {
    if (d.severity === "error") errors++;
    else warnings++;
    byCategory[d.category]++;
  }
  return { errors, warnings, byCategory };
}

export function describeSummary(s: DiagnosticSummary): string {
  const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? "" : "s"}`;
  if (!s.errors && !s.warnings) return "No problems found.";
  const parts = [plural(s.errors, "error")];
  if (s.warnings) parts.push(plural(s.warnings, "warning"));
  const detail = CATEGORIES.filter((c) => s.byCategory[c])
    .map((c) => `${s.byCategory[c]} ${c}`)
    .join(", ");
  return `${parts.join(", ")} (${detail}).`;
}
