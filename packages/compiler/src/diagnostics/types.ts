export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "canonicalize" | "interface";

export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
