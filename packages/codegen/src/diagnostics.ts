export const CODEGEN_DIAGNOSTICS = {
  SVC1001: "Reserved method name.",
  SVC1002: "Duplicate method name within a service.",
  SVC1003: "Duplicate service name within a package.",
  SVC2001: "Unrecognized method call shape.",
  SVC3001: "Malformed schema description.",
  SVC3002: "Unknown binding.",
} as const;

export type CodegenDiagnosticCode = keyof typeof CODEGEN_DIAGNOSTICS;

export class CodegenError extends Error {
  readonly code: CodegenDiagnosticCode;

  constructor(code: CodegenDiagnosticCode, message: string) {
    super(message);
    this.code = code;
    this.name = "CodegenError";
  }
}

export function fail(code: CodegenDiagnosticCode, message: string): never {
  throw new CodegenError(code, message);
}
