import type { CodeGenerator, CodeGeneratorOptions } from "../codegen.js";
import { fail } from "../diagnostics.js";
import type { StubGenerator } from "../stubs.js";
import { NanopbCodeGenerator, NanopbStubGenerator, nanopbOutputFileName } from "./nanopb.js";
import { RawCodeGenerator, RawStubGenerator, rawOutputFileName } from "./raw.js";

export type BindingName = "raw" | "nanopb";

export const BINDING_NAMES: readonly BindingName[] = ["raw", "nanopb"];

export type Binding = {
  readonly name: BindingName;
  readonly outputFileName: (schemaFileName: string) => string;
  readonly createGenerator: (options: CodeGeneratorOptions) => CodeGenerator;
  readonly createStubGenerator: () => StubGenerator;
};

const BINDINGS: Readonly<Record<BindingName, Binding>> = {
  raw: {
    name: "raw",
    outputFileName: rawOutputFileName,
    createGenerator: (options) => new RawCodeGenerator(options),
    createStubGenerator: () => new RawStubGenerator(),
  },
  nanopb: {
    name: "nanopb",
    outputFileName: nanopbOutputFileName,
    createGenerator: (options) => new NanopbCodeGenerator(options),
    createStubGenerator: () => new NanopbStubGenerator(),
  },
};

export function isBindingName(value: unknown): value is BindingName {
  return typeof value === "string" && (BINDING_NAMES as readonly string[]).includes(value);
}

export function getBinding(name: string): Binding {
  if (!isBindingName(name)) {
    fail("SVC3002", `Unknown binding ${JSON.stringify(name)}; expected one of ${BINDING_NAMES.join(", ")}.`);
  }
  return BINDINGS[name];
}
