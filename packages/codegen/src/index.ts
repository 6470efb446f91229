export type { Binding, BindingName } from "./bindings/index.js";
export { BINDING_NAMES, getBinding, isBindingName } from "./bindings/index.js";
export { NanopbCodeGenerator, NanopbStubGenerator, nanopbOutputFileName, nanopbStruct } from "./bindings/nanopb.js";
export { RawCodeGenerator, RawStubGenerator, rawOutputFileName } from "./bindings/raw.js";
export type { CodeGeneratorOptions } from "./codegen.js";
export { CodeGenerator, checkMethodNames, generatePackage } from "./codegen.js";
export type { CodegenDiagnosticCode } from "./diagnostics.js";
export { CODEGEN_DIAGNOSTICS, CodegenError } from "./diagnostics.js";
export type { ToolInfo } from "./framework.js";
export { CODEGEN_NAME, CODEGEN_VERSION, DEFAULT_TOOL, RESERVED_METHOD_NAMES } from "./framework.js";
export type { GeneratedFile, GenerateFileOptions } from "./generate.js";
export { generateFile } from "./generate.js";
export { calculateId, formatId, methodId, serviceId } from "./ids.js";
export type { MethodType, RpcMethod, RpcPackage, RpcService } from "./model.js";
export { METHOD_TYPES, isMethodType, servicePath } from "./model.js";
export { OutputFile } from "./output.js";
export { StubGenerator, generatePackageStubs, selectStubMethods } from "./stubs.js";
