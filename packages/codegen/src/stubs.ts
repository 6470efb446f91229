import { readFileSync } from "node:fs";

import type { CodeGenerator } from "./codegen.js";
import { CodegenError } from "./diagnostics.js";
import { GENERATED_ROOT, STUBS_FLAG } from "./framework.js";
import { cppNamespaceOf, methodPath, type RpcMethod, type RpcPackage, type RpcService } from "./model.js";
import type { OutputFile } from "./output.js";

export const STUB_REQUEST_TODO = "// TODO: Read the request as appropriate for your application";
export const STUB_RESPONSE_TODO = "// TODO: Fill in the response as appropriate for your application";
export const STUB_WRITER_TODO = "// TODO: Send responses with the writer as appropriate for your application";
export const STUB_READER_TODO =
  "// TODO: Set the client stream callback and send a response as appropriate for your application";
export const STUB_READER_WRITER_TODO =
  "// TODO: Set the client stream callback and send responses as appropriate for your application";

const STUBS_INTRO: readonly string[] = [
  "// This section provides stub implementations of the RPC services in this file.",
  "// The code below may be referenced or copied to serve as a starting point for",
  "// your RPC service implementations.",
];

let bannerText: string | undefined;

function stubsBanner(): string {
  bannerText ??= readFileSync(new URL("../assets/stubs-banner.txt", import.meta.url), "utf-8").trimEnd();
  return bannerText;
}

/** Produces copy-and-paste starter implementations, one signature/body pair per call shape. */
export abstract class StubGenerator {
  abstract unarySignature(method: RpcMethod, prefix: string): string;

  abstract unaryStub(method: RpcMethod, output: OutputFile): void;

  abstract serverStreamingSignature(method: RpcMethod, prefix: string): string;

  serverStreamingStub(_method: RpcMethod, output: OutputFile): void {
    output.line(STUB_REQUEST_TODO);
    output.line("static_cast<void>(request);");
    output.line(STUB_WRITER_TODO);
    output.line("static_cast<void>(writer);");
  }

  abstract clientStreamingSignature(method: RpcMethod, prefix: string): string;

  clientStreamingStub(_method: RpcMethod, output: OutputFile): void {
    output.line(STUB_READER_TODO);
    output.line("static_cast<void>(reader);");
  }

  abstract bidirectionalStreamingSignature(method: RpcMethod, prefix: string): string;

  bidirectionalStreamingStub(_method: RpcMethod, output: OutputFile): void {
    output.line(STUB_READER_WRITER_TODO);
    output.line("static_cast<void>(reader_writer);");
  }
}

export type StubMethods = {
  readonly signature: (method: RpcMethod, prefix: string) => string;
  readonly stub: (method: RpcMethod, output: OutputFile) => void;
};

export function selectStubMethods(gen: StubGenerator, method: RpcMethod, service?: RpcService): StubMethods {
  const type = method.type;
  switch (type) {
    case "unary":
      return { signature: (m, p) => gen.unarySignature(m, p), stub: (m, o) => gen.unaryStub(m, o) };
    case "server_streaming":
      return {
        signature: (m, p) => gen.serverStreamingSignature(m, p),
        stub: (m, o) => gen.serverStreamingStub(m, o),
      };
    case "client_streaming":
      return {
        signature: (m, p) => gen.clientStreamingSignature(m, p),
        stub: (m, o) => gen.clientStreamingStub(m, o),
      };
    case "bidirectional_streaming":
      return {
        signature: (m, p) => gen.bidirectionalStreamingSignature(m, p),
        stub: (m, o) => gen.bidirectionalStreamingStub(m, o),
      };
    default: {
      const unknown: never = type;
      const name = service ? methodPath(service, method) : method.name;
      throw new CodegenError("SVC2001", `Unrecognized method type ${JSON.stringify(unknown)} for ${name}.`);
    }
  }
}

export function generatePackageStubs(pkg: RpcPackage, gen: CodeGenerator, stubGen: StubGenerator): void {
  const fileNamespace = cppNamespaceOf(pkg);
  const startNamespace = (): void => {
    if (!fileNamespace) return;
    gen.line(`namespace ${fileNamespace} {`);
    gen.line();
  };
  const finishNamespace = (): void => {
    if (!fileNamespace) return;
    gen.line(`}  // namespace ${fileNamespace}`);
    gen.line();
  };

  gen.line(`#ifdef ${STUBS_FLAG}`);
  gen.line();
  gen.line(stubsBanner());
  for (const line of STUBS_INTRO) gen.line(line);
  gen.line();
  gen.line(`#include "${gen.output.name()}"`);
  gen.line();

  startNamespace();
  for (const service of pkg.services) serviceDeclarationStub(service, gen, stubGen);
  gen.line();
  finishNamespace();

  startNamespace();
  for (const service of pkg.services) {
    serviceDefinitionStub(service, gen, stubGen);
    gen.line();
  }
  finishNamespace();

  gen.line(`#endif  // ${STUBS_FLAG}`);
}

function serviceDeclarationStub(service: RpcService, gen: CodeGenerator, stubGen: StubGenerator): void {
  gen.line(`// Implementation class for ${service.protoPath}.`);
  gen.line(
    `class ${service.name} : public ${GENERATED_ROOT}::${gen.name()}::${service.name}::Service<${service.name}> {`
  );
  gen.line(" public:");

  gen.indent(() => {
    service.methods.forEach((method, i) => {
      if (i > 0) gen.line();
      const { signature } = selectStubMethods(stubGen, method, service);
      gen.line(`${signature(method, "")};`);
    });
  });

  gen.line("};");
  gen.line();
}

function serviceDefinitionStub(service: RpcService, gen: CodeGenerator, stubGen: StubGenerator): void {
  gen.line(`// Method definitions for ${service.protoPath}.`);

  service.methods.forEach((method, i) => {
    if (i > 0) gen.line();
    const { signature, stub } = selectStubMethods(stubGen, method, service);
    gen.line(`${signature(method, `${service.name}::`)} {`);
    gen.indent(() => stub(method, gen.output));
    gen.line("}");
  });
}
