import { CodeGenerator } from "../codegen.js";
import { RPC_NAMESPACE, STATUS_TYPE, clientCallType, methodTypeEnum } from "../framework.js";
import { methodId } from "../ids.js";
import { isClientStreaming, type MethodType, type RpcMethod } from "../model.js";
import type { OutputFile } from "../output.js";
import { STUB_REQUEST_TODO, STUB_RESPONSE_TODO, StubGenerator } from "../stubs.js";
import { clientParams, responseCallBase, writeClientMemberFunction, writeClientStaticFunction } from "./client-calls.js";

function schemaStem(schemaFileName: string): string {
  return schemaFileName.replace(/\.[^./]*$/, "");
}

export function nanopbOutputFileName(schemaFileName: string): string {
  return `${schemaStem(schemaFileName)}.rpc.pb.h`;
}

// "demo.v1.SayRequest" -> "demo_v1_SayRequest"
export function nanopbStruct(messageName: string): string {
  return messageName.replace(/^\./, "").replaceAll(".", "_");
}

function nanopbFields(messageName: string): string {
  return `${nanopbStruct(messageName)}_fields`;
}

function serde(method: RpcMethod): string {
  return `${RPC_NAMESPACE}::internal::kNanopbMethodSerde<${nanopbFields(method.requestType)}, ${nanopbFields(method.responseType)}>`;
}

// Nanopb client calls are templated on the message structs they carry.
function nanopbCallType(method: RpcMethod): string {
  const request = nanopbStruct(method.requestType);
  const response = nanopbStruct(method.responseType);
  const args = isClientStreaming(method.type) ? `${request}, ${response}` : response;
  return `${clientCallType(method.type, "Nanopb")}<${args}>`;
}

function payload(method: RpcMethod): { readonly request: string; readonly response: string } {
  return {
    request: `const ${nanopbStruct(method.requestType)}&`,
    response: `const ${nanopbStruct(method.responseType)}&`,
  };
}

/** Binding whose requests and responses are nanopb-generated message structs. */
export class NanopbCodeGenerator extends CodeGenerator {
  name(): string {
    return "nanopb";
  }

  methodUnionName(): string {
    return "NanopbMethodUnion";
  }

  includes(schemaFileName: string): Iterable<string> {
    return [
      '#include "svc_rpc/nanopb/client_reader_writer.h"',
      '#include "svc_rpc/nanopb/internal/method_union.h"',
      '#include "svc_rpc/nanopb/server_reader_writer.h"',
      // Messages and enums of the schema file itself.
      `#include "${schemaStem(schemaFileName)}.pb.h"`,
    ];
  }

  serviceAliases(): void {
    this.line("template <typename Response>");
    this.line(`using ServerWriter = ${RPC_NAMESPACE}::NanopbServerWriter<Response>;`);
    this.line("template <typename Request, typename Response>");
    this.line(`using ServerReader = ${RPC_NAMESPACE}::NanopbServerReader<Request, Response>;`);
    this.line("template <typename Request, typename Response>");
    this.line(`using ServerReaderWriter = ${RPC_NAMESPACE}::NanopbServerReaderWriter<Request, Response>;`);
  }

  methodDescriptor(method: RpcMethod): void {
    const request = nanopbStruct(method.requestType);
    const response = nanopbStruct(method.responseType);
    this.line(
      `${RPC_NAMESPACE}::internal::GetNanopbOrRawMethodFor<&Implementation::${method.name}, ${methodTypeEnum(method.type)}, ${request}, ${response}>(`
    );
    this.indent(() => {
      this.line(`${methodId(method)},  // Hash of "${method.name}"`);
      this.line(`${serde(method)}),`);
    }, 4);
  }

  clientMemberFunction(method: RpcMethod): void {
    const returnType = nanopbCallType(method);
    writeClientMemberFunction(this, method, {
      returnType,
      params: clientParams(method, payload(method)),
      start: `${RPC_NAMESPACE}::internal::Nanopb${responseCallBase(method)}<${nanopbStruct(method.responseType)}>::Start<${returnType}>`,
      extraArgs: [serde(method)],
    });
  }

  clientStaticFunction(method: RpcMethod): void {
    writeClientStaticFunction(this, method, {
      returnType: nanopbCallType(method),
      params: clientParams(method, payload(method)),
    });
  }

  override methodInfoSpecialization(method: RpcMethod): void {
    this.line();
    this.line(`using Request = ${nanopbStruct(method.requestType)};`);
    this.line(`using Response = ${nanopbStruct(method.responseType)};`);
    this.line();
    this.line(`static constexpr const ${RPC_NAMESPACE}::internal::NanopbMethodSerde& serde() {`);
    this.indent(() => this.line(`return ${serde(method)};`));
    this.line("}");
  }
}

function streamingParams(method: RpcMethod, kind: Exclude<MethodType, "unary">): string {
  const request = nanopbStruct(method.requestType);
  const response = nanopbStruct(method.responseType);
  switch (kind) {
    case "server_streaming":
      return `const ${request}& request, ServerWriter<${response}>& writer`;
    case "client_streaming":
      return `ServerReader<${request}, ${response}>& reader`;
    case "bidirectional_streaming":
      return `ServerReaderWriter<${request}, ${response}>& reader_writer`;
  }
}

export class NanopbStubGenerator extends StubGenerator {
  unarySignature(method: RpcMethod, prefix: string): string {
    const request = nanopbStruct(method.requestType);
    const response = nanopbStruct(method.responseType);
    return `${STATUS_TYPE} ${prefix}${method.name}(const ${request}& request, ${response}& response)`;
  }

  unaryStub(_method: RpcMethod, output: OutputFile): void {
    output.line(STUB_REQUEST_TODO);
    output.line("static_cast<void>(request);");
    output.line(STUB_RESPONSE_TODO);
    output.line("static_cast<void>(response);");
    output.line(`return ${STATUS_TYPE}::Unimplemented();`);
  }

  serverStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(${streamingParams(method, "server_streaming")})`;
  }

  clientStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(${streamingParams(method, "client_streaming")})`;
  }

  bidirectionalStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(${streamingParams(method, "bidirectional_streaming")})`;
  }
}
