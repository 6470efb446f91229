import { CodeGenerator } from "../codegen.js";
import { BYTE_SPAN_TYPE, RPC_NAMESPACE, clientCallType, methodTypeEnum } from "../framework.js";
import { methodId } from "../ids.js";
import type { RpcMethod } from "../model.js";
import type { OutputFile } from "../output.js";
import { STUB_REQUEST_TODO, STUB_RESPONSE_TODO, StubGenerator } from "../stubs.js";
import { clientParams, responseCallBase, writeClientMemberFunction, writeClientStaticFunction } from "./client-calls.js";

const RAW_PAYLOAD = { request: BYTE_SPAN_TYPE, response: BYTE_SPAN_TYPE } as const;

export function rawOutputFileName(schemaFileName: string): string {
  return `${schemaFileName.replace(/\.[^./]*$/, "")}.raw_rpc.pb.h`;
}

/** Binding whose requests and responses are untyped byte spans. */
export class RawCodeGenerator extends CodeGenerator {
  name(): string {
    return "raw";
  }

  methodUnionName(): string {
    return "RawMethodUnion";
  }

  includes(_schemaFileName: string): Iterable<string> {
    return [
      '#include "svc_rpc/raw/client_reader_writer.h"',
      '#include "svc_rpc/raw/internal/method_union.h"',
      '#include "svc_rpc/raw/server_reader_writer.h"',
    ];
  }

  serviceAliases(): void {
    this.line(`using RawServerWriter = ${RPC_NAMESPACE}::RawServerWriter;`);
    this.line(`using RawServerReader = ${RPC_NAMESPACE}::RawServerReader;`);
    this.line(`using RawServerReaderWriter = ${RPC_NAMESPACE}::RawServerReaderWriter;`);
  }

  methodDescriptor(method: RpcMethod): void {
    this.line(
      `${RPC_NAMESPACE}::internal::GetRawMethodFor<&Implementation::${method.name}, ${methodTypeEnum(method.type)}>(`
    );
    this.line(`    ${methodId(method)}),  // Hash of "${method.name}"`);
  }

  clientMemberFunction(method: RpcMethod): void {
    const returnType = clientCallType(method.type, "Raw");
    writeClientMemberFunction(this, method, {
      returnType,
      params: clientParams(method, RAW_PAYLOAD),
      start: `${RPC_NAMESPACE}::internal::${responseCallBase(method)}::Start<${returnType}>`,
    });
  }

  clientStaticFunction(method: RpcMethod): void {
    writeClientStaticFunction(this, method, {
      returnType: clientCallType(method.type, "Raw"),
      params: clientParams(method, RAW_PAYLOAD),
    });
  }
}

export class RawStubGenerator extends StubGenerator {
  unarySignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(${BYTE_SPAN_TYPE} request, ${RPC_NAMESPACE}::RawUnaryResponder& responder)`;
  }

  unaryStub(_method: RpcMethod, output: OutputFile): void {
    output.line(STUB_REQUEST_TODO);
    output.line("static_cast<void>(request);");
    output.line(STUB_RESPONSE_TODO);
    output.line("static_cast<void>(responder);");
  }

  serverStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(${BYTE_SPAN_TYPE} request, RawServerWriter& writer)`;
  }

  clientStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(RawServerReader& reader)`;
  }

  bidirectionalStreamingSignature(method: RpcMethod, prefix: string): string {
    return `void ${prefix}${method.name}(RawServerReaderWriter& reader_writer)`;
  }
}
