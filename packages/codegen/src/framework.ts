import type { MethodType } from "./model.js";

export const CODEGEN_NAME = "svcgen_codegen";
export const CODEGEN_VERSION = "0.3.0";

export type ToolInfo = {
  readonly name: string;
  readonly version: string;
};

export const DEFAULT_TOOL: ToolInfo = Object.freeze({ name: CODEGEN_NAME, version: CODEGEN_VERSION });

// Runtime library the generated code links against.
export const RPC_NAMESPACE = "::svc::rpc";
export const GENERATED_ROOT = "svc_rpc";
export const STATUS_TYPE = "::svc::Status";
export const BYTE_SPAN_TYPE = "::svc::ConstByteSpan";
export const FUNCTION_TYPE = "::svc::Function";

export const STUBS_FLAG = "_SVC_RPC_COMPILE_GENERATED_SERVICE_STUBS";

export const RESERVED_METHOD_NAMES: readonly string[] = ["Service", "ServiceInfo", "Client"];

export const STD_INCLUDES: readonly string[] = [
  "#include <array>",
  "#include <cstdint>",
  "#include <type_traits>",
];

export const FRAMEWORK_INCLUDES: readonly string[] = [
  '#include "svc_rpc/internal/method_info.h"',
  '#include "svc_rpc/internal/method_lookup.h"',
  '#include "svc_rpc/internal/service_client.h"',
  '#include "svc_rpc/method_type.h"',
  '#include "svc_rpc/service.h"',
  '#include "svc_rpc/service_id.h"',
];

export function methodTypeEnum(type: MethodType): string {
  switch (type) {
    case "unary":
      return `${RPC_NAMESPACE}::MethodType::kUnary`;
    case "server_streaming":
      return `${RPC_NAMESPACE}::MethodType::kServerStreaming`;
    case "client_streaming":
      return `${RPC_NAMESPACE}::MethodType::kClientStreaming`;
    case "bidirectional_streaming":
      return `${RPC_NAMESPACE}::MethodType::kBidirectionalStreaming`;
  }
}

function callClassName(type: MethodType): string {
  switch (type) {
    case "unary":
      return "UnaryReceiver";
    case "server_streaming":
      return "ClientReader";
    case "client_streaming":
      return "ClientWriter";
    case "bidirectional_streaming":
      return "ClientReaderWriter";
  }
}

// e.g. clientCallType("server_streaming", "Raw") -> "::svc::rpc::RawClientReader"
export function clientCallType(type: MethodType, prefix: string): string {
  return `${RPC_NAMESPACE}::${prefix}${callClassName(type)}`;
}
