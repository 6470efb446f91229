import type { CodeGenerator } from "../codegen.js";
import { FUNCTION_TYPE, RPC_NAMESPACE, STATUS_TYPE } from "../framework.js";
import { methodId } from "../ids.js";
import { isClientStreaming, isServerStreaming, type RpcMethod } from "../model.js";

export type ClientParam = {
  readonly type: string;
  readonly name: string;
  readonly callback: boolean;
};

export type ClientPayloadTypes = {
  // Parameter type for the outgoing request, e.g. "::svc::ConstByteSpan".
  readonly request: string;
  // Callback argument type for one incoming response.
  readonly response: string;
};

function callback(signature: string, name: string): ClientParam {
  return { type: `${FUNCTION_TYPE}<${signature}>&&`, name, callback: true };
}

export function clientParams(method: RpcMethod, payload: ClientPayloadTypes): readonly ClientParam[] {
  const params: ClientParam[] = [];
  if (!isClientStreaming(method.type)) {
    params.push({ type: payload.request, name: "request", callback: false });
  }
  if (isServerStreaming(method.type)) {
    params.push(callback(`void(${payload.response})`, "on_next"));
    params.push(callback(`void(${STATUS_TYPE})`, "on_completed"));
  } else {
    params.push(callback(`void(${payload.response}, ${STATUS_TYPE})`, "on_completed"));
  }
  params.push(callback(`void(${STATUS_TYPE})`, "on_error"));
  return params;
}

function declare(param: ClientParam): string {
  return param.callback ? `${param.type} ${param.name} = nullptr` : `${param.type} ${param.name}`;
}

function forward(param: ClientParam): string {
  return param.callback ? `std::move(${param.name})` : param.name;
}

// The ClientCall base that starts a call of this shape.
export function responseCallBase(method: RpcMethod): string {
  return isServerStreaming(method.type) ? "StreamResponseClientCall" : "UnaryResponseClientCall";
}

export function writeClientMemberFunction(
  gen: CodeGenerator,
  method: RpcMethod,
  options: {
    readonly returnType: string;
    readonly params: readonly ClientParam[];
    readonly start: string;
    readonly extraArgs?: readonly string[];
  }
): void {
  const callbacks = options.params.filter((p) => p.callback).map(forward);
  const request = options.params.filter((p) => !p.callback).map(forward);
  const args = [
    "client()",
    "channel_id()",
    "service_id()",
    methodId(method),
    ...(options.extraArgs ?? []),
    ...callbacks,
    ...request,
  ];

  gen.line(`${options.returnType} ${method.name}(`);
  gen.indentedList(options.params.map(declare), ") const {");
  gen.indent(() => {
    gen.line(`return ${options.start}(`);
    gen.line(`    ${args.join(", ")});`);
  });
  gen.line("}");
}

export function writeClientStaticFunction(
  gen: CodeGenerator,
  method: RpcMethod,
  options: { readonly returnType: string; readonly params: readonly ClientParam[] }
): void {
  gen.line(`static ${options.returnType} ${method.name}(`);
  gen.indentedList(
    [`${RPC_NAMESPACE}::Client& client`, "uint32_t channel_id", ...options.params.map(declare)],
    ") {"
  );
  gen.indent(() => {
    gen.line(`return Client(client, channel_id).${method.name}(${options.params.map(forward).join(", ")});`);
  });
  gen.line("}");
}
