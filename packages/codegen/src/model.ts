export type MethodType =
  | "unary"
  | "server_streaming"
  | "client_streaming"
  | "bidirectional_streaming";

export const METHOD_TYPES: readonly MethodType[] = [
  "unary",
  "server_streaming",
  "client_streaming",
  "bidirectional_streaming",
];

export type RpcMethod = {
  readonly name: string;
  readonly type: MethodType;
  // Fully qualified message names, e.g. "demo.SayRequest".
  readonly requestType: string;
  readonly responseType: string;
};

export type RpcService = {
  readonly name: string;
  readonly protoPath: string;
  readonly methods: readonly RpcMethod[];
};

export type RpcPackage = {
  readonly name: string;
  readonly fileName: string;
  readonly cppNamespace?: string;
  readonly services: readonly RpcService[];
};

export function isMethodType(value: unknown): value is MethodType {
  return typeof value === "string" && (METHOD_TYPES as readonly string[]).includes(value);
}

export function isServerStreaming(type: MethodType): boolean {
  return type === "server_streaming" || type === "bidirectional_streaming";
}

export function isClientStreaming(type: MethodType): boolean {
  return type === "client_streaming" || type === "bidirectional_streaming";
}

export function servicePath(packageName: string, serviceName: string): string {
  return packageName.length === 0 ? serviceName : `${packageName}.${serviceName}`;
}

export function methodPath(service: RpcService, method: RpcMethod): string {
  return `${service.protoPath}.${method.name}`;
}

export function cppNamespaceOf(pkg: RpcPackage): string {
  const ns = pkg.cppNamespace ?? "";
  return ns.startsWith("::") ? ns.slice(2) : ns;
}
