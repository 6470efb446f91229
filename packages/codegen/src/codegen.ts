import { fail } from "./diagnostics.js";
import {
  DEFAULT_TOOL,
  FRAMEWORK_INCLUDES,
  GENERATED_ROOT,
  RESERVED_METHOD_NAMES,
  RPC_NAMESPACE,
  STD_INCLUDES,
  methodTypeEnum,
  type ToolInfo,
} from "./framework.js";
import { methodId, serviceId } from "./ids.js";
import { cppNamespaceOf, methodPath, type RpcMethod, type RpcPackage, type RpcService } from "./model.js";
import { OutputFile } from "./output.js";

export type CodeGeneratorOptions = {
  readonly output: OutputFile;
  readonly tool?: ToolInfo;
  readonly now?: () => Date;
};

/**
 * Emits the binding-specific parts of a generated RPC header.
 *
 * The traversal in {@link generatePackage} is written once against this class;
 * each binding supplies naming, includes, method descriptors and the client
 * call surfaces.
 */
export abstract class CodeGenerator {
  readonly output: OutputFile;
  readonly tool: ToolInfo;
  readonly #now: () => Date;

  constructor(options: CodeGeneratorOptions) {
    this.output = options.output;
    this.tool = options.tool ?? DEFAULT_TOOL;
    this.#now = options.now ?? (() => new Date());
  }

  now(): Date {
    return this.#now();
  }

  line(value = ""): void {
    this.output.line(value);
  }

  indent<T>(body: () => T, amount?: number): T {
    return this.output.indent(body, amount);
  }

  indentedList(args: readonly string[], end = ","): void {
    this.output.indentedList(args, end);
  }

  /** Short name of the binding; also the innermost generated namespace. */
  abstract name(): string;

  abstract methodUnionName(): string;

  abstract includes(schemaFileName: string): Iterable<string>;

  abstract serviceAliases(): void;

  abstract methodDescriptor(method: RpcMethod, service: RpcService): void;

  abstract clientMemberFunction(method: RpcMethod, service: RpcService): void;

  abstract clientStaticFunction(method: RpcMethod, service: RpcService): void;

  /** Extra members for the MethodInfo specialization. Empty by default. */
  methodInfoSpecialization(_method: RpcMethod, _service: RpcService): void {}

  /** Extra members for the private section of the wrapper class. Empty by default. */
  privateAdditions(_service: RpcService): void {}
}

export function checkMethodNames(service: RpcService): void {
  for (const method of service.methods) {
    if (RESERVED_METHOD_NAMES.includes(method.name)) {
      fail(
        "SVC1001",
        `"${methodPath(service, method)}" is not a valid method name! The name "${method.name}" is reserved for internal use by ${GENERATED_ROOT}.`
      );
    }
  }
}

export function generatePackage(pkg: RpcPackage, gen: CodeGenerator): void {
  gen.line(`// ${gen.output.baseName()} automatically generated by ${gen.tool.name} ${gen.tool.version}`);
  gen.line(`// on ${gen.now().toISOString()}`);
  gen.line("// clang-format off");
  gen.line("#pragma once");
  gen.line();

  for (const include of STD_INCLUDES) gen.line(include);
  gen.line();

  const includes = [...new Set([...FRAMEWORK_INCLUDES, ...gen.includes(pkg.fileName)])].sort();
  for (const include of includes) gen.line(include);
  gen.line();

  const fileNamespace = cppNamespaceOf(pkg);
  if (fileNamespace) gen.line(`namespace ${fileNamespace} {`);

  gen.line(`namespace ${GENERATED_ROOT}::${gen.name()} {`);
  gen.line();

  for (const service of pkg.services) generateServiceAndClient(gen, service);

  gen.line();
  gen.line(`}  // namespace ${GENERATED_ROOT}::${gen.name()}`);
  gen.line();

  if (fileNamespace) gen.line(`}  // namespace ${fileNamespace}`);

  gen.line();
  gen.line("// Specialize MethodInfo for each RPC to provide metadata at compile time.");
  for (const service of pkg.services) generateMethodInfo(gen, fileNamespace, service);
}

function generateServiceAndClient(gen: CodeGenerator, service: RpcService): void {
  checkMethodNames(service);

  gen.line("// Wrapper class that namespaces server and client code for this RPC service.");
  gen.line(`class ${service.name} final {`);
  gen.line(" public:");

  gen.indent(() => {
    gen.line(`${service.name}() = delete;`);
    gen.line();

    gen.line(`static constexpr ${RPC_NAMESPACE}::ServiceId service_id() {`);
    gen.indent(() => gen.line(`return ${RPC_NAMESPACE}::internal::WrapServiceId(kServiceId);`));
    gen.line("}");
    gen.line();

    generateService(gen, service);
    gen.line();
    generateClient(gen, service);
  });

  gen.line(" private:");

  gen.indent(() => {
    gen.line(`// Hash of "${service.protoPath}".`);
    gen.line(`static constexpr uint32_t kServiceId = ${serviceId(service)};`);
    gen.privateAdditions(service);
  });

  gen.line("};");
}

function generateService(gen: CodeGenerator, service: RpcService): void {
  const baseClass = `${RPC_NAMESPACE}::Service`;
  gen.line("// The RPC service base class.");
  gen.line("// Inherit from this to implement an RPC service for an RPC server.");
  gen.line("template <typename Implementation>");
  gen.line(`class Service : public ${baseClass} {`);
  gen.line(" public:");

  gen.indent(() => {
    gen.serviceAliases();
    gen.line();
    gen.line(`static constexpr const char* name() { return "${service.name}"; }`);
    gen.line();
    gen.line(`using ServiceInfo = ${service.name};`);
    gen.line();
  });

  gen.line(" protected:");
  gen.indent(() => gen.line(`constexpr Service() : ${baseClass}(kServiceId, kMethods) {}`));
  gen.line();
  gen.line(" private:");

  gen.indent(() => {
    gen.line(`friend class ${RPC_NAMESPACE}::internal::MethodLookup;`);
    gen.line();

    gen.line(
      `static constexpr std::array<${RPC_NAMESPACE}::internal::${gen.methodUnionName()}, ${service.methods.length}> kMethods = {`
    );
    gen.indent(() => {
      for (const method of service.methods) gen.methodDescriptor(method, service);
    }, 4);
    gen.line("};");
    gen.line();

    generateMethodLookupTable(gen, service);
  });

  gen.line("};");
}

// Raw method IDs, parallel to kMethods, for compile-time lookup.
function generateMethodLookupTable(gen: CodeGenerator, service: RpcService): void {
  gen.line(`static constexpr std::array<uint32_t, ${service.methods.length}> kMethodIds = {`);
  gen.indent(() => {
    for (const method of service.methods) {
      gen.line(`${methodId(method)},  // Hash of "${method.name}"`);
    }
  }, 4);
  gen.line("};");
}

function generateClient(gen: CodeGenerator, service: RpcService): void {
  gen.line("// The Client is used to invoke RPCs for this service.");
  gen.line(`class Client final : public ${RPC_NAMESPACE}::internal::ServiceClient {`);
  gen.line(" public:");

  gen.indent(() => {
    gen.line(`constexpr Client(${RPC_NAMESPACE}::Client& client, uint32_t channel_id)`);
    gen.line("    : ServiceClient(client, channel_id) {}");
    gen.line();
    gen.line(`using ServiceInfo = ${service.name};`);

    for (const method of service.methods) {
      gen.line();
      gen.clientMemberFunction(method, service);
    }
  });

  gen.line("};");
  gen.line();

  gen.line("// Static functions for invoking RPCs on an RPC server. These functions are");
  gen.line("// equivalent to instantiating a Client and calling the corresponding RPC.");
  for (const method of service.methods) {
    gen.clientStaticFunction(method, service);
    gen.line();
  }
}

function generateMethodInfo(gen: CodeGenerator, namespace: string, service: RpcService): void {
  const id = serviceId(service);
  const info = `struct ${RPC_NAMESPACE.slice(2)}::internal::MethodInfo`;
  const generated = `${namespace}::${GENERATED_ROOT}::${gen.name()}::${service.name}`;
  const client = `${namespace ? `::${namespace}` : ""}::${GENERATED_ROOT}::${gen.name()}::${service.name}::Client`;

  for (const method of service.methods) {
    gen.line("template <>");
    gen.line(`${info}<${generated}::${method.name}> {`);

    gen.indent(() => {
      gen.line(`static constexpr uint32_t kServiceId = ${id};`);
      gen.line(`static constexpr uint32_t kMethodId = ${methodId(method)};`);
      gen.line(`static constexpr ${RPC_NAMESPACE}::MethodType kType = ${methodTypeEnum(method.type)};`);
      gen.line();

      gen.line("template <typename ServiceImpl>");
      gen.line("static constexpr auto Function() {");
      gen.indent(() => gen.line(`return &ServiceImpl::${method.name};`));
      gen.line("}");

      gen.line(`using GeneratedClient = ${client};`);

      gen.methodInfoSpecialization(method, service);
    });

    gen.line("};");
    gen.line();
  }
}
