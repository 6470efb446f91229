import { expect } from "chai";

import { RawCodeGenerator } from "./bindings/raw.js";
import { CodeGenerator, checkMethodNames, generatePackage } from "./codegen.js";
import { CodegenError } from "./diagnostics.js";
import type { MethodType, RpcMethod, RpcPackage, RpcService } from "./model.js";
import { OutputFile } from "./output.js";

const FIXED_NOW = (): Date => new Date("2024-01-02T03:04:05.000Z");

function method(name: string, type: MethodType = "unary"): RpcMethod {
  return { name, type, requestType: `demo.${name}Request`, responseType: `demo.${name}Response` };
}

function service(name: string, methods: readonly RpcMethod[]): RpcService {
  return { name, protoPath: `demo.${name}`, methods };
}

function pkg(services: readonly RpcService[], cppNamespace?: string): RpcPackage {
  return { name: "demo", fileName: "demo/echo.proto", cppNamespace, services };
}

function renderRaw(p: RpcPackage): string {
  const gen = new RawCodeGenerator({ output: new OutputFile("demo/echo.raw_rpc.pb.h"), now: FIXED_NOW });
  generatePackage(p, gen);
  return gen.output.content();
}

function expectBlock(text: string, lines: readonly string[]): void {
  expect(text).to.contain(lines.join("\n"));
}

// Minimal binding that records where the optional hooks land.
class MarkerGenerator extends CodeGenerator {
  name(): string {
    return "marker";
  }

  methodUnionName(): string {
    return "MarkerMethodUnion";
  }

  includes(schemaFileName: string): Iterable<string> {
    return [`#include "${schemaFileName}.marker.h"`, '#include "svc_rpc/service.h"'];
  }

  serviceAliases(): void {
    this.line("using Alias = int;");
  }

  methodDescriptor(m: RpcMethod): void {
    this.line(`Descriptor(${m.name}),`);
  }

  clientMemberFunction(m: RpcMethod): void {
    this.line(`void ${m.name}() const;`);
  }

  clientStaticFunction(m: RpcMethod): void {
    this.line(`static void ${m.name}();`);
  }

  override methodInfoSpecialization(m: RpcMethod, s: RpcService): void {
    this.line(`// extra for ${s.name}.${m.name}`);
  }

  override privateAdditions(s: RpcService): void {
    this.line(`// private extra for ${s.name}`);
  }
}

describe("@svcgen/codegen package emitter", () => {
  it("writes the banner, include block and binding namespace", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])]));
    expect(text.split("\n").slice(0, 23)).to.deep.equal([
      "// echo.raw_rpc.pb.h automatically generated by svcgen_codegen 0.3.0",
      "// on 2024-01-02T03:04:05.000Z",
      "// clang-format off",
      "#pragma once",
      "",
      "#include <array>",
      "#include <cstdint>",
      "#include <type_traits>",
      "",
      '#include "svc_rpc/internal/method_info.h"',
      '#include "svc_rpc/internal/method_lookup.h"',
      '#include "svc_rpc/internal/service_client.h"',
      '#include "svc_rpc/method_type.h"',
      '#include "svc_rpc/raw/client_reader_writer.h"',
      '#include "svc_rpc/raw/internal/method_union.h"',
      '#include "svc_rpc/raw/server_reader_writer.h"',
      '#include "svc_rpc/service.h"',
      '#include "svc_rpc/service_id.h"',
      "",
      "namespace svc_rpc::raw {",
      "",
      "// Wrapper class that namespaces server and client code for this RPC service.",
      "class Echo final {",
    ]);
  });

  it("emits service and method IDs for a unary service", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])]));

    expectBlock(text, [
      "  static constexpr ::svc::rpc::ServiceId service_id() {",
      "    return ::svc::rpc::internal::WrapServiceId(kServiceId);",
      "  }",
    ]);
    expectBlock(text, [
      "    static constexpr std::array<uint32_t, 1> kMethodIds = {",
      '        0x2dcf9e98,  // Hash of "Say"',
      "    };",
    ]);
    expectBlock(text, [
      " private:",
      '  // Hash of "demo.Echo".',
      "  static constexpr uint32_t kServiceId = 0xe17b31f9;",
      "};",
      "",
      "}  // namespace svc_rpc::raw",
      "",
      "",
      "// Specialize MethodInfo for each RPC to provide metadata at compile time.",
    ]);
  });

  it("writes the complete wrapper class for a unary service", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])]));
    expectBlock(text, [
      "class Echo final {",
      " public:",
      "  Echo() = delete;",
      "",
      "  static constexpr ::svc::rpc::ServiceId service_id() {",
      "    return ::svc::rpc::internal::WrapServiceId(kServiceId);",
      "  }",
      "",
      "  // The RPC service base class.",
      "  // Inherit from this to implement an RPC service for an RPC server.",
      "  template <typename Implementation>",
      "  class Service : public ::svc::rpc::Service {",
      "   public:",
      "    using RawServerWriter = ::svc::rpc::RawServerWriter;",
      "    using RawServerReader = ::svc::rpc::RawServerReader;",
      "    using RawServerReaderWriter = ::svc::rpc::RawServerReaderWriter;",
      "",
      '    static constexpr const char* name() { return "Echo"; }',
      "",
      "    using ServiceInfo = Echo;",
      "",
      "   protected:",
      "    constexpr Service() : ::svc::rpc::Service(kServiceId, kMethods) {}",
      "",
      "   private:",
      "    friend class ::svc::rpc::internal::MethodLookup;",
      "",
      "    static constexpr std::array<::svc::rpc::internal::RawMethodUnion, 1> kMethods = {",
      "        ::svc::rpc::internal::GetRawMethodFor<&Implementation::Say, ::svc::rpc::MethodType::kUnary>(",
      '            0x2dcf9e98),  // Hash of "Say"',
      "    };",
      "",
      "    static constexpr std::array<uint32_t, 1> kMethodIds = {",
      '        0x2dcf9e98,  // Hash of "Say"',
      "    };",
      "  };",
      "",
      "  // The Client is used to invoke RPCs for this service.",
      "  class Client final : public ::svc::rpc::internal::ServiceClient {",
      "   public:",
      "    constexpr Client(::svc::rpc::Client& client, uint32_t channel_id)",
      "        : ServiceClient(client, channel_id) {}",
      "",
      "    using ServiceInfo = Echo;",
      "",
      "    ::svc::rpc::RawUnaryReceiver Say(",
      "        ::svc::ConstByteSpan request,",
      "        ::svc::Function<void(::svc::ConstByteSpan, ::svc::Status)>&& on_completed = nullptr,",
      "        ::svc::Function<void(::svc::Status)>&& on_error = nullptr) const {",
      "      return ::svc::rpc::internal::UnaryResponseClientCall::Start<::svc::rpc::RawUnaryReceiver>(",
      "          client(), channel_id(), service_id(), 0x2dcf9e98, std::move(on_completed), std::move(on_error), request);",
      "    }",
      "  };",
      "",
      "  // Static functions for invoking RPCs on an RPC server. These functions are",
      "  // equivalent to instantiating a Client and calling the corresponding RPC.",
      "  static ::svc::rpc::RawUnaryReceiver Say(",
      "      ::svc::rpc::Client& client,",
      "      uint32_t channel_id,",
      "      ::svc::ConstByteSpan request,",
      "      ::svc::Function<void(::svc::ConstByteSpan, ::svc::Status)>&& on_completed = nullptr,",
      "      ::svc::Function<void(::svc::Status)>&& on_error = nullptr) {",
      "    return Client(client, channel_id).Say(request, std::move(on_completed), std::move(on_error));",
      "  }",
      "",
      " private:",
      '  // Hash of "demo.Echo".',
      "  static constexpr uint32_t kServiceId = 0xe17b31f9;",
      "};",
    ]);
  });

  it("exposes one member and one static client function per method", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])]));
    const lines = text.split("\n");
    expect(lines.filter((l) => l === "    ::svc::rpc::RawUnaryReceiver Say(")).to.have.length(1);
    expect(lines.filter((l) => l === "  static ::svc::rpc::RawUnaryReceiver Say(")).to.have.length(1);
  });

  it("specializes MethodInfo for every method", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])]));
    expectBlock(text, [
      "template <>",
      "struct svc::rpc::internal::MethodInfo<::svc_rpc::raw::Echo::Say> {",
      "  static constexpr uint32_t kServiceId = 0xe17b31f9;",
      "  static constexpr uint32_t kMethodId = 0x2dcf9e98;",
      "  static constexpr ::svc::rpc::MethodType kType = ::svc::rpc::MethodType::kUnary;",
      "",
      "  template <typename ServiceImpl>",
      "  static constexpr auto Function() {",
      "    return &ServiceImpl::Say;",
      "  }",
      "  using GeneratedClient = ::svc_rpc::raw::Echo::Client;",
      "};",
      "",
    ]);
    expect(text.endsWith("};\n\n")).to.equal(true);
  });

  it("wraps the binding namespace in the package namespace", () => {
    const text = renderRaw(pkg([service("Echo", [method("Say")])], "::demo::pb"));
    expectBlock(text, ["namespace demo::pb {", "namespace svc_rpc::raw {", ""]);
    expectBlock(text, ["}  // namespace svc_rpc::raw", "", "}  // namespace demo::pb", ""]);
    expect(text).to.contain("struct svc::rpc::internal::MethodInfo<demo::pb::svc_rpc::raw::Echo::Say> {");
    expect(text).to.contain("  using GeneratedClient = ::demo::pb::svc_rpc::raw::Echo::Client;");
  });

  it("keeps declaration order in tables and metadata", () => {
    const text = renderRaw(
      pkg([service("Store", [method("Get"), method("Watch", "server_streaming")]), service("Other", [method("Ping")])])
    );

    expectBlock(text, [
      "    static constexpr std::array<::svc::rpc::internal::RawMethodUnion, 2> kMethods = {",
      "        ::svc::rpc::internal::GetRawMethodFor<&Implementation::Get, ::svc::rpc::MethodType::kUnary>(",
      '            0x4719c5ed),  // Hash of "Get"',
      "        ::svc::rpc::internal::GetRawMethodFor<&Implementation::Watch, ::svc::rpc::MethodType::kServerStreaming>(",
      '            0x8ba1cad6),  // Hash of "Watch"',
      "    };",
    ]);
    expectBlock(text, [
      "    static constexpr std::array<uint32_t, 2> kMethodIds = {",
      '        0x4719c5ed,  // Hash of "Get"',
      '        0x8ba1cad6,  // Hash of "Watch"',
      "    };",
    ]);

    const infoOrder = text
      .split("\n")
      .filter((l) => l.startsWith("struct svc::rpc::internal::MethodInfo<"))
      .map((l) => l.replace(/^.*<::svc_rpc::raw::/, "").replace(/> \{$/, ""));
    expect(infoOrder).to.deep.equal(["Store::Get", "Store::Watch", "Other::Ping"]);

    expect(text.indexOf("class Store final {")).to.be.lessThan(text.indexOf("class Other final {"));
  });

  it("is deterministic for a fixed clock", () => {
    const p = pkg([service("Echo", [method("Say"), method("Chat", "bidirectional_streaming")])], "demo");
    expect(renderRaw(p)).to.equal(renderRaw(p));
  });

  it("merges, deduplicates and sorts binding includes and runs optional hooks", () => {
    const gen = new MarkerGenerator({ output: new OutputFile("demo/echo.marker.h"), now: FIXED_NOW });
    generatePackage(pkg([service("Echo", [method("Say")])]), gen);
    const text = gen.output.content();

    expectBlock(text, [
      '#include "demo/echo.proto.marker.h"',
      '#include "svc_rpc/internal/method_info.h"',
      '#include "svc_rpc/internal/method_lookup.h"',
      '#include "svc_rpc/internal/service_client.h"',
      '#include "svc_rpc/method_type.h"',
      '#include "svc_rpc/service.h"',
      '#include "svc_rpc/service_id.h"',
      "",
      "namespace svc_rpc::marker {",
    ]);
    expectBlock(text, [
      "  static constexpr uint32_t kServiceId = 0xe17b31f9;",
      "  // private extra for Echo",
      "};",
    ]);
    expectBlock(text, ["  using GeneratedClient = ::svc_rpc::marker::Echo::Client;", "  // extra for Echo.Say", "};"]);
    expectBlock(text, ["    using Alias = int;", "", '    static constexpr const char* name() { return "Echo"; }']);
    expectBlock(text, ["        Descriptor(Say),", "    };"]);
  });

  it("uses the injected tool name and version in the banner", () => {
    const gen = new MarkerGenerator({
      output: new OutputFile("out/echo.h"),
      tool: { name: "custom_gen", version: "9.9.9" },
      now: FIXED_NOW,
    });
    generatePackage(pkg([]), gen);
    expect(gen.output.content().split("\n")[0]).to.equal("// echo.h automatically generated by custom_gen 9.9.9");
  });
});

describe("@svcgen/codegen reserved method names", () => {
  for (const reserved of ["Client", "Service", "ServiceInfo"]) {
    it(`rejects a method named ${reserved}`, () => {
      expect(() => checkMethodNames(service("Echo", [method("Say"), method(reserved)])))
        .to.throw(CodegenError)
        .with.property(
          "message",
          `"demo.Echo.${reserved}" is not a valid method name! The name "${reserved}" is reserved for internal use by svc_rpc.`
        );
    });
  }

  it("fails before any line of the offending service is written", () => {
    const gen = new RawCodeGenerator({ output: new OutputFile("demo/echo.raw_rpc.pb.h"), now: FIXED_NOW });
    let error: unknown;
    try {
      generatePackage(pkg([service("Good", [method("Say")]), service("Bad", [method("ServiceInfo")])]), gen);
    } catch (err) {
      error = err;
    }

    expect(error).to.be.instanceOf(CodegenError);
    expect(error).to.have.property("code", "SVC1001");
    const text = gen.output.content();
    expect(text).to.contain("class Good final {");
    expect(text).to.not.contain("class Bad final {");
    expect(text.trimEnd().split("\n").at(-1)).to.equal("};");
    expect(gen.output.depth()).to.equal(0);
  });

  it("accepts names that only contain a reserved word", () => {
    expect(() => checkMethodNames(service("Echo", [method("GetClient"), method("Services")]))).to.not.throw();
  });
});
