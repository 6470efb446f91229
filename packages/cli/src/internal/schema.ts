import { readFileSync } from "node:fs";

import {
  CodegenError,
  METHOD_TYPES,
  isMethodType,
  servicePath,
  type RpcMethod,
  type RpcPackage,
  type RpcService,
} from "@svcgen/codegen";

// Parses the JSON description of one already-parsed schema file.

type Ctx = {
  readonly source: string;
  readonly packageName: string;
};

function malformed(ctx: Ctx, path: string, message: string): never {
  throw new CodegenError("SVC3001", `${ctx.source}: '${path}' ${message}`);
}

function record(ctx: Ctx, value: unknown, path: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    malformed(ctx, path, "must be a JSON object.");
  }
  return value as Record<string, unknown>;
}

function knownKeys(ctx: Ctx, value: Record<string, unknown>, allowed: readonly string[], path: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) malformed(ctx, path, `has unknown key '${key}'.`);
  }
}

function string(ctx: Ctx, value: unknown, path: string, allowEmpty = false): string {
  if (typeof value !== "string" || (!allowEmpty && value.length === 0)) {
    malformed(ctx, path, allowEmpty ? "must be a string." : "must be a non-empty string.");
  }
  return value;
}

function array(ctx: Ctx, value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) malformed(ctx, path, "must be an array.");
  return value;
}

function identifier(ctx: Ctx, value: unknown, path: string): string {
  const name = string(ctx, value, path);
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) malformed(ctx, path, `must be an identifier, got ${JSON.stringify(name)}.`);
  return name;
}

// A leading "." marks a fully qualified name; anything else, nested names
// included, is relative to the package.
function messageName(ctx: Ctx, value: unknown, path: string): string {
  const name = string(ctx, value, path);
  if (name.startsWith(".")) return name.slice(1);
  if (ctx.packageName.length === 0) return name;
  return `${ctx.packageName}.${name}`;
}

function parseMethod(ctx: Ctx, value: unknown, path: string): RpcMethod {
  const raw = record(ctx, value, path);
  knownKeys(ctx, raw, ["name", "type", "request", "response"], path);
  const name = identifier(ctx, raw.name, `${path}.name`);
  const type = raw.type;
  if (!isMethodType(type)) {
    malformed(ctx, `${path}.type`, `must be one of ${METHOD_TYPES.map((t) => `'${t}'`).join(", ")}.`);
  }
  return {
    name,
    type,
    requestType: messageName(ctx, raw.request, `${path}.request`),
    responseType: messageName(ctx, raw.response, `${path}.response`),
  };
}

function parseService(ctx: Ctx, value: unknown, path: string): RpcService {
  const raw = record(ctx, value, path);
  knownKeys(ctx, raw, ["name", "methods"], path);
  const name = identifier(ctx, raw.name, `${path}.name`);
  const protoPath = servicePath(ctx.packageName, name);

  const methods = array(ctx, raw.methods, `${path}.methods`).map((m, i) => parseMethod(ctx, m, `${path}.methods[${i}]`));
  const seen = new Set<string>();
  for (const method of methods) {
    if (seen.has(method.name)) {
      throw new CodegenError("SVC1002", `${ctx.source}: duplicate method "${protoPath}.${method.name}".`);
    }
    seen.add(method.name);
  }

  return { name, protoPath, methods };
}

export function parsePackageDescription(value: unknown, source: string): RpcPackage {
  const bootstrap: Ctx = { source, packageName: "" };
  const raw = record(bootstrap, value, "$");
  knownKeys(bootstrap, raw, ["file", "package", "cppNamespace", "services"], "$");

  const fileName = string(bootstrap, raw.file, "$.file");
  const packageName = raw.package === undefined ? "" : string(bootstrap, raw.package, "$.package", true);
  if (packageName.length > 0 && !/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/.test(packageName)) {
    malformed(bootstrap, "$.package", `must be a dotted identifier, got ${JSON.stringify(packageName)}.`);
  }
  const cppNamespace =
    raw.cppNamespace === undefined ? undefined : string(bootstrap, raw.cppNamespace, "$.cppNamespace");

  const ctx: Ctx = { source, packageName };
  const services = array(ctx, raw.services, "$.services").map((s, i) => parseService(ctx, s, `$.services[${i}]`));
  const seen = new Set<string>();
  for (const service of services) {
    if (seen.has(service.name)) {
      throw new CodegenError("SVC1003", `${source}: duplicate service "${service.protoPath}".`);
    }
    seen.add(service.name);
  }

  return { name: packageName, fileName, cppNamespace, services };
}

export function loadPackageDescription(path: string): RpcPackage {
  const text = readFileSync(path, "utf-8");
  let value: unknown;
  try {
    value = JSON.parse(text) as unknown;
  } catch (err) {
    throw new CodegenError("SVC3001", `${path}: invalid JSON (${err instanceof Error ? err.message : String(err)}).`);
  }
  return parsePackageDescription(value, path);
}
