import { readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";

import { BINDING_NAMES, isBindingName, type BindingName } from "@svcgen/codegen";

export const CONFIG_FILE_NAME = "svcgen.json";

export type GeneratorConfig = {
  readonly schema: 1;
  readonly binding: BindingName;
  readonly outDir: string;
  readonly stubs: boolean;
  readonly inputs: readonly string[];
};

export type ConfigContext = {
  readonly root: string;
  readonly config: GeneratorConfig;
};

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error(`${label} must be a JSON object.`);
  }
  return value as Record<string, unknown>;
}

function assertKnownKeys(
  value: Record<string, unknown>,
  allowed: readonly string[],
  label: string
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new Error(`${label}: unknown key '${key}'.`);
    }
  }
}

function asString(value: unknown, label: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${label} must be a non-empty string.`);
  }
  return value;
}

function asBoolean(value: unknown, label: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${label} must be a boolean.`);
  }
  return value;
}

function asStringArray(value: unknown, label: string): readonly string[] {
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string" && entry.length > 0)) {
    throw new Error(`${label} must be an array of non-empty strings.`);
  }
  return value;
}

export function parseGeneratorConfig(value: unknown): GeneratorConfig {
  const root = asRecord(value, CONFIG_FILE_NAME);
  assertKnownKeys(root, ["schema", "binding", "outDir", "stubs", "inputs"], CONFIG_FILE_NAME);

  if (root.schema !== 1) {
    throw new Error(`Unsupported ${CONFIG_FILE_NAME} schema.`);
  }

  const binding = root.binding;
  if (!isBindingName(binding)) {
    throw new Error(`${CONFIG_FILE_NAME}: 'binding' must be one of ${BINDING_NAMES.map((b) => `'${b}'`).join(", ")}.`);
  }

  const outDir = asString(root.outDir, `${CONFIG_FILE_NAME}: 'outDir'`);
  const stubs = root.stubs === undefined ? true : asBoolean(root.stubs, `${CONFIG_FILE_NAME}: 'stubs'`);
  const inputs = asStringArray(root.inputs, `${CONFIG_FILE_NAME}: 'inputs'`);

  return { schema: 1, binding, outDir, stubs, inputs };
}

function readJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  return JSON.parse(raw) as unknown;
}

export function writeGeneratorConfig(path: string, value: GeneratorConfig): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + "\n", "utf-8");
}

export function findConfigRoot(fromDir: string): string {
  let cur = resolve(fromDir);
  while (true) {
    try {
      readFileSync(join(cur, CONFIG_FILE_NAME), "utf-8");
      return cur;
    } catch {
      // keep walking up
    }
    const parent = dirname(cur);
    if (parent === cur) break;
    cur = parent;
  }
  throw new Error(`Could not find ${CONFIG_FILE_NAME} in this directory or any parent.`);
}

export function loadGeneratorConfig(path: string): GeneratorConfig {
  return parseGeneratorConfig(readJson(path));
}

export function loadConfigContext(fromDir: string): ConfigContext {
  const root = findConfigRoot(fromDir);
  return { root, config: loadGeneratorConfig(join(root, CONFIG_FILE_NAME)) };
}
