import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { basename, join, resolve } from "node:path";

import { CONFIG_FILE_NAME, writeGeneratorConfig, type GeneratorConfig } from "../config.js";

export type InitArgs = {
  readonly dir: string;
};

function toPackageName(name: string): string {
  const snake = name
    .replace(/[^a-zA-Z0-9]+/g, "_")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
  if (snake.length === 0) return "demo";
  return /^[0-9]/.test(snake) ? `_${snake}` : snake;
}

export async function runInit(args: InitArgs): Promise<void> {
  const root = resolve(args.dir);
  const configPath = join(root, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    throw new Error(`${configPath} already exists.`);
  }

  const packageName = toPackageName(basename(root));
  const schemaPath = join("schemas", `${packageName}.json`);

  mkdirSync(join(root, "schemas"), { recursive: true });

  const config: GeneratorConfig = {
    schema: 1,
    binding: "raw",
    outDir: "generated",
    stubs: true,
    inputs: [schemaPath.replaceAll("\\", "/")],
  };
  writeGeneratorConfig(configPath, config);

  const description = {
    file: `${packageName}/echo.proto`,
    package: packageName,
    services: [
      {
        name: "Echo",
        methods: [{ name: "Say", type: "unary", request: "SayRequest", response: "SayResponse" }],
      },
    ],
  };
  writeFileSync(join(root, schemaPath), JSON.stringify(description, null, 2) + "\n", "utf-8");
}
