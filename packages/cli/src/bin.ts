#!/usr/bin/env -S node --import tsx
import { argv, cwd, exit } from "node:process";
import { pathToFileURL } from "node:url";

import { CodegenError } from "@svcgen/codegen";

import { runGenerate } from "./internal/commands/generate.js";
import { runInit } from "./internal/commands/init.js";

export type Cmd = "init" | "generate" | "help";

function usage(): void {
  console.log(
    [
      "svcgen",
      "",
      "Usage:",
      "  svcgen init",
      "  svcgen generate",
      "",
      "generate reads svcgen.json from the current directory or a parent.",
      "",
    ].join("\n")
  );
}

export function parseCommand(args: readonly string[]): Cmd | undefined {
  const [cmd] = args;
  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") return "help";
  if (cmd === "init" || cmd === "generate") return cmd;
  return undefined;
}

export function formatError(err: unknown): string {
  if (err instanceof CodegenError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

async function main(): Promise<void> {
  try {
    const cmd = parseCommand(argv.slice(2));
    switch (cmd) {
      case "init":
        await runInit({ dir: cwd() });
        return;
      case "generate":
        await runGenerate({ dir: cwd() });
        return;
      case "help":
        usage();
        return;
      case undefined:
        usage();
        exit(1);
    }
  } catch (err: unknown) {
    console.error(formatError(err));
    exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
