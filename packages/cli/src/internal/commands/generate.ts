import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve } from "node:path";

import { generateFile, getBinding, type GeneratedFile } from "@svcgen/codegen";

import { loadConfigContext } from "../config.js";
import { loadPackageDescription } from "../schema.js";

export type GenerateArgs = {
  readonly dir: string;
  readonly now?: () => Date;
  readonly log?: (message: string) => void;
};

export type GenerateResult = {
  readonly written: readonly string[];
};

function normalizePath(p: string): string {
  return p.replaceAll("\\", "/");
}

function outputPathFor(outDir: string, file: GeneratedFile): string {
  const target = resolve(outDir, file.fileName);
  const rel = normalizePath(relative(outDir, target));
  if (rel === ".." || rel.startsWith("../") || isAbsolute(rel)) {
    throw new Error(`Generated file ${JSON.stringify(file.fileName)} resolves outside of ${outDir}.`);
  }
  return target;
}

export async function runGenerate(args: GenerateArgs): Promise<GenerateResult> {
  const log = args.log ?? ((message: string) => console.log(message));
  const { root, config } = loadConfigContext(args.dir);
  const binding = getBinding(config.binding);
  const outDir = resolve(root, config.outDir);

  // Render everything before touching the output directory, so a failing
  // schema leaves no partial output behind.
  const rendered = config.inputs.map((input) => {
    const pkg = loadPackageDescription(resolve(root, input));
    const file = generateFile(pkg, binding, { stubs: config.stubs, now: args.now });
    return { input, path: outputPathFor(outDir, file), file };
  });

  const seen = new Map<string, string>();
  for (const entry of rendered) {
    const prior = seen.get(entry.path);
    if (prior !== undefined) {
      throw new Error(`Inputs ${prior} and ${entry.input} both generate ${entry.file.fileName}.`);
    }
    seen.set(entry.path, entry.input);
  }

  // Stage every file beside its target, then move them into place once all
  // writes have succeeded.
  const staged: string[] = [];
  try {
    for (const { path, file } of rendered) {
      mkdirSync(dirname(path), { recursive: true });
      const temp = `${path}.tmp`;
      staged.push(temp);
      writeFileSync(temp, file.content, "utf-8");
    }
  } catch (err) {
    for (const temp of staged) rmSync(temp, { force: true });
    throw err;
  }

  const written: string[] = [];
  for (const { path } of rendered) {
    renameSync(`${path}.tmp`, path);
    const rel = normalizePath(relative(root, path));
    written.push(rel);
    log(`wrote ${rel}`);
  }
  return { written };
}
