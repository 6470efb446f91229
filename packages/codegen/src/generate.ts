import type { Binding } from "./bindings/index.js";
import { generatePackage } from "./codegen.js";
import type { ToolInfo } from "./framework.js";
import type { RpcPackage } from "./model.js";
import { OutputFile } from "./output.js";
import { generatePackageStubs } from "./stubs.js";

export type GenerateFileOptions = {
  readonly stubs?: boolean;
  readonly tool?: ToolInfo;
  readonly now?: () => Date;
};

export type GeneratedFile = {
  // Relative to the output root; also the path the stubs section includes.
  readonly fileName: string;
  readonly content: string;
};

export function generateFile(pkg: RpcPackage, binding: Binding, options: GenerateFileOptions = {}): GeneratedFile {
  const output = new OutputFile(binding.outputFileName(pkg.fileName));
  const gen = binding.createGenerator({ output, tool: options.tool, now: options.now });

  generatePackage(pkg, gen);
  if (options.stubs ?? true) {
    generatePackageStubs(pkg, gen, binding.createStubGenerator());
  }

  return { fileName: output.name(), content: output.content() };
}
