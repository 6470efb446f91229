import { basename } from "node:path";

export class OutputFile {
  readonly #name: string;
  readonly #indentWidth: number;
  readonly #lines: string[] = [];
  #depth = 0;

  constructor(name: string, indentWidth = 2) {
    this.#name = name;
    this.#indentWidth = indentWidth;
  }

  name(): string {
    return this.#name;
  }

  baseName(): string {
    return basename(this.#name);
  }

  depth(): number {
    return this.#depth;
  }

  line(value = ""): void {
    for (const part of value.split("\n")) {
      this.#lines.push(part.length === 0 ? "" : `${" ".repeat(this.#depth)}${part}`);
    }
  }

  indent<T>(body: () => T, amount = this.#indentWidth): T {
    const prior = this.#depth;
    this.#depth = prior + amount;
    try {
      return body();
    } finally {
      this.#depth = prior;
    }
  }

  indentedList(args: readonly string[], end = ","): void {
    if (args.length === 0) return;
    this.indent(() => {
      args.forEach((arg, i) => this.line(i === args.length - 1 ? `${arg}${end}` : `${arg},`));
    }, 4);
  }

  lineCount(): number {
    return this.#lines.length;
  }

  content(): string {
    return this.#lines.join("\n") + "\n";
  }
}
