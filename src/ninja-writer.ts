// Ninja build-file writer, following the wrapping and escaping rules of
// ninja's own misc/ninja_syntax.py.

import type { CompiledGraph } from "./compiler.ts";

export function escapePath(word: string): string {
  return word.replace(/\$ /g, "$$$$ ").replace(/ /g, "$$ ").replace(/:/g, "$$:");
}

export class NinjaWriter {
  private readonly lines: string[] = [];

  constructor(private readonly width = 78) {}

  newline(): void {
    this.lines.push("");
  }

  variable(key: string, value: string | undefined, indent = 0): void {
    if (value === undefined) return;
    this.line(`${key} = ${value}`, indent);
  }

  rule(name: string, command: string, description?: string): void {
    this.line(`rule ${name}`);
    this.variable("command", command, 1);
    if (description) this.variable("description", description, 1);
  }

  build(outputs: readonly string[], rule: string, inputs: readonly string[] = []): void {
    const outs = outputs.map(escapePath);
    const ins = inputs.map(escapePath);
    this.line(`build ${outs.join(" ")}: ${[rule, ...ins].join(" ")}`);
  }

  toString(): string {
    return this.lines.map((line) => `${line}\n`).join("");
  }

  /** Odd counts mean the character at `index` is escaped. */
  private dollarsBefore(text: string, index: number): number {
    let count = 0;
    let i = index - 1;
    while (i > 0 && text[i] === "$") {
      count++;
      i--;
    }
    return count;
  }

  private isUnescapedSpace(text: string, index: number): boolean {
    return index < 0 || this.dollarsBefore(text, index) % 2 === 0;
  }

  /** Write `text` word-wrapped at the configured width. */
  private line(text: string, indent = 0): void {
    let leading = "  ".repeat(indent);
    while (leading.length + text.length > this.width) {
      // Rightmost unescaped space that still fits, leaving room for " $"
      const available = this.width - leading.length - " $".length;
      let space = available;
      do {
        space = space > 0 ? text.lastIndexOf(" ", space - 1) : -1;
      } while (!this.isUnescapedSpace(text, space));

      if (space < 0) {
        // Nothing fits: break at the first unescaped space past the limit
        space = available - 1;
        do {
          space = text.indexOf(" ", space + 1);
        } while (!this.isUnescapedSpace(text, space));
      }
      if (space < 0) break;

      this.lines.push(`${leading}${text.slice(0, space)} $`);
      text = text.slice(space + 1);
      leading = "  ".repeat(indent + 2);
    }
    this.lines.push(leading + text);
  }
}

/** Serialize every rule, then every build edge. */
export function renderNinja(graph: CompiledGraph, width: number): string {
  const writer = new NinjaWriter(width);
  for (const rule of graph.rules) {
    writer.rule(rule.name, rule.command, rule.description);
  }
  for (const build of graph.builds) {
    writer.build(build.outputs, build.rule, build.inputs);
  }
  return writer.toString();
}
