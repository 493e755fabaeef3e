import { DeclarationSyntaxError, ExpansionDepthExceeded } from "../errors";
import type { Expansion, Segment, SourceLocation, Variable } from "../types";

export const MAX_EXPANSION_DEPTH = 64;

const CLOSING: Record<string, string> = { "(": ")", "{": "}" };

export interface VariableLookup {
  lookup(name: string): Variable | undefined;
}

export type ExpanderOptions = {
  automatic?: ReadonlyMap<string, string>;
  maxDepth?: number;
  onUndefined?: (name: string) => void;
};

/**
 * Parse `$(NAME)`, `${NAME}`, `$X` and `$$` into text and reference
 * segments. Reference names are parsed recursively, so `$($(KIND)_FLAGS)`
 * yields a reference whose name is itself a reference plus text.
 */
export function parseExpansion(
  source: string,
  location?: SourceLocation
): Expansion {
  const segments: Segment[] = [];
  let text = "";

  const flush = () => {
    if (text) {
      segments.push({ kind: "text", value: text });
      text = "";
    }
  };

  let i = 0;
  while (i < source.length) {
    const char = source[i];
    if (char !== "$") {
      text += char;
      i++;
      continue;
    }

    const next = source[i + 1];
    if (next === undefined) {
      text += "$";
      i++;
    } else if (next === "$") {
      text += "$";
      i += 2;
    } else if (next === "(" || next === "{") {
      const close = findClosing(source, i + 1);
      if (close === -1) {
        throw new DeclarationSyntaxError(
          "unterminated variable reference",
          location
        );
      }
      flush();
      segments.push({
        kind: "reference",
        name: parseExpansion(source.slice(i + 2, close), location),
      });
      i = close + 1;
    } else {
      flush();
      segments.push({
        kind: "reference",
        name: [{ kind: "text", value: next }],
      });
      i += 2;
    }
  }

  flush();
  return segments;
}

function findClosing(source: string, openIndex: number): number {
  const open = source[openIndex];
  const close = open === undefined ? undefined : CLOSING[open];
  if (open === undefined || close === undefined) {
    return -1;
  }

  let depth = 0;
  for (let i = openIndex; i < source.length; i++) {
    const char = source[i];
    if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

export function literal(value: string): Expansion {
  return value ? [{ kind: "text", value }] : [];
}

export class Expander {
  private readonly maxDepth: number;

  constructor(
    private readonly scope: VariableLookup,
    private readonly options: ExpanderOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? MAX_EXPANSION_DEPTH;
  }

  expand(expansion: Expansion): string {
    return this.evaluate(expansion, []);
  }

  expandText(source: string, location?: SourceLocation): string {
    return this.expand(parseExpansion(source, location));
  }

  /**
   * Expand a single variable by name, as `$(NAME)` would.
   */
  valueOf(name: string): string {
    return this.resolve(name, []);
  }

  private evaluate(expansion: Expansion, chain: string[]): string {
    let result = "";
    for (const segment of expansion) {
      if (segment.kind === "text") {
        result += segment.value;
      } else {
        result += this.resolve(this.evaluate(segment.name, chain), chain);
      }
    }
    return result;
  }

  private resolve(name: string, chain: string[]): string {
    const automatic = this.options.automatic?.get(name);
    if (automatic !== undefined) {
      return automatic;
    }

    const variable = this.scope.lookup(name);
    if (!variable) {
      this.options.onUndefined?.(name);
      return "";
    }

    if (chain.length >= this.maxDepth) {
      throw new ExpansionDepthExceeded([...chain, name], this.maxDepth);
    }
    return this.evaluate(variable.value, [...chain, name]);
  }
}
