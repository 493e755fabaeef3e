import debug from "debug";
import { DeclarationSyntaxError } from "../errors";
import type {
  AssignmentOperator,
  ConditionalBranch,
  Guard,
  RecipeLine,
  SourceLocation,
  Statement,
} from "../types";

const log = debug("makeshift:parser");

const CONDITIONAL_PATTERN = /^(ifeq|ifneq|ifdef|ifndef)(?=[\s(]|$)(.*)$/;
const ELSE_PATTERN = /^else(?:\s+(.*))?$/;
const ENDIF_PATTERN = /^endif(?:\s.*)?$/;
const EXPORT_PATTERN = /^(export|unexport)(?:\s+(.*))?$/;
const UNSUPPORTED_DIRECTIVE_PATTERN =
  /^(-include|sinclude|include|define|endef|override|undefine|vpath|private)(?:\s|$)/;
const QUOTED_OPERANDS_PATTERN = /^(["'])(.*?)\1\s+(["'])(.*?)\3$/;
const WHITESPACE = /\s/;
const LINE_BREAK = /\r?\n/;

type ConditionalStatement = Extract<Statement, { kind: "conditional" }>;

type Frame = {
  statement: ConditionalStatement;
  body: Statement[];
  line: number;
  sawElse: boolean;
};

type Separator =
  | {
      kind: "assignment";
      operator: AssignmentOperator | "!=";
      start: number;
      end: number;
    }
  | { kind: "rule"; index: number; double: boolean };

export class DeclarationParser {
  constructor(private readonly file = "Makefile") {}

  // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: line classification is one state machine
  parse(source: string): Statement[] {
    const lines = source.split(LINE_BREAK);
    const statements: Statement[] = [];
    const frames: Frame[] = [];
    let inRule = false;

    const emit = (statement: Statement): void => {
      const frame = frames[frames.length - 1];
      (frame ? frame.body : statements).push(statement);
    };

    let index = 0;
    while (index < lines.length) {
      const lineNumber = index + 1;
      const location = this.location(lineNumber);
      const raw = lines[index] ?? "";

      if (raw.startsWith("\t") && inRule) {
        const joined = joinRecipeLines(lines, index);
        index = joined.next;
        const recipe = parseRecipeLine(joined.text.slice(1), lineNumber);
        if (recipe) {
          emit({ kind: "recipe", line: lineNumber, recipe });
        }
        continue;
      }

      const joined = joinLogicalLines(lines, index);
      index = joined.next;
      const line = stripComment(joined.text).trim();
      if (!line) {
        continue;
      }

      const conditional = CONDITIONAL_PATTERN.exec(line);
      if (conditional) {
        const branch: ConditionalBranch = {
          body: [],
          guard: this.parseGuard(conditional[1], conditional[2], location),
        };
        const statement: ConditionalStatement = {
          branches: [branch],
          kind: "conditional",
          line: lineNumber,
        };
        emit(statement);
        frames.push({
          body: branch.body,
          line: lineNumber,
          sawElse: false,
          statement,
        });
        continue;
      }

      const elseMatch = ELSE_PATTERN.exec(line);
      if (elseMatch) {
        this.processElse(frames[frames.length - 1], elseMatch[1], location);
        continue;
      }

      if (ENDIF_PATTERN.test(line)) {
        if (!frames.pop()) {
          throw new DeclarationSyntaxError("extraneous 'endif'", location);
        }
        continue;
      }

      const exportMatch = EXPORT_PATTERN.exec(line);
      if (exportMatch) {
        inRule = false;
        emit(this.parseExport(exportMatch[1], exportMatch[2], location));
        continue;
      }

      const unsupported = UNSUPPORTED_DIRECTIVE_PATTERN.exec(line);
      if (unsupported) {
        throw new DeclarationSyntaxError(
          `unsupported directive '${unsupported[1]}'`,
          location
        );
      }

      const separator = findSeparator(line);
      if (separator?.kind === "assignment") {
        inRule = false;
        emit(this.parseAssignment(line, separator, location, false));
        continue;
      }

      if (separator?.kind === "rule") {
        inRule = true;
        for (const statement of this.parseRule(line, separator, location)) {
          emit(statement);
        }
        continue;
      }

      throw new DeclarationSyntaxError(
        raw.startsWith("\t")
          ? "recipe commences before first target"
          : "missing separator",
        location
      );
    }

    const open = frames[frames.length - 1];
    if (open) {
      throw new DeclarationSyntaxError(
        "missing 'endif'",
        this.location(open.line)
      );
    }

    log(`Parsed ${statements.length} top-level statements from ${this.file}`);
    return statements;
  }

  private location(line: number): SourceLocation {
    return { file: this.file, line };
  }

  private processElse(
    frame: Frame | undefined,
    rest: string | undefined,
    location: SourceLocation
  ): void {
    if (!frame) {
      throw new DeclarationSyntaxError("extraneous 'else'", location);
    }
    if (frame.sawElse) {
      throw new DeclarationSyntaxError(
        "only one 'else' per conditional",
        location
      );
    }

    const chained = rest?.trim();
    if (!chained) {
      const body: Statement[] = [];
      frame.statement.otherwise = body;
      frame.body = body;
      frame.sawElse = true;
      return;
    }

    const conditional = CONDITIONAL_PATTERN.exec(chained);
    if (!conditional) {
      throw new DeclarationSyntaxError(
        "extraneous text after 'else' directive",
        location
      );
    }
    const branch: ConditionalBranch = {
      body: [],
      guard: this.parseGuard(conditional[1], conditional[2], location),
    };
    frame.statement.branches.push(branch);
    frame.body = branch.body;
  }

  private parseGuard(
    keyword: string | undefined,
    rest: string | undefined,
    location: SourceLocation
  ): Guard {
    const text = (rest ?? "").trim();

    if (keyword === "ifdef" || keyword === "ifndef") {
      if (!text || WHITESPACE.test(text)) {
        throw new DeclarationSyntaxError(
          "invalid syntax in conditional",
          location
        );
      }
      return { kind: keyword, name: text };
    }

    const operands = parseOperands(text);
    if (!operands || !(keyword === "ifeq" || keyword === "ifneq")) {
      throw new DeclarationSyntaxError(
        "invalid syntax in conditional",
        location
      );
    }
    return { kind: keyword, left: operands[0], right: operands[1] };
  }

  private parseExport(
    keyword: string | undefined,
    rest: string | undefined,
    location: SourceLocation
  ): Statement {
    const unexport = keyword === "unexport";
    const text = (rest ?? "").trim();
    const separator = text ? findSeparator(text) : undefined;

    if (separator?.kind === "assignment" && !unexport) {
      return this.parseAssignment(text, separator, location, true);
    }
    if (separator) {
      throw new DeclarationSyntaxError(
        `invalid '${keyword ?? "export"}' directive`,
        location
      );
    }
    return { kind: "export", line: location.line, names: text, unexport };
  }

  private parseAssignment(
    line: string,
    separator: Extract<Separator, { kind: "assignment" }>,
    location: SourceLocation,
    exported: boolean
  ): Statement {
    const { operator } = separator;
    if (operator === "!=") {
      throw new DeclarationSyntaxError(
        "shell assignment ('!=') is not supported",
        location
      );
    }

    const name = line.slice(0, separator.start).trim();
    if (!name) {
      throw new DeclarationSyntaxError("empty variable name", location);
    }
    if (WHITESPACE.test(name)) {
      throw new DeclarationSyntaxError(
        `invalid variable name '${name}'`,
        location
      );
    }

    return {
      exported,
      kind: "assignment",
      line: location.line,
      name,
      operator,
      value: line.slice(separator.end).trim(),
    };
  }

  private parseRule(
    line: string,
    separator: Extract<Separator, { kind: "rule" }>,
    location: SourceLocation
  ): Statement[] {
    if (separator.double) {
      throw new DeclarationSyntaxError(
        "double-colon rules are not supported",
        location
      );
    }

    const targets = line.slice(0, separator.index).trim();
    if (!targets) {
      throw new DeclarationSyntaxError("missing target name", location);
    }
    if (targets.includes("%")) {
      throw new DeclarationSyntaxError(
        "pattern rules are not supported",
        location
      );
    }

    let rest = line.slice(separator.index + 1);
    let inline: string | undefined;
    const semicolon = rest.indexOf(";");
    if (semicolon !== -1) {
      inline = rest.slice(semicolon + 1);
      rest = rest.slice(0, semicolon);
    }

    const nested = findSeparator(rest);
    if (nested?.kind === "assignment") {
      throw new DeclarationSyntaxError(
        "target-specific variables are not supported",
        location
      );
    }
    if (nested?.kind === "rule") {
      throw new DeclarationSyntaxError(
        "static pattern rules are not supported",
        location
      );
    }

    const pipe = rest.indexOf("|");
    const statements: Statement[] = [
      {
        kind: "rule",
        line: location.line,
        orderOnly: pipe === -1 ? "" : rest.slice(pipe + 1).trim(),
        prerequisites: (pipe === -1 ? rest : rest.slice(0, pipe)).trim(),
        targets,
      },
    ];

    const recipe = inline ? parseRecipeLine(inline, location.line) : undefined;
    if (recipe) {
      statements.push({ kind: "recipe", line: location.line, recipe });
    }
    return statements;
  }
}

export function parseDeclarations(
  source: string,
  file = "Makefile"
): Statement[] {
  const parser = new DeclarationParser(file);
  return parser.parse(source);
}

/**
 * Split off `@`, `-` and `+` markers; returns undefined for a line with no
 * command left.
 */
export function parseRecipeLine(
  text: string,
  line: number
): RecipeLine | undefined {
  let silent = false;
  let ignoreErrors = false;
  let always = false;

  let i = 0;
  for (; i < text.length; i++) {
    const char = text[i];
    if (char === "@") {
      silent = true;
    } else if (char === "-") {
      ignoreErrors = true;
    } else if (char === "+") {
      always = true;
    } else if (char !== " " && char !== "\t") {
      break;
    }
  }

  const command = text.slice(i);
  if (!command.trim()) {
    return undefined;
  }
  return { always, ignoreErrors, line, silent, text: command };
}

function endsWithContinuation(text: string): boolean {
  let count = 0;
  for (let i = text.length - 1; i >= 0 && text[i] === "\\"; i--) {
    count++;
  }
  return count % 2 === 1;
}

function joinLogicalLines(
  lines: string[],
  start: number
): { text: string; next: number } {
  let text = lines[start] ?? "";
  let next = start + 1;
  while (endsWithContinuation(text) && next < lines.length) {
    text = `${text.slice(0, -1).trimEnd()} ${(lines[next] ?? "").trimStart()}`;
    next++;
  }
  return { next, text };
}

// Recipe continuations reach the shell unchanged, minus one leading tab.
function joinRecipeLines(
  lines: string[],
  start: number
): { text: string; next: number } {
  let text = lines[start] ?? "";
  let next = start + 1;
  while (endsWithContinuation(text) && next < lines.length) {
    const line = lines[next] ?? "";
    text += `\n${line.startsWith("\t") ? line.slice(1) : line}`;
    next++;
  }
  return { next, text };
}

function stripComment(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === "\\" && text[i + 1] === "#") {
      result += "#";
      i++;
    } else if (char === "#") {
      break;
    } else {
      result += char;
    }
  }
  return result;
}

function findSeparator(line: string): Separator | undefined {
  let depth = 0;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const next = line[i + 1];

    if (depth > 0) {
      if (char === "(" || char === "{") {
        depth++;
      } else if (char === ")" || char === "}") {
        depth--;
      }
      continue;
    }

    if (char === "$") {
      if (next === "(" || next === "{") {
        depth++;
      }
      i++;
      continue;
    }

    if (char === "=") {
      const previous = line[i - 1];
      if (previous === "?" || previous === "+" || previous === "!") {
        return {
          end: i + 1,
          kind: "assignment",
          operator: previous === "?" ? "?=" : previous === "+" ? "+=" : "!=",
          start: i - 1,
        };
      }
      return { end: i + 1, kind: "assignment", operator: "=", start: i };
    }

    if (char === ":") {
      if (next === "=") {
        return { end: i + 2, kind: "assignment", operator: ":=", start: i };
      }
      if (next === ":" && line[i + 2] === "=") {
        return { end: i + 3, kind: "assignment", operator: "::=", start: i };
      }
      return { double: next === ":", index: i, kind: "rule" };
    }
  }

  return undefined;
}

function parseOperands(text: string): [string, string] | undefined {
  if (text.startsWith("(") && text.endsWith(")")) {
    const inner = text.slice(1, -1);
    let depth = 0;
    for (let i = 0; i < inner.length; i++) {
      const char = inner[i];
      if (char === "(" || char === "{") {
        depth++;
      } else if (char === ")" || char === "}") {
        depth--;
      } else if (char === "," && depth === 0) {
        return [inner.slice(0, i).trim(), inner.slice(i + 1).trim()];
      }
    }
    return undefined;
  }

  const quoted = QUOTED_OPERANDS_PATTERN.exec(text);
  if (quoted) {
    return [quoted[2] ?? "", quoted[4] ?? ""];
  }
  return undefined;
}
