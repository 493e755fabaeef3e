import { describe, expect, it } from "vitest";
import {
  BuildError,
  DeclarationSyntaxError,
  ExpansionDepthExceeded,
  MissingDeclarationFileError,
  RecipeFailure,
  UnknownTargetError,
} from "../../errors";

describe("BuildError", () => {
  it("formats missing declaration files", () => {
    expect(new MissingDeclarationFileError("/work").message).toBe(
      "No targets specified and no makefile found in /work"
    );
    expect(new MissingDeclarationFileError("/work", "build.mk").message).toBe(
      "build.mk: No such file or directory"
    );
  });

  it("attaches a location only once", () => {
    const error = new DeclarationSyntaxError("missing separator");
    const located = error.at({ file: "Makefile", line: 3 });

    expect(located.message).toBe("Makefile:3: missing separator");
    expect(located.at({ file: "Makefile", line: 9 })).toBe(located);
  });

  it("trims the expansion chain to its first repeat", () => {
    const error = new ExpansionDepthExceeded(["X", "A", "B", "A", "B"], 4);

    expect(error.path).toEqual(["A", "B", "A"]);
    expect(error.message).toBe("Variable expansion exceeded depth 4: A -> B -> A");
  });

  it("names the dependent of an unknown target", () => {
    expect(new UnknownTargetError("install", "shell").message).toBe(
      "No rule to make target 'install', needed by 'shell'"
    );
  });

  it("exits with the subprocess status for recipe failures", () => {
    const failure = new RecipeFailure(
      "test",
      { file: "Makefile", line: 12 },
      "pytest",
      5
    );

    expect(failure).toBeInstanceOf(BuildError);
    expect(failure.message).toBe("[Makefile:12: test] Error 5");
    expect(failure.exitCode).toBe(5);
    expect(new UnknownTargetError("x").exitCode).toBe(2);
  });
});
