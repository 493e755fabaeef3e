import ansis from "ansis";

export function showHelp(): void {
  console.log(`
${ansis.bold("makeshift")} - run targets from a make-style control file

${ansis.bold("Usage:")}
  makeshift [options] [NAME=value ...] [target ...]

${ansis.bold("Options:")}
  -f, --file FILE              Read FILE instead of GNUmakefile/makefile/Makefile
  -C, --directory DIR          Change to DIR before doing anything
  -n, --dry-run                Print recipes without running them
  -s, --silent                 Do not echo recipes
  -i, --ignore-errors          Ignore errors from recipes
  -k, --keep-going             Keep going when some targets fail
  -B, --always-make            Remake every target unconditionally
  -q, --question               Run nothing; exit 1 if anything is out of date
  -j, --jobs [N]               Run up to N targets at once
  --prefix[=STR]               Prefix each output line with the target name
  --warn-undefined-variables   Warn when an undefined variable is referenced
  --debug                      Print internal tracing
  -h, --help                   Show this message

${ansis.bold("Examples:")}
  makeshift                        Build the first target in the file
  makeshift test                   Build 'test' and its prerequisites
  makeshift USE_WHEELS=1 setup     Override a variable for this run
  makeshift -n publish             Show what 'publish' would run

Extra options can be set in ${ansis.bold("MAKESHIFTFLAGS")}.
`);
}
