/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
dtoshape - minimal DTOs and mapping functions from projection lambdas v${VERSION}

USAGE:
  dtoshape <command> [options]

COMMANDS:
  init                      Write a default dtoshape.json
  generate                  Write the generated module
  check                     Report diagnostics without writing

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print errors
  -c, --config <file>       Config file path (default: nearest dtoshape.json)

GENERATE/CHECK OPTIONS:
  -o, --out <file>          Output module path
  -s, --selector <name>     Selector function name (repeatable)
  --null-handling <mode>    guard or optional-chain

INIT OPTIONS:
  -f, --force               Overwrite an existing dtoshape.json

EXIT CODES:
  0  success
  1  usage or configuration error
  2  errors reported by check
  3  no dtoshape.json found
  5  generation failed
`);
};
