/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
archpack - Apple static library packaging v${VERSION}

USAGE:
  archpack <command> [options]

COMMANDS:
  build [configuration]     Build every architecture and publish the package
                            (configuration defaults to Release)
  sync                      Link declared packages into archpack_packages/
  list                      List the packages in the repository
  recover                   Restore files left mutated by an interrupted build

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: archpack.json)

BUILD OPTIONS:
  -t, --tag <version>       Package version (overrides archpack.json)
  --embed <mode>            binary, source or both (default: binary)
  --min-os <version>        Deployment target
  --arch <arch>             Target architecture (repeatable)
  --repository <dir>        Repository root
  --strict-resources        Fail on resources without the package prefix
  -k, --keep-temp           Keep the build directory

SYNC OPTIONS:
  --repository <dir>        Repository root
  --configuration <name>    Build configuration to link (default: Release)
  --deps <file>             Dependency list (default: archpack-deps.txt)
  --strict                  Fail when a declared package is not found

ENVIRONMENT:
  ARCHPACK_REPOSITORY       Repository root (default: ~/.archpack/repository)

EXAMPLES:
  archpack build
  archpack build Debug --arch arm64
  archpack build -t 2.1.0 --embed both
  archpack sync --configuration Debug
  archpack list
`);
};
