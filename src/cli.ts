#!/usr/bin/env node

import ansis from "ansis";
import { parseArgs } from "./core/parser";
import { Runner } from "./execution/runner";

function showHelp(): void {
  console.log(`
${ansis.bold("phaserun")} - A declarative lifecycle task runner

${ansis.bold("Usage:")}
  phaserun [FILE] [flags]        FILE defaults to phaserun.yml

${ansis.bold("Sections (in order):")}
  prebuild, build, postbuild, test, predeploy, deploy, postdeploy, clean
  clean only runs when requested with --section clean

${ansis.bold("Flags:")}
  --cwd <dir>                    Working directory for every command
  --os <windows|linux|macos>     Target platform (forces --dry-run if not the host)
  --section <name>               Run only the named sections (repeatable)
  --dry-run                      Print commands without running them
  --env KEY=VALUE                Pass a variable to every command (repeatable)
  --env-file <file>              Pass variables from a KEY=VALUE file
  --policy <fast_fail|carry_forward>
                                 Override the global execution policy
  -c, --continue                 Same as --policy carry_forward
  -v, --verbose                  More output (-vv traces internals)
  -q, --quiet                    Only print warnings and errors
  -h, --help                     Show this help

${ansis.bold("Examples:")}
  phaserun                              Run prebuild through postdeploy
  phaserun ci.yml --section test        Run only the test section
  phaserun --section clean              Run only the clean section
  phaserun --os windows                 Show what would run on Windows
  `);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    showHelp();
    process.exit(0);
  }

  const runner = new Runner();
  await runner.run(options);
}

main().catch((error) => {
  console.error(ansis.red("Fatal error:"), error instanceof Error ? error.message : error);
  process.exit(1);
});
