#!/usr/bin/env node

/**
 * CLI entry point for requirement-conflict-checker
 */

import {Command} from "commander"
import {ConflictChecker} from "./conflict-checker.js"
import {isSpecifierParseError} from "./errors.js"
import {Logger} from "./logger.js"
import type {CliOptions} from "./types.js"

interface CommandOptions extends CliOptions {
  pkg1?: string
  pkg2?: string
}

async function main() {
  const program = new Command()

  program
    .name("requirement-conflict-checker")
    .description("Check whether two Python-style package version constraints can be satisfied together")
    .version("0.1.0")

  program
    .argument("[pkg1]", 'First package with version constraint (e.g. "requests>=2.0.0")')
    .argument("[pkg2]", 'Second package with version constraint (e.g. "requests<3.0.0")')
    .option("-1, --pkg1 <spec>", "First package, instead of the first argument")
    .option("-2, --pkg2 <spec>", "Second package, instead of the second argument")
    .option("-q, --quiet", "Only report conflicts and errors", false)
    .option("-j, --json", "Output in JSON format", false)
    .option("-v, --verbose", "Enable verbose logging", false)
    .action((arg1: string | undefined, arg2: string | undefined, options: CommandOptions) => {
      const cliOptions: CliOptions = {
        quiet: options.quiet,
        json: options.json,
        verbose: options.verbose,
      }

      // Flags take their slot, positional arguments fill the remaining ones in order
      const positional = [arg1, arg2].filter((value): value is string => value !== undefined)
      const pkg1 = options.pkg1 ?? positional.shift()
      const pkg2 = options.pkg2 ?? positional.shift()

      if (pkg1 === undefined) return program.error("error: missing required argument 'pkg1'")
      if (pkg2 === undefined) return program.error("error: missing required argument 'pkg2'")
      if (positional.length > 0) return program.error(`error: too many arguments, unexpected '${positional.join(" ")}'`)

      try {
        new ConflictChecker(cliOptions).check(pkg1, pkg2)
      } catch (error) {
        if (!isSpecifierParseError(error)) throw error
        new Logger(cliOptions).error(error.message, cliOptions.verbose ? {kind: error.kind} : undefined)
        process.exitCode = 1
      }
    })

  await program.parseAsync()
}

// Handle unhandled promise rejections
process.on("unhandledRejection", reason => {
  console.error("Unhandled Rejection:", reason)
  process.exit(1)
})

// Handle uncaught exceptions
process.on("uncaughtException", error => {
  console.error("Uncaught Exception:", error.message)
  process.exit(1)
})

main().catch(error => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error))
  process.exit(1)
})
