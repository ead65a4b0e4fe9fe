/**
 * Logging utility with support for human-readable and JSON output
 */

import {SpecifierParser} from "./specifier-parser.js"
import {CONFLICT_RESULTS, type ConflictAnalysis, type LoggerOptions, type PackageSpecifier} from "./types.js"

type LogLevel = "info" | "success" | "warn" | "error" | "debug"

export class Logger {
  private options: LoggerOptions

  constructor(options: LoggerOptions) {
    this.options = options
  }

  info(message: string, data?: unknown): void {
    if (this.options.quiet) return
    this.write("info", `ℹ ${message}`, message, data)
  }

  success(message: string, data?: unknown): void {
    if (this.options.quiet) return
    this.write("success", `✅ ${message}`, message, data)
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", `⚠️  ${message}`, message, data)
  }

  error(message: string, data?: unknown): void {
    this.write("error", `❌ ${message}`, message, data)
  }

  debug(message: string, data?: unknown): void {
    if (!this.options.verbose || this.options.quiet) return
    this.write("debug", `🔍 ${message}`, message, data)
  }

  logAnalysis(first: PackageSpecifier, second: PackageSpecifier): void {
    if (this.options.quiet) return

    if (this.options.json) {
      this.info("Analyzing potential conflicts", {
        first: this.describe(first),
        second: this.describe(second),
      })
    } else {
      console.log("\nAnalyzing potential conflicts between:")
      console.log(`  Package 1: ${SpecifierParser.format(first)}`)
      console.log(`  Package 2: ${SpecifierParser.format(second)}\n`)
    }
  }

  /**
   * Report the finding. A conflict is still reported in quiet mode.
   */
  logResult(analysis: ConflictAnalysis): void {
    const {headline, detail} = CONFLICT_RESULTS[analysis.result]
    const conflict = analysis.result === "conflict"
    if (this.options.quiet && !conflict) return

    if (this.options.json) {
      const data = {result: analysis.result, witness: analysis.witness}
      if (conflict) {
        this.warn(headline, data)
      } else {
        this.success(headline, data)
      }
    } else {
      console.log(conflict ? `🚨 ${headline}` : `✅ ${headline}`)
      if (detail) console.log(detail)
    }

    if (analysis.witness !== undefined) {
      this.debug(`Version ${analysis.witness} satisfies both requirements`)
    }
  }

  private describe(spec: PackageSpecifier): {name: string; requirement: string} {
    return {name: spec.name, requirement: spec.requirement.toString()}
  }

  private write(level: LogLevel, text: string, message: string, data: unknown): void {
    if (this.options.json) {
      this.emitJson(level, message, data)
      return
    }

    const print = level === "error" ? console.error : level === "warn" ? console.warn : console.log
    print(text)
    // Errors always carry their payload, other levels only in verbose mode
    if (data !== undefined && (level === "error" || this.options.verbose)) {
      print(JSON.stringify(data, null, 2))
    }
  }

  private emitJson(level: LogLevel, message: string, data: unknown): void {
    const line = JSON.stringify({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    })
    if (level === "error") {
      console.error(line)
    } else {
      console.log(line)
    }
  }
}
