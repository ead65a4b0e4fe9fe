/**
 * Parses two specifiers and reports whether their requirements can both be met
 */

import {ConflictDetector} from "./conflict-detector.js"
import {Logger} from "./logger.js"
import {SpecifierParser} from "./specifier-parser.js"
import type {CliOptions, ConflictAnalysis} from "./types.js"

export class ConflictChecker {
  private logger: Logger

  constructor(options: CliOptions) {
    this.logger = new Logger({
      quiet: options.quiet,
      json: options.json,
      verbose: options.verbose,
    })
  }

  /**
   * Throws SpecifierParseError when either side fails to parse, before anything is reported
   */
  check(raw1: string, raw2: string): ConflictAnalysis {
    const first = SpecifierParser.parse(raw1)
    const second = SpecifierParser.parse(raw2)

    this.logger.logAnalysis(first, second)
    if (first.name === second.name) {
      this.logger.debug(`Probing ${ConflictDetector.PROBE_VERSIONS.length} candidate versions`)
    }

    const analysis = ConflictDetector.analyze(first, second)
    this.logger.logResult(analysis)

    return analysis
  }
}
