/**
 * Main entry point for requirement-conflict-checker
 * Exports the public API for programmatic usage
 */

export {ConflictChecker} from "./conflict-checker.js"
export {ConflictDetector} from "./conflict-detector.js"
export {SpecifierParser} from "./specifier-parser.js"
export {VersionRequirement} from "./version-requirement.js"
export {Logger} from "./logger.js"
export {SpecifierParseError, isSpecifierParseError} from "./errors.js"
export type {ParseErrorKind} from "./errors.js"

export * from "./types.js"
