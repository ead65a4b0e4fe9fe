/**
 * Types and interfaces for the requirement conflict checker
 */

import type {VersionRequirement} from "./version-requirement.js"

export type ComparatorOperator = ">=" | "<=" | ">" | "<" | "=" | "~" | "^"

export interface ComparatorClause {
  operator: ComparatorOperator
  version: string
}

export interface PackageSpecifier {
  readonly name: string
  readonly requirement: VersionRequirement
  readonly raw: string
}

export type ConflictResult = "different-packages" | "no-conflict" | "conflict"

export interface ConflictAnalysis {
  result: ConflictResult
  first: PackageSpecifier
  second: PackageSpecifier
  // First probe version accepted by both requirements
  witness?: string
}

export interface LoggerOptions {
  quiet: boolean
  json: boolean
  verbose: boolean
}

export type CliOptions = LoggerOptions

export const COMPARATOR_OPERATORS: readonly ComparatorOperator[] = [">=", "<=", ">", "<", "=", "~", "^"]

export const CONFLICT_RESULTS: Record<ConflictResult, {headline: string; detail?: string}> = {
  "different-packages": {headline: "No conflict: Different packages"},
  "no-conflict": {headline: "No conflict detected", detail: "The version requirements are compatible."},
  conflict: {headline: "CONFLICT DETECTED!", detail: "The version requirements are mutually exclusive."},
}
