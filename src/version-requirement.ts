/**
 * Version requirements made of comparator clauses, matched with semver
 */

import * as semver from "semver"
import {SpecifierParseError} from "./errors.js"
import {COMPARATOR_OPERATORS, type ComparatorClause, type ComparatorOperator} from "./types.js"

/**
 * A clause whose version numbers are too large for semver, kept as digit strings
 */
interface OversizedClause {
  operator: ComparatorOperator
  numbers: string[]
}

export class VersionRequirement {
  private static readonly CLAUSE = /^([<>=~^!]*) *([^ ]+)$/
  private static readonly VERSION =
    /^(0|[1-9]\d*|[*xX])(?:\.(0|[1-9]\d*|[*xX])(?:\.(0|[1-9]\d*|[*xX])(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?)?)?$/
  private static readonly WILDCARD = /^[*xX]$/
  private static readonly BLANK = /^ *$/
  private static readonly EDGE_SPACES = /^ +| +$/g
  // Version numbers are unsigned 64-bit
  private static readonly MAX_NUMBER = "18446744073709551615"
  private static readonly MAX_SAFE_NUMBER = String(Number.MAX_SAFE_INTEGER)
  private static readonly ANY = new VersionRequirement([], undefined, [])

  readonly clauses: readonly ComparatorClause[]
  private readonly range: semver.Range | undefined
  private readonly oversized: readonly OversizedClause[]

  private constructor(clauses: ComparatorClause[], range: semver.Range | undefined, oversized: OversizedClause[]) {
    this.clauses = Object.freeze(clauses)
    this.range = range
    this.oversized = Object.freeze(oversized)
  }

  /**
   * The unconstrained requirement, matching every version
   */
  static any(): VersionRequirement {
    return this.ANY
  }

  /**
   * Parse comma separated comparator clauses, all of which must hold
   */
  static parse(text: string): VersionRequirement {
    if (this.BLANK.test(text)) return this.ANY

    const parts = text.split(",").map(part => part.replace(this.EDGE_SPACES, ""))
    if (parts.length === 1 && this.WILDCARD.test(parts[0] ?? "")) return this.ANY

    const clauses: ComparatorClause[] = []
    const sources: string[] = []
    const oversized: OversizedClause[] = []

    for (const part of parts) {
      const {clause, numbers} = this.parseClause(part, text)
      clauses.push(clause)

      if (numbers.some(number => this.compareDigits(number, this.MAX_SAFE_NUMBER) >= 0)) {
        oversized.push({operator: clause.operator, numbers})
        continue
      }

      const source = `${clause.operator}${clause.version}`
      if (semver.validRange(source) === null) {
        throw new SpecifierParseError("InvalidRequirement", text)
      }
      sources.push(source)
    }

    // One range for all clauses, so a pre-release allowed by any clause is considered by every clause
    const range = sources.length > 0 ? new semver.Range(sources.join(" ")) : undefined
    return new VersionRequirement(clauses, range, oversized)
  }

  private static parseClause(part: string, text: string): {clause: ComparatorClause; numbers: string[]} {
    const match = part.match(this.CLAUSE)
    if (!match) {
      throw new SpecifierParseError("InvalidRequirement", text)
    }

    const [, operatorText = "", version = ""] = match

    // A bare "*" only stands on its own
    if (operatorText === "" && this.WILDCARD.test(version)) {
      throw new SpecifierParseError("InvalidRequirement", text)
    }

    const operator: ComparatorOperator | undefined =
      operatorText === "" ? "^" : COMPARATOR_OPERATORS.find(candidate => candidate === operatorText)
    if (!operator) {
      throw new SpecifierParseError("InvalidRequirement", text)
    }

    const components = this.VERSION.exec(version)
    if (!components) {
      throw new SpecifierParseError("InvalidRequirement", text)
    }

    const [, major = "", minor, patch, prerelease, build] = components
    const parts = [major, minor, patch].filter((component): component is string => component !== undefined)
    const wildcardAt = parts.findIndex(component => this.WILDCARD.test(component))
    const numbers = wildcardAt === -1 ? parts : parts.slice(0, wildcardAt)

    if (wildcardAt !== -1) {
      const onlyWildcardsAfter = parts.slice(wildcardAt).every(component => this.WILDCARD.test(component))
      if (!onlyWildcardsAfter || prerelease !== undefined || build !== undefined) {
        throw new SpecifierParseError("InvalidRequirement", text)
      }
    }

    if (numbers.some(number => this.compareDigits(number, this.MAX_NUMBER) > 0)) {
      throw new SpecifierParseError("InvalidRequirement", text)
    }

    return {clause: {operator, version}, numbers}
  }

  /**
   * Compare unsigned decimal strings without leading zeros
   */
  private static compareDigits(a: string, b: string): number {
    if (a.length !== b.length) return a.length < b.length ? -1 : 1
    if (a === b) return 0
    return a < b ? -1 : 1
  }

  private static comparePrefix(candidate: string[], numbers: string[], length: number): number {
    for (let i = 0; i < length; i++) {
      const order = this.compareDigits(candidate[i] ?? "0", numbers[i] ?? "0")
      if (order !== 0) return order
    }
    return 0
  }

  private static matchesOversized(clause: OversizedClause, version: semver.SemVer): boolean {
    // A pre-release never shares its major.minor.patch with an oversized clause
    if (version.prerelease.length > 0) return false

    const candidate = [version.major, version.minor, version.patch].map(String)
    const {operator, numbers} = clause
    const order = this.comparePrefix(candidate, numbers, numbers.length)

    switch (operator) {
      case "=":
        return order === 0
      case ">":
        return order > 0
      case ">=":
        return order >= 0
      case "<":
        return order < 0
      case "<=":
        return order <= 0
      case "~":
        return this.comparePrefix(candidate, numbers, Math.min(numbers.length, 2)) === 0 && order >= 0
      case "^": {
        const firstNonZero = numbers.findIndex(number => number !== "0")
        const fixed = firstNonZero === -1 ? numbers.length : firstNonZero + 1
        return this.comparePrefix(candidate, numbers, fixed) === 0 && order >= 0
      }
    }
  }

  isAny(): boolean {
    return this.clauses.length === 0
  }

  /**
   * Check whether a version satisfies every clause. Invalid versions match nothing.
   */
  matches(version: string | semver.SemVer): boolean {
    const parsed = semver.parse(version)
    if (!parsed) return false

    if (this.range && !this.range.test(parsed)) return false
    return this.oversized.every(clause => VersionRequirement.matchesOversized(clause, parsed))
  }

  toString(): string {
    if (this.isAny()) return "*"
    return this.clauses.map(clause => `${clause.operator}${clause.version}`).join(", ")
  }
}
