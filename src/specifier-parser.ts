/**
 * Parser for Python-style package specifiers such as "requests>=2.0.0"
 */

import {SpecifierParseError, isSpecifierParseError} from "./errors.js"
import type {PackageSpecifier} from "./types.js"
import {VersionRequirement} from "./version-requirement.js"

export class SpecifierParser {
  private static readonly SPECIFIER = /^([A-Za-z0-9_-]+)([^\n]*)$/
  private static readonly BLANK = /^ *$/

  // Applied in order, left to right
  private static readonly OPERATOR_TRANSLATIONS: ReadonlyArray<readonly [string, string]> = [
    [">=", ">="],
    ["<=", "<="],
    ["==", "="],
    ["~=", "~"],
    ["!=", "!"],
  ]

  /**
   * Parse a raw specifier into a package name and version requirement
   */
  static parse(raw: string): PackageSpecifier {
    const match = raw.match(this.SPECIFIER)
    const name = match?.[1]
    const versionStr = match?.[2] ?? ""
    if (!name) {
      throw new SpecifierParseError("InvalidFormat", raw)
    }

    if (this.BLANK.test(versionStr)) {
      return Object.freeze({name, requirement: VersionRequirement.any(), raw})
    }

    try {
      const requirement = VersionRequirement.parse(this.translateOperators(versionStr))
      return Object.freeze({name, requirement, raw})
    } catch (error) {
      if (isSpecifierParseError(error)) {
        throw new SpecifierParseError("InvalidRequirement", versionStr)
      }
      throw error
    }
  }

  /**
   * Translate Python comparison operators to the comparator grammar
   */
  static translateOperators(versionStr: string): string {
    return this.OPERATOR_TRANSLATIONS.reduce((text, [from, to]) => text.split(from).join(to), versionStr)
  }

  static format(spec: PackageSpecifier): string {
    return `${spec.name} ${spec.requirement.toString()}`
  }
}
