/**
 * Errors raised while parsing package specifiers
 */

export type ParseErrorKind = "InvalidFormat" | "InvalidRequirement"

export class SpecifierParseError extends Error {
  readonly kind: ParseErrorKind
  readonly input: string

  constructor(kind: ParseErrorKind, input: string) {
    const prefix = kind === "InvalidFormat" ? "Invalid package format" : "Invalid version requirement"
    super(`${prefix}: ${input}`)
    this.name = "SpecifierParseError"
    this.kind = kind
    this.input = input
  }
}

export function isSpecifierParseError(error: unknown): error is SpecifierParseError {
  return error instanceof SpecifierParseError
}
