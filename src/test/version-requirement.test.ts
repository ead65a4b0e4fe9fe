/**
 * Tests for VersionRequirement
 */

import {strict as assert} from "assert"
import {test, describe} from "node:test"
import * as semver from "semver"
import {VersionRequirement} from "../version-requirement.js"

describe("VersionRequirement", () => {
  test("should match every valid version when unconstrained", () => {
    const requirement = VersionRequirement.any()
    assert.equal(requirement.isAny(), true)
    assert.equal(requirement.matches("0.0.1"), true)
    assert.equal(requirement.matches("99.0.0"), true)
  })

  test("should never match an invalid version", () => {
    assert.equal(VersionRequirement.any().matches("not-a-version"), false)
  })

  test("should treat blank text as unconstrained", () => {
    assert.equal(VersionRequirement.parse("   ").isAny(), true)
  })

  test("should require every clause to hold", () => {
    const requirement = VersionRequirement.parse(">=2.0.0, <3.0.0")
    assert.equal(requirement.clauses.length, 2)
    assert.equal(requirement.matches("2.5.0"), true)
    assert.equal(requirement.matches("1.9.9"), false)
    assert.equal(requirement.matches("3.0.0"), false)
  })

  test("should keep clause operators and versions", () => {
    const requirement = VersionRequirement.parse("^1.2.3")
    assert.deepEqual(requirement.clauses, [{operator: "^", version: "1.2.3"}])
  })

  test("should match compatible releases within the same minor", () => {
    const requirement = VersionRequirement.parse("~1.20")
    assert.equal(requirement.matches("1.20.5"), true)
    assert.equal(requirement.matches("1.21.0"), false)
  })

  test("should expand partial exact versions", () => {
    const requirement = VersionRequirement.parse("=3.2")
    assert.equal(requirement.matches("3.2.7"), true)
    assert.equal(requirement.matches("3.3.0"), false)
  })

  test("should exclude pre-releases from open ranges", () => {
    assert.equal(VersionRequirement.parse(">=1.0.0").matches("2.0.0-beta.1"), false)
  })

  test("should accept parsed SemVer instances", () => {
    assert.equal(VersionRequirement.parse("<3.0.0").matches(new semver.SemVer("2.0.0")), true)
  })

  test("should render clauses in order", () => {
    assert.equal(VersionRequirement.parse(">=1.0,  <2.0").toString(), ">=1.0, <2.0")
    assert.equal(VersionRequirement.any().toString(), "*")
  })

  test("should accept wildcards after a version prefix", () => {
    const requirement = VersionRequirement.parse(">=1.x")
    assert.equal(requirement.toString(), ">=1.x")
    assert.equal(requirement.matches("1.0.0"), true)
    assert.equal(requirement.matches("0.9.0"), false)
  })

  test("should let a pre-release allowed by one clause pass the others", () => {
    const requirement = VersionRequirement.parse(">=1.0.0-beta, <2.0.0")
    assert.equal(requirement.matches("1.0.0-rc.1"), true)
    assert.equal(requirement.matches("1.5.0-rc.1"), false)
  })

  describe("version numbers beyond the safe integer range", () => {
    test("should accept numbers up to the unsigned 64-bit limit", () => {
      const requirement = VersionRequirement.parse("<=18446744073709551615.0.0")
      assert.equal(requirement.toString(), "<=18446744073709551615.0.0")
      assert.equal(requirement.matches("7.0.0"), true)
    })

    test("should compare bounds digit by digit", () => {
      assert.equal(VersionRequirement.parse(">=9007199254740993.0.0").matches("7.0.0"), false)
      assert.equal(VersionRequirement.parse("<9007199254740993.0.0").matches("7.0.0"), true)
      assert.equal(VersionRequirement.parse("=9007199254740993").matches("9007199254740991.0.0"), false)
      assert.equal(VersionRequirement.parse("<=9007199254740993.1").matches("9007199254740991.5.0"), true)
      assert.equal(VersionRequirement.parse(">1.9007199254740993").matches("2.0.0"), true)
      assert.equal(VersionRequirement.parse(">1.9007199254740993").matches("1.5.0"), false)
    })

    test("should keep the leading numbers fixed for tilde and caret", () => {
      assert.equal(VersionRequirement.parse("~1.9007199254740993").matches("1.2.0"), false)
      assert.equal(VersionRequirement.parse("~1.9007199254740993").matches("2.0.0"), false)
      assert.equal(VersionRequirement.parse("^1.9007199254740993.0").matches("1.2.0"), false)
      assert.equal(VersionRequirement.parse("^0.9007199254740993.1").matches("0.5.0"), false)
      assert.equal(VersionRequirement.parse("^9007199254740991.0.0").matches("9007199254740991.3.0"), true)
    })

    test("should combine with ordinary clauses", () => {
      const requirement = VersionRequirement.parse(">=2.0.0, <9007199254740993.0.0")
      assert.equal(requirement.matches("1.0.0"), false)
      assert.equal(requirement.matches("3.0.0"), true)
    })

    test("should not match pre-releases", () => {
      assert.equal(VersionRequirement.parse("<9007199254740993.0.0").matches("1.0.0-beta"), false)
    })
  })

  describe("invalid requirements", () => {
    const invalid = [
      "!3.0.0",
      "1.0.0||2.0.0",
      ">=1.0.0 <2.0.0",
      "*, >=1.0.0",
      "=>1.0.0",
      "1.2.3.4",
      ">=1.0,",
      "=v1.2.3",
      ">=01.0.0",
      "1.*.3",
      "=1.0-beta",
      "=1.x.x-beta",
      ">=1.0.0\t",
      ">=18446744073709551616.0.0",
    ]

    for (const text of invalid) {
      test(`should reject "${text}"`, () => {
        assert.throws(() => VersionRequirement.parse(text), {
          name: "SpecifierParseError",
          kind: "InvalidRequirement",
          input: text,
        })
      })
    }
  })
})
