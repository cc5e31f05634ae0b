/**
 * Tests for policy parsing from query parameters.
 *
 * @module src/policy/policy_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { describePolicy, parsePolicy } from "./policy.ts";

test("parsePolicy - no claims parameters gives an empty policy", () => {
  const policy = parsePolicy(
    new URLSearchParams("cookie=session&headers_x-user=sub"),
  );
  assert.equal(policy.size, 0);
});

test("parsePolicy - literal parameters, repeated values accumulate", () => {
  const policy = parsePolicy(
    new URLSearchParams(
      "claims_group=developers&claims_group=administrators&claims_location=hq",
    ),
  );

  assert.deepEqual([...policy.keys()], ["group", "location"]);
  assert.deepEqual(policy.get("group"), [
    { kind: "literal", value: "developers" },
    { kind: "literal", value: "administrators" },
  ]);
  assert.deepEqual(policy.get("location"), [{ kind: "literal", value: "hq" }]);
});

test("parsePolicy - regexp prefix strips to the claim name", () => {
  const policy = parsePolicy(new URLSearchParams("claims_regexp_role=%5Eadmin.*"));
  assert.deepEqual(policy.get("role"), [{ kind: "regexp", source: "^admin.*" }]);
});

test("parsePolicy - literal and regexp patterns share one set per claim", () => {
  const policy = parsePolicy(
    new URLSearchParams("claims_role=user&claims_regexp_role=%5Eadmin"),
  );
  assert.deepEqual(policy.get("role"), [
    { kind: "literal", value: "user" },
    { kind: "regexp", source: "^admin" },
  ]);
});

test("parsePolicy - keeps claim names containing underscores", () => {
  const policy = parsePolicy(new URLSearchParams("claims_cognito_groups=ops"));
  assert.deepEqual([...policy.keys()], ["cognito_groups"]);
});

test("describePolicy - renders regex patterns between slashes", () => {
  const policy = parsePolicy(
    new URLSearchParams("claims_role=user&claims_regexp_role=%5Eadmin"),
  );
  assert.deepEqual(describePolicy(policy), { role: ["user", "/^admin/"] });
});
