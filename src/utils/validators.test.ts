import test from "node:test";
import assert from "node:assert/strict";
import { tryParseJson, validator } from "./validators.js";

interface Citation {
  kind: string;
  year?: number;
}

const validateCitation = validator.compileSchema<Citation>({
  type: "object",
  required: ["kind"],
  properties: {
    kind: { type: "string" },
    year: { type: "integer", minimum: 1900 },
  },
});

test("valid data is returned typed", () => {
  const result = validator.validate(validateCitation, { kind: "STATUTE", year: 2017 });
  assert.deepEqual(result, { valid: true, data: { kind: "STATUTE", year: 2017 } });
});

test("every error is reported", () => {
  const result = validator.validate(validateCitation, { year: 1800 });
  assert.equal(result.valid, false);
  if (!result.valid) {
    assert.deepEqual(
      result.errors.map((e) => e.keyword).sort(),
      ["minimum", "required"]
    );
  }
});

test("formatErrors renders one line per error", () => {
  const result = validator.validate(validateCitation, { kind: 7 });
  assert.equal(result.valid, false);
  if (!result.valid) {
    assert.equal(validator.formatErrors(result.errors), '  • /kind: must be string {"type":"string"}');
  }
  assert.equal(validator.formatErrors([]), "No errors");
  assert.equal(validator.formatErrors(undefined), "No errors");
});

test("tryParseJson returns undefined for invalid JSON", () => {
  assert.deepEqual(tryParseJson('["a", 1]'), ["a", 1]);
  assert.equal(tryParseJson("{oops"), undefined);
});
