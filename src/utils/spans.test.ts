import test from "node:test";
import assert from "node:assert/strict";
import { findMatches, resolveOverlaps, spansOverlap } from "./spans.js";

test("spansOverlap treats touching spans as disjoint", () => {
  assert.equal(spansOverlap({ start: 0, end: 5 }, { start: 5, end: 9 }), false);
  assert.equal(spansOverlap({ start: 0, end: 6 }, { start: 5, end: 9 }), true);
});

test("resolveOverlaps keeps the longest hit and returns text order", () => {
  const hits = [
    { start: 10, end: 20, id: "short-late" },
    { start: 0, end: 10, id: "procedente" },
    { start: 0, end: 19, id: "procedente em parte" },
    { start: 25, end: 30, id: "separate" },
  ];

  const kept = resolveOverlaps(hits).map((h) => h.id);
  assert.deepEqual(kept, ["procedente em parte", "separate"]);
});

test("resolveOverlaps prefers the earlier start on equal length", () => {
  const kept = resolveOverlaps([
    { start: 4, end: 8, id: "b" },
    { start: 2, end: 6, id: "a" },
  ]);
  assert.deepEqual(kept.map((h) => h.id), ["a"]);
});

test("findMatches restricts to the range but lets lookbehind see before it", () => {
  const regex = /(?<![\p{L}])procedente/giu;
  const text = "improcedente e procedente";

  const all = findMatches(regex, text);
  assert.deepEqual(all.map((m) => m.index), [15]);

  // range starts inside "improcedente": the lookbehind still sees "im"
  const inRange = findMatches(regex, text, { start: 2, end: text.length });
  assert.deepEqual(inRange.map((m) => m.index), [15]);

  const clipped = findMatches(regex, text, { start: 0, end: 20 });
  assert.equal(clipped.length, 0);
});

test("findMatches does not mutate the shared regex", () => {
  const regex = /julgo/giu;
  findMatches(regex, "julgo julgo");
  assert.equal(regex.lastIndex, 0);
});
