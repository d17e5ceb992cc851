import test from "node:test";
import assert from "node:assert/strict";
import {
  expandYear,
  extractReferences,
  mergeReferences,
  referencesConfidence,
  splitReferenceHint,
} from "./legalReferenceExtractor.js";
import { getDefaultTaxonomy } from "../taxonomy/loader.js";

const taxonomy = getDefaultTaxonomy();

const citations = (text: string, hint?: string) =>
  extractReferences(text, taxonomy, hint).map((r) => [r.kind, r.normalizedCitation]);

test("each reference kind is normalized and grouped in kind order", () => {
  const text =
    "Nos termos do art. 59, § 2º, da CLT e do art. 223-A da CLT, aplica-se a Lei nº 13.467/2017 " +
    "e a Súmula nº 85 do TST. Ver OJ 394 da SBDI-1 do TST, Decreto nº 95.247/87, " +
    "Portaria MTE nº 3.214/1978 e NR-15.";

  assert.deepEqual(citations(text), [
    ["ARTICLE", "Art. 59, § 2º CLT"],
    ["ARTICLE", "Art. 223-A CLT"],
    ["STATUTE", "Lei 13.467/2017"],
    ["SUMULA", "Súmula 85 TST"],
    ["SUMULA", "OJ 394 SDI-1 TST"],
    ["DECREE", "Decreto 95.247/1987"],
    ["ORDINANCE", "Portaria MTE 3.214/1978"],
    ["ORDINANCE", "NR 15"],
  ]);
});

test("equivalent citations in text and hint collapse to one pre-existing reference", () => {
  assert.deepEqual(extractReferences("Art. 7º da CLT", taxonomy, "Artigo 7, CLT"), [
    { kind: "ARTICLE", normalizedCitation: "Art. 7º CLT", provenance: "PRE_EXISTING", confidence: 0.9 },
  ]);
});

test("articles without a recognizable source are skipped", () => {
  assert.deepEqual(citations("conforme o art. 5º acima mencionado"), []);
});

test("code names and abbreviations map to one source", () => {
  const text =
    "Violação ao art. 5º, XXXV, da Constituição Federal, ao art. 927 do Código Civil " +
    "e ao art. 1.022 do CPC/2015.";

  assert.deepEqual(citations(text), [
    ["ARTICLE", "Art. 5º CF"],
    ["ARTICLE", "Art. 927 CC"],
    ["ARTICLE", "Art. 1.022 CPC"],
  ]);
});

test("an article of a numbered statute cites the statute as its source", () => {
  assert.deepEqual(citations("Incide o art. 3º da Lei 8.036/1990."), [
    ["ARTICLE", "Art. 3º Lei 8.036/1990"],
    ["STATUTE", "Lei 8.036/1990"],
  ]);
});

test("article lists and source-first citations", () => {
  assert.deepEqual(citations("Multas dos arts. 467 e 477 da CLT. Ver CLT, art. 62, parágrafo único."), [
    ["ARTICLE", "Art. 467 CLT"],
    ["ARTICLE", "Art. 477 CLT"],
    ["ARTICLE", "Art. 62, parágrafo único CLT"],
  ]);
});

test("a source that closes one citation does not open the next", () => {
  assert.deepEqual(citations("Violação ao art. 7º, XXIX, da Constituição Federal, art. 11 da CLT."), [
    ["ARTICLE", "Art. 7º CF"],
    ["ARTICLE", "Art. 11 CLT"],
  ]);
  assert.deepEqual(citations("Violação ao art. 7º, XXIX, da Constituição Federal, art. 3º da Lei 8.036/90."), [
    ["ARTICLE", "Art. 7º CF"],
    ["ARTICLE", "Art. 3º Lei 8.036/1990"],
    ["STATUTE", "Lei 8.036/1990"],
  ]);
});

test("ordinance agencies are mapped to their current name", () => {
  assert.deepEqual(citations("Aplica-se a Portaria MTb nº 3.214/1978."), [["ORDINANCE", "Portaria MTE 3.214/1978"]]);
  assert.deepEqual(citations("Instrução Normativa SRF 971/2009."), [["ORDINANCE", "Instrução Normativa RFB 971/2009"]]);
});

test("statute forms and two-digit years", () => {
  const text =
    "Lei 9.601/98, MP 927/20, LC 123/2006, Lei Complementar 123/2006 e " +
    "Decreto-Lei nº 5.452, de 1º de maio de 1943.";

  assert.deepEqual(citations(text), [
    ["STATUTE", "Lei 9.601/1998"],
    ["STATUTE", "Medida Provisória 927/2020"],
    ["STATUTE", "Lei Complementar 123/2006"],
    ["STATUTE", "Decreto-Lei 5.452/1943"],
  ]);
});

test("binding súmulas default to the STF", () => {
  assert.deepEqual(citations("Súmula Vinculante 4 e Instrução Normativa RFB nº 971/2009"), [
    ["SUMULA", "Súmula Vinculante 4 STF"],
    ["ORDINANCE", "Instrução Normativa RFB 971/2009"],
  ]);
});

test("a JSON-encoded hint is read item by item", () => {
  assert.deepEqual(extractReferences("", taxonomy, '["Lei 8.213/91", "Súmula 338 TST"]'), [
    { kind: "STATUTE", normalizedCitation: "Lei 8.213/1991", provenance: "PRE_EXISTING", confidence: 0.95 },
    { kind: "SUMULA", normalizedCitation: "Súmula 338 TST", provenance: "PRE_EXISTING", confidence: 0.9 },
  ]);
});

test("splitReferenceHint handles arrays, JSON and delimited text", () => {
  assert.deepEqual(splitReferenceHint(["Lei 1/2000", " "]), ["Lei 1/2000"]);
  assert.deepEqual(splitReferenceHint('[{"norma": "Lei", "numero": 8213}]'), ["Lei 8213"]);
  assert.deepEqual(splitReferenceHint("CLT art. 7; Lei 8.213/91 | NR 15\nSúmula 85"), [
    "CLT art. 7",
    "Lei 8.213/91",
    "NR 15",
    "Súmula 85",
  ]);
  assert.deepEqual(splitReferenceHint("[not json; Lei 1/2000"), ["[not json", "Lei 1/2000"]);
});

test("merging is idempotent and keeps pre-existing provenance", () => {
  const refs = extractReferences("Art. 7º da CLT e Lei 13.467/2017. Súmula 85 do TST.", taxonomy);
  assert.deepEqual(mergeReferences(refs, refs), refs);
  assert.deepEqual(mergeReferences(refs, extractReferences("Súmula 85 do TST e art. 7º da CLT", taxonomy)), refs);

  const supplied = refs.map((r) => ({ ...r, provenance: "PRE_EXISTING" as const }));
  assert.deepEqual(
    mergeReferences(refs, supplied).map((r) => r.provenance),
    ["PRE_EXISTING", "PRE_EXISTING", "PRE_EXISTING"]
  );
});

test("expandYear pivots two-digit years", () => {
  assert.equal(expandYear("29", 30), "2029");
  assert.equal(expandYear("30", 30), "1930");
  assert.equal(expandYear("1988", 30), "1988");
});

test("referencesConfidence is the mean per-kind confidence", () => {
  const refs = extractReferences("Lei 13.467/2017 e Portaria 1/2020", taxonomy);
  assert.ok(Math.abs(referencesConfidence(refs) - (0.95 + 0.8) / 2) < 1e-9);
  assert.equal(referencesConfidence([]), 0);
});

test("empty or non-string text yields no references", () => {
  assert.deepEqual(extractReferences("", taxonomy), []);
  assert.deepEqual(extractReferences(undefined, taxonomy), []);
});
