import test from "node:test";
import assert from "node:assert/strict";
import { DecisionSummarizer, selectExcerpt, selectReasoning, summarize } from "./structuredSummarizer.js";
import { getDefaultTaxonomy } from "../taxonomy/loader.js";

const taxonomy = getDefaultTaxonomy();
const GRANTED = "Julgo procedente o pedido. Concedido o pagamento de horas extras.";

test("a granted claim is summarized end to end", () => {
  const summary = summarize({ id: "dec-1", text: GRANTED }, taxonomy);

  assert.equal(summary.documentId, "dec-1");
  assert.equal(summary.outcome.outcome, "FAVORABLE_TO_CLAIMANT");
  assert.ok(summary.outcome.confidence > 0.7);
  assert.deepEqual(summary.parties, {});
  assert.deepEqual(summary.legalReferences, []);
  assert.deepEqual(summary.monetaryMentions, []);
  assert.deepEqual(summary.mainRequests, ["Horas extras"]);
  assert.equal(summary.decisionExcerpt, "Julgo procedente o pedido.");
  assert.deepEqual(summary.rights, [
    {
      id: "horas_extras",
      label: "Horas extras",
      outcome: "GRANTED",
      snippet: "Concedido o pagamento de horas extras",
      offset: 27,
    },
  ]);
  assert.equal(summary.mainReasoning, "");
  assert.equal(summary.overallConfidence, 0.5);
  assert.equal(summary.pipelineVersion, taxonomy.pipelineVersion);
  assert.deepEqual(summary.failures, []);
});

test("an empty decision yields an empty, undetermined summary", () => {
  const summary = summarize({ id: "dec-empty", text: "" }, taxonomy);

  assert.equal(summary.outcome.outcome, "UNDETERMINED");
  assert.equal(summary.outcome.confidence, 0);
  assert.deepEqual(summary.parties, {});
  assert.deepEqual(summary.legalReferences, []);
  assert.deepEqual(summary.monetaryMentions, []);
  assert.deepEqual(summary.mainRequests, []);
  assert.deepEqual(summary.rights, []);
  assert.equal(summary.decisionExcerpt, "");
  assert.equal(summary.mainReasoning, "");
  assert.equal(summary.overallConfidence, 0);
});

test("a citation in text and hint appears once", () => {
  const summary = summarize(
    { id: "dec-ref", text: "Aplica-se o Art. 7º da CLT.", legislativeReference: "Artigo 7, CLT" },
    taxonomy
  );
  assert.deepEqual(
    summary.legalReferences.map((r) => [r.kind, r.normalizedCitation, r.provenance]),
    [["ARTICLE", "Art. 7º CLT", "PRE_EXISTING"]]
  );
});

test("overall confidence weighs outcome, parties and references", () => {
  const summary = summarize(
    {
      id: "dec-hints",
      text: GRANTED,
      parties: "Maria da Silva x Empresa Exemplo Ltda",
      legislativeReference: ["Lei 13.467/2017"],
    },
    taxonomy
  );

  assert.equal(summary.parties.claimant?.name, "Maria da Silva");
  assert.equal(summary.parties.defendant?.name, "Empresa Exemplo Ltda");
  assert.ok(Math.abs(summary.overallConfidence - (0.5 * 1 + 0.25 * 0.4 + 0.25 * 0.95)) < 1e-9);
});

test("a failing branch is recorded without affecting the others", () => {
  const summarizer = new DecisionSummarizer(taxonomy, {
    parties: () => {
      throw new Error("parser exploded");
    },
  });
  const summary = summarizer.summarize({ id: "dec-fail", text: GRANTED, parties: "A x B" });

  assert.deepEqual(summary.failures, [{ branch: "parties", message: "parser exploded" }]);
  assert.deepEqual(summary.parties, {});
  assert.equal(summary.outcome.outcome, "FAVORABLE_TO_CLAIMANT");
  assert.deepEqual(summary.mainRequests, ["Horas extras"]);
});

test("summaries are deterministic", () => {
  const document = { id: "dec-2", text: GRANTED, legislativeReference: "Súmula 85 TST" };
  assert.deepEqual(summarize(document, taxonomy), summarize(document, taxonomy));
});

test("the excerpt skips short sentences and falls back to the text start", () => {
  assert.equal(
    selectExcerpt("Julgo. O juízo condena a reclamada ao pagamento.", taxonomy),
    "O juízo condena a reclamada ao pagamento."
  );
  assert.equal(
    selectExcerpt("O processo  foi distribuído\nem março.", taxonomy),
    "O processo foi distribuído em março."
  );

  const long = selectExcerpt("palavra ".repeat(50), taxonomy);
  assert.equal(long.length, 280);
  assert.ok(long.endsWith("palav..."));
});

test("summaries are frozen", () => {
  const summary = summarize({ id: "dec-frozen", text: GRANTED }, taxonomy);

  assert.ok(Object.isFrozen(summary));
  assert.ok(Object.isFrozen(summary.rights));
  assert.ok(Object.isFrozen(summary.outcome.evidence));
  assert.ok(Object.isFrozen(summary.mainRequests));
});

test("the main reasoning is the first grounded sentence of the fundamentação", () => {
  const text = [
    "RELATÓRIO",
    "A reclamante ajuizou ação trabalhista.",
    "FUNDAMENTAÇÃO",
    "A prova oral foi analisada.",
    "Nos termos do art. 59 da CLT, as horas extras são devidas.",
    "DISPOSITIVO",
    "Julgo procedente o pedido.",
  ].join("\n");

  assert.equal(selectReasoning(text, taxonomy), "Nos termos do art. 59 da CLT, as horas extras são devidas.");
  assert.equal(
    summarize({ id: "dec-reasoning", text }, taxonomy).mainReasoning,
    "Nos termos do art. 59 da CLT, as horas extras são devidas."
  );
});

test("without a grounded sentence the reasoning is the section start", () => {
  assert.equal(
    selectReasoning("FUNDAMENTAÇÃO\nA prova oral foi analisada com cuidado.", taxonomy),
    "A prova oral foi analisada com cuidado."
  );
  assert.equal(selectReasoning("Julgo procedente o pedido.", taxonomy), "");
});
