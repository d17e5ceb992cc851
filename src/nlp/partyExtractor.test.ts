import test from "node:test";
import assert from "node:assert/strict";
import { extractParties, partiesConfidence } from "./partyExtractor.js";
import { getDefaultTaxonomy } from "../taxonomy/loader.js";

const taxonomy = getDefaultTaxonomy();

const near = (actual: number | undefined, expected: number) =>
  assert.ok(actual !== undefined && Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);

const CAPTION = [
  "RECLAMANTE: MARIA DA SILVA, CPF 123.456.789-09, residente e domiciliada na Rua das Flores, 100, São Paulo; advogado: Dr. João Souza (OAB/SP 123.456)",
  "RECLAMADO: EMPRESA EXEMPLO LTDA, CNPJ 12.345.678/0001-90",
  "",
  "Vistos etc.",
].join("\n");

test("extracts both parties with their fields", () => {
  const parties = extractParties(CAPTION, taxonomy);

  assert.deepEqual(parties.claimant, {
    role: "CLAIMANT",
    name: "MARIA DA SILVA",
    taxId: { kind: "CPF", value: "123.456.789-09" },
    address: "Rua das Flores, 100, São Paulo",
    counsel: ["João Souza"],
    confidence: 1,
  });

  assert.equal(parties.defendant?.name, "EMPRESA EXEMPLO LTDA");
  assert.deepEqual(parties.defendant?.taxId, { kind: "CNPJ", value: "12.345.678/0001-90" });
  assert.deepEqual(parties.defendant?.counsel, []);
  assert.equal(parties.defendant?.address, undefined);
  near(parties.defendant?.confidence, 0.65);

  near(partiesConfidence(parties, taxonomy), 0.825);
});

test("unformatted tax ids are normalized", () => {
  const parties = extractParties("RECLAMANTE: JOSÉ LIMA - CPF 12345678909\nRECLAMADA: BETA SA CNPJ 12345678000190", taxonomy);

  assert.deepEqual(parties.claimant?.taxId, { kind: "CPF", value: "123.456.789-09" });
  assert.deepEqual(parties.defendant?.taxId, { kind: "CNPJ", value: "12.345.678/0001-90" });
  assert.equal(parties.defendant?.name, "BETA SA");
});

test("the strongest candidate for a role wins", () => {
  const text = "Reclamante: Fulano\nRECLAMANTE: FULANO DE TAL, CPF 111.222.333-44";
  const parties = extractParties(text, taxonomy);

  assert.equal(parties.claimant?.name, "FULANO DE TAL");
  near(parties.claimant?.confidence, 0.65);
});

test("equal candidates keep the first one", () => {
  const parties = extractParties("Autor: PRIMEIRO NOME\nAutor: SEGUNDO NOME", taxonomy);
  assert.equal(parties.claimant?.name, "PRIMEIRO NOME");
});

test("a role without a label yields no record", () => {
  const parties = extractParties("RECLAMANTE: ANA LIMA\nSentença proferida em audiência.", taxonomy);

  assert.equal(parties.defendant, undefined);
  assert.equal(parties.claimant?.name, "ANA LIMA");
  near(partiesConfidence(parties, taxonomy), 0.32);
});

test("missing roles are filled from an 'A x B' caption hint", () => {
  const parties = extractParties("Sentença sem qualificação.", taxonomy, "JOSÉ PEREIRA x COMÉRCIO BETA S/A");

  assert.deepEqual(parties, {
    claimant: { role: "CLAIMANT", name: "JOSÉ PEREIRA", counsel: [], confidence: 0.4 },
    defendant: { role: "DEFENDANT", name: "COMÉRCIO BETA S/A", counsel: [], confidence: 0.4 },
  });
});

test("the hint never replaces a role found in the text", () => {
  const parties = extractParties("RECLAMANTE: ANA LIMA", taxonomy, "OUTRA PESSOA vs. EMPRESA GAMA");

  assert.equal(parties.claimant?.name, "ANA LIMA");
  assert.equal(parties.defendant?.name, "EMPRESA GAMA");
});

test("labelled hints are parsed like the text", () => {
  const parties = extractParties("", taxonomy, "RECLAMANTE: ANA LIMA; RECLAMADO: BETA LTDA");

  assert.equal(parties.claimant?.name, "ANA LIMA");
  assert.equal(parties.defendant?.name, "BETA LTDA");
});

test("a role word inside narrative text is not a label", () => {
  assert.deepEqual(extractParties("A autora - que trabalhou como caixa - alega horas extras.", taxonomy), {});
});

test("labels may carry a gender suffix", () => {
  const parties = extractParties("Reclamante(s): CARLOS NUNES\nReclamado(a): Banco X S.A.", taxonomy);

  assert.equal(parties.claimant?.name, "CARLOS NUNES");
  assert.equal(parties.defendant?.name, "Banco X S.A");
});

test("a mid-line label is read when a capitalized name follows", () => {
  const parties = extractParties("Processo em que figura como reclamada: EMPRESA DELTA LTDA, CNPJ 12.345.678/0001-90", taxonomy);
  assert.equal(parties.defendant?.name, "EMPRESA DELTA LTDA");
});

test("empty input has no parties and zero confidence", () => {
  assert.deepEqual(extractParties("", taxonomy), {});
  assert.deepEqual(extractParties(null, taxonomy), {});
  assert.equal(partiesConfidence({}, taxonomy), 0);
});
