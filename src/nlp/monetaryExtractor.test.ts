import test from "node:test";
import assert from "node:assert/strict";
import {
  extractMainRequests,
  extractMonetaryMentions,
  parseBrazilianAmount,
} from "./monetaryExtractor.js";
import { getDefaultTaxonomy } from "../taxonomy/loader.js";

const taxonomy = getDefaultTaxonomy();

const requestsSection =
  "DOS PEDIDOS\n" +
  "1. Horas extras no valor de R$ 15.000,00;\n" +
  "2. Adicional noturno no valor de R$ 8.000,00;\n" +
  "3. Indenização por danos morais de 2,5 milhões de reais.\n" +
  "FUNDAMENTAÇÃO\n" +
  "O FGTS foi recolhido.";

test("amounts in Brazilian format are parsed with their scale", () => {
  const mentions = extractMonetaryMentions(requestsSection, taxonomy);
  assert.deepEqual(
    mentions.map((m) => [m.surfaceText, m.value]),
    [
      ["R$ 15.000,00", 15000],
      ["R$ 8.000,00", 8000],
      ["2,5 milhões de reais", 2500000],
    ]
  );
});

test("a mention carries its offset and surrounding context", () => {
  assert.deepEqual(extractMonetaryMentions("Valor: R$ 1.234,56 devidos.", taxonomy), [
    { surfaceText: "R$ 1.234,56", value: 1234.56, context: "Valor: R$ 1.234,56 devidos.", offset: 7 },
  ]);
});

test("overlapping forms collapse to the longest", () => {
  const mentions = extractMonetaryMentions("Fixo em R$ 5 mil reais, mais 100 reais e R$1500.", taxonomy);
  assert.deepEqual(
    mentions.map((m) => [m.surfaceText, m.value]),
    [
      ["R$ 5 mil reais", 5000],
      ["100 reais", 100],
      ["R$1500", 1500],
    ]
  );
});

test("the mention list is capped", () => {
  const text = Array.from({ length: 12 }, (_, i) => `R$ ${i + 1},00`).join("; ");
  const mentions = extractMonetaryMentions(text, taxonomy);
  assert.deepEqual(
    mentions.map((m) => m.value),
    [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]
  );
});

test("parseBrazilianAmount", () => {
  assert.equal(parseBrazilianAmount("1.234,56"), 1234.56);
  assert.equal(parseBrazilianAmount("2,5", "milhões"), 2500000);
  assert.equal(parseBrazilianAmount("3", "mil"), 3000);
});

test("requests are read from the requests section only", () => {
  assert.deepEqual(extractMainRequests(requestsSection, taxonomy), [
    "Horas extras",
    "Adicional noturno",
    "Danos morais",
  ]);
});

test("without a section, the request paragraph is searched", () => {
  const text =
    "Na inicial, a reclamante requer o pagamento de horas extras e FGTS.\n\n" +
    "No mérito, discute-se o dano moral.";
  assert.deepEqual(extractMainRequests(text, taxonomy), ["Horas extras", "FGTS"]);
});

test("otherwise the whole text is searched, in lexicon order", () => {
  assert.deepEqual(extractMainRequests("Discute-se férias e aviso prévio.", taxonomy), [
    "Aviso prévio",
    "Férias",
  ]);
});

test("the request list is capped", () => {
  const text = "Pleitos: horas extras, adicional noturno, insalubridade, periculosidade, FGTS e danos morais.";
  assert.deepEqual(extractMainRequests(text, taxonomy), [
    "Horas extras",
    "Adicional noturno",
    "Adicional de insalubridade",
    "Adicional de periculosidade",
    "FGTS",
  ]);
});

test("empty or non-string text yields nothing", () => {
  assert.deepEqual(extractMonetaryMentions("", taxonomy), []);
  assert.deepEqual(extractMonetaryMentions(42, taxonomy), []);
  assert.deepEqual(extractMainRequests(null, taxonomy), []);
});
