import { loadDictionary, loadSemanticTables } from "@blisskit/core";

export const dictionary = loadDictionary({
  "14905": {
    pos: "YELLOW",
    isCharacter: true,
    glosses: { en: ["building"], sv: ["byggnad"] },
    explanation: "roof over walls",
  },
  "24920": { pos: "BLUE", isCharacter: true, glosses: { en: ["medicine"] } },
  "17700": { pos: "RED", isCharacter: true, glosses: { en: ["run"] }, semantics: { POS: "verb" } },
  "14647": { pos: "WHITE", glosses: { en: ["many", "much"] } },
  "24961": { pos: "GREY", glosses: { sv: ["eller"] } },
  "9011": { pos: "WHITE", glosses: { en: ["plural"] } },
  "8998": { pos: "WHITE", glosses: { en: ["adjective"] } },
  "12600": { pos: "GREY", glosses: {} },
});

export const tables = loadSemanticTables({
  modifiers: {
    "14647": { type: "QUANTIFIER", value: "many" },
    "24961": {
      or: [
        { type: "OPERATOR", value: "or" },
        { type: "OPERATOR", value: "either" },
      ],
    },
  },
  indicators: {
    "9011": { type: "NUMBER", value: "plural" },
    "8998": {
      and: [
        { type: "POS", value: "adjective" },
        { type: "FORM", value: "descriptive" },
      ],
    },
  },
});
