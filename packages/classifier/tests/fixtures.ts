import { loadDictionary, loadSemanticTables } from "@blisskit/core";

export const dictionary = loadDictionary({
  "14905": { pos: "YELLOW", isCharacter: true, glosses: { en: ["building"] } },
  "24920": { pos: "BLUE", isCharacter: true, glosses: { en: ["medicine"] } },
  "17700": { pos: "RED", isCharacter: true, glosses: { en: ["run"] } },
  "14647": { pos: "WHITE", glosses: { en: ["many"] } },
  "15474": { pos: "GREY", glosses: { en: ["opposite"] } },
  "9011": { pos: "WHITE", glosses: { en: ["plural"] } },
  "8998": { pos: "WHITE", glosses: { en: ["adjective"] } },
  "12600": { pos: "GREY", glosses: { en: ["line"] } },
  "31000": { glosses: { en: ["mystery"] } },
});

export const tables = loadSemanticTables({
  modifiers: {
    "14647": { type: "QUANTIFIER", value: "many" },
    "15474": { type: "NEGATION", value: "opposite" },
  },
  indicators: {
    "9011": { type: "NUMBER", value: "plural" },
    "8998": { type: "POS", value: "adjective" },
  },
});

export const UNKNOWN_ID = "99999";
