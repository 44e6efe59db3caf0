import { loadDictionary, loadSemanticTables } from "@blisskit/core";

export const dictionary = loadDictionary({
  "12000": { pos: "YELLOW", isCharacter: false, glosses: { en: ["building"] } },
  "14905": { pos: "YELLOW", isCharacter: true, glosses: { en: ["building"] } },
  "30000": { pos: "YELLOW", isCharacter: false, glosses: { en: ["building", "shelter"] } },
  "24920": { pos: "BLUE", isCharacter: true, glosses: { en: ["medicine"], sv: ["medicin"] } },
  "14647": { pos: "WHITE", glosses: { en: ["many"] } },
  "15474": { pos: "GREY", glosses: { en: ["countable"] } },
  "9011": { pos: "WHITE", glosses: { en: ["plural"] } },
  "8998": { pos: "WHITE", glosses: { en: ["adjective"] } },
  "24961": { pos: "GREY", glosses: { en: ["or"] } },
  "17700": { pos: "RED", isCharacter: true, glosses: { en: ["run"] }, semantics: { type: "ACTION", value: "motion" } },
  "17800": { pos: "RED", isCharacter: true, glosses: { en: ["sprint"] }, semantics: { type: "ACTION", value: "motion" } },
  "25555": { pos: "GREY", glosses: { en: ["Mystery Box"] } },
  "26000": { pos: "GREEN", glosses: { en: ["quick"] }, semantics: { SPEED: "fast", MANNER: "hurried" } },
});

export const tables = loadSemanticTables({
  modifiers: {
    "14647": { type: "QUANTIFIER", value: "many" },
    "15474": { type: "NUMBER", value: "plural" },
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
