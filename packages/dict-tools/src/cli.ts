#!/usr/bin/env node
import { Command } from "commander";
import { resolve } from "node:path";

import { loadDictionary } from "@blisskit/core";
import { errorMessage, readJsonFile, writeJsonFile } from "@blisskit/utils";

import { cleanDictionary } from "./clean.js";
import { findDuplicateGlosses, formatDuplicateSummary } from "./duplicates.js";

const program = new Command();
program
  .name("bliss-dict")
  .description("Prepare and audit Blissymbolics dictionary files");

program
  .command("clean")
  .description("clean raw descriptions into the dictionary format")
  .argument("<input>", "source explanations JSON")
  .argument("<output>", "cleaned dictionary JSON")
  .action(async (input: string, output: string) => {
    try {
      const cleaned = cleanDictionary(await readJsonFile(resolve(input)));
      await writeJsonFile(resolve(output), cleaned);
      console.log(`wrote ${Object.keys(cleaned).length} symbols to ${output}`);
    } catch (error) {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

program
  .command("duplicates")
  .description("report glosses shared by symbols with the same metadata")
  .argument("<input>", "cleaned dictionary JSON")
  .argument("<output>", "duplicate report JSON")
  .action(async (input: string, output: string) => {
    try {
      const report = findDuplicateGlosses(loadDictionary(await readJsonFile(resolve(input))));
      await writeJsonFile(resolve(output), report.duplicates);
      for (const line of formatDuplicateSummary(report)) {
        console.log(line);
      }
    } catch (error) {
      console.error(errorMessage(error));
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 2;
});
