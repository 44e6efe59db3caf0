import { Command, CommanderError } from "commander";

import {
  flush,
  formatFailure,
  formatTraceEvent,
  isOk,
  setTraceEnabled,
  traceEnabled,
  type Result,
  type Token,
} from "@blisskit/core";
import { canonicalJson, errorMessage } from "@blisskit/utils";

import { createEngine } from "./engine.js";
import { readDictionaryFile, readSemanticTablesFile } from "./files.js";
import type { BlissEngine } from "./types.js";

export interface CliIO {
  readonly out: (text: string) => void;
  readonly err: (text: string) => void;
}

type GlobalOptions = {
  dict?: string;
  semantics?: string;
  lang?: string;
  trace?: boolean;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

class UsageError extends Error {}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

const splitIds = (value: string): string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

function parseSpec(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new UsageError(`compose spec is not valid JSON: ${errorMessage(error)}`);
  }
}

/**
 * Runs one `bliss` invocation and resolves to its exit code: 0 on success, 1 when the
 * operation fails, 2 when the command line itself is wrong.
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let exitCode = EXIT_OK;

  const program = new Command();
  program
    .name("bliss")
    .description("Classify, analyze and compose Blissymbolics compositions")
    .option("--dict <path>", "dictionary JSON file (defaults to $BLISS_DICT)")
    .option("--semantics <path>", "modifier and indicator tables JSON file")
    .option("--lang <code>", "gloss language", "en")
    .option("--trace", "print the decision trace to stderr")
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  const loadEngine = async (): Promise<BlissEngine> => {
    const options = program.opts<GlobalOptions>();
    const dictPath = options.dict ?? process.env.BLISS_DICT;
    if (!dictPath) {
      throw new UsageError("no dictionary given; pass --dict <path> or set BLISS_DICT");
    }
    if (options.trace) {
      setTraceEnabled(true);
    }
    const dictionary = await readDictionaryFile(dictPath);
    const semantics = options.semantics ? await readSemanticTablesFile(options.semantics) : undefined;
    return createEngine(dictionary, { semantics, language: options.lang });
  };

  const report = <T>(result: Result<T>): void => {
    for (const warning of result.warnings) {
      io.err(`warning: ${warning}\n`);
    }
    if (isOk(result)) {
      io.out(canonicalJson(result.value));
    } else {
      io.err(`${formatFailure(result)}\n`);
      exitCode = EXIT_FAILURE;
    }
  };

  const withEngine =
    <A extends unknown[]>(action: (engine: BlissEngine, ...args: A) => void) =>
    async (...args: A): Promise<void> => {
      action(await loadEngine(), ...args);
      if (traceEnabled()) {
        for (const event of flush()) {
          io.err(`trace: ${formatTraceEvent(event)}\n`);
        }
      }
    };

  program
    .command("glosses")
    .description("glosses for each symbol of a composition")
    .argument("<tokens...>", "symbol ids and markers")
    .action(withEngine((engine: BlissEngine, tokens: Token[]) => report(engine.getCompositionGlosses(tokens))));

  program
    .command("symbol")
    .description("glosses and explanation of one symbol")
    .argument("<id>", "symbol id")
    .action(withEngine((engine: BlissEngine, id: string) => report(engine.getSymbolGlosses(id))));

  program
    .command("info")
    .description("kind, glosses and semantics of one symbol")
    .argument("<id>", "symbol id")
    .action(withEngine((engine: BlissEngine, id: string) => report(engine.getSymbolInfo(id))));

  program
    .command("classify")
    .description("assign a role to every symbol of a composition")
    .argument("<tokens...>", "symbol ids and markers")
    .action(
      withEngine((engine: BlissEngine, tokens: Token[]) => {
        const { rule, assignment } = engine.explain(tokens);
        io.out(canonicalJson({ rule, ...assignment }));
        if (assignment.errors.length > 0) exitCode = EXIT_FAILURE;
      }),
    );

  program
    .command("analyze")
    .description("roles, glosses and semantic facts of a composition")
    .argument("<tokens...>", "symbol ids and markers")
    .action(withEngine((engine: BlissEngine, tokens: Token[]) => report(engine.analyzeComposition(tokens))));

  program
    .command("structure")
    .description("structural summary of a composition")
    .argument("<tokens...>", "symbol ids and markers")
    .action(withEngine((engine: BlissEngine, tokens: Token[]) => report(engine.getCompositionStructure(tokens))));

  program
    .command("compose")
    .description("compose from a JSON spec such as '{\"classifier\":\"building\"}'")
    .argument("<spec>", "compose spec as JSON")
    .action(withEngine((engine: BlissEngine, spec: string) => report(engine.composeFromSpec(parseSpec(spec)))));

  program
    .command("compose-ids")
    .description("compose from symbol ids in prefix, head, suffix order")
    .argument("<classifier>", "classifier id")
    .option("--specifiers <ids>", "comma-separated specifier ids", splitIds, [])
    .option("--modifiers <ids>", "comma-separated modifier ids", splitIds, [])
    .option("--indicators <ids>", "comma-separated indicator ids", splitIds, [])
    .action(
      withEngine(
        (engine: BlissEngine, classifier: string, options: { specifiers: string[]; modifiers: string[]; indicators: string[] }) =>
          report(engine.composeWithIds(classifier, options.specifiers, options.modifiers, options.indicators)),
      ),
    );

  program
    .command("stats")
    .description("symbol counts of the dictionary")
    .action(
      withEngine((engine: BlissEngine) => {
        io.out(canonicalJson(engine.stats()));
      }),
    );

  const previousTrace = traceEnabled();
  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    io.err(`${errorMessage(error)}\n`);
    return error instanceof UsageError ? EXIT_USAGE : EXIT_FAILURE;
  } finally {
    setTraceEnabled(previousTrace);
  }
  return exitCode;
}
