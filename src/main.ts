import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import { Command } from "commander";
import {
  EXIT_STATIC,
  exitCode,
  formatOutcome,
  Lexer,
  type Outcome,
  Parser,
  print,
  Runner,
  showToken,
  stringify,
} from "./mod.ts";

const EXIT_NOINPUT = 66;

const readSource = async (file: string): Promise<string | undefined> => {
  try {
    return await readFile(file, "utf8");
  } catch (e) {
    console.error(
      `Could not read '${file}': ${e instanceof Error ? e.message : String(e)}`,
    );
    process.exitCode = EXIT_NOINPUT;
    return undefined;
  }
};

const report = (outcome: Outcome): void => {
  for (const line of formatOutcome(outcome)) console.error(line);
};

const run = async (file: string): Promise<void> => {
  const src = await readSource(file);
  if (src === undefined) return;
  const outcome = new Runner().run(src);
  report(outcome);
  process.exitCode = exitCode(outcome);
};

const printAST = async (file: string): Promise<void> => {
  const src = await readSource(file);
  if (src === undefined) return;
  const { tokens, errors: lexErrors } = new Lexer(src).scan();
  const { program, errors } = new Parser(tokens).parse();
  const all = [...lexErrors, ...errors];
  if (all.length > 0) {
    report({
      type: "StaticError",
      phase: lexErrors.length > 0 ? "lexical" : "syntax",
      errors: all,
    });
    process.exitCode = EXIT_STATIC;
    return;
  }
  console.log(print(program));
};

const printTokens = async (file: string): Promise<void> => {
  const src = await readSource(file);
  if (src === undefined) return;
  const { tokens, errors } = new Lexer(src).scan();
  for (const tok of tokens) console.log(showToken(tok));
  if (errors.length > 0) {
    report({ type: "StaticError", phase: "lexical", errors });
    process.exitCode = EXIT_STATIC;
  }
};

const repl = async (): Promise<void> => {
  console.log("Ember REPL");

  const runner = new Runner();
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("> ");
  rl.prompt();

  for await (const line of rl) {
    const outcome = runner.run(line);
    if (outcome.type === "Ok") {
      if (outcome.value !== undefined) console.log(stringify(outcome.value));
    } else report(outcome);
    rl.prompt();
  }
};

const main = async (): Promise<void> => {
  const program = new Command()
    .name("ember")
    .version("v0.1.0")
    .description("Ember Interpreter")
    .action(async () => await repl());

  program
    .command("repl")
    .description("Ember REPL")
    .action(async () => await repl());

  program
    .command("run")
    .description("Run an Ember source file")
    .argument("<file>", "source file")
    .action(async (file: string) => await run(file));

  program
    .command("ast")
    .description("Show the AST of an Ember source file")
    .argument("<file>", "source file")
    .action(async (file: string) => await printAST(file));

  program
    .command("tokens")
    .description("Show the tokens of an Ember source file")
    .argument("<file>", "source file")
    .action(async (file: string) => await printTokens(file));

  await program.parseAsync(process.argv);
};

await main();
