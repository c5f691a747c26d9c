// ABOUTME: Commander program with memorable, random and stress subcommands.
// ABOUTME: Falls back to an interactive mode prompt when no subcommand is given.

import { Command, InvalidArgumentError, Option } from "commander";
import type { Readable, Writable } from "node:stream";
import { buildConfig, ensureLogDirs, type CLIOptions, type PasswordGenConfig } from "./config.js";
import { createHistory } from "./history.js";
import { log } from "./log.js";
import { WORD_CASES, generateMemorable, validateWordCount } from "./memorable.js";
import { parseModeChoice, readAnswer, type Mode } from "./prompt.js";
import { generateRandom } from "./random.js";
import { defaultSources, type RandomSources } from "./rng.js";
import { DEFAULT_STRESS_COUNT, runStress } from "./stress.js";
import { loadWords } from "./words.js";

export interface CliIO {
  input: Readable;
  // Generated passwords, one per line
  output: Writable;
  // Prompt text and commander usage errors
  errors: Writable;
  sources?: RandomSources;
  now?: () => Date;
  exitOverride?: boolean;
}

interface MemorableFlags {
  n_words: number;
  case: string;
  no_digit?: boolean;
}

interface RandomFlags {
  length: number;
  no_punct?: boolean;
  forbidden: string;
}

const MEMORABLE_DEFAULTS: MemorableFlags = { n_words: 4, case: "lower" };
const RANDOM_DEFAULTS: RandomFlags = { length: 16, forbidden: "" };

export function parseInteger(value: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

export function createProgram(io: CliIO): Command {
  const sources = io.sources ?? defaultSources;
  const program = new Command();

  // Set before subcommands are added so they inherit it
  program.configureOutput({
    writeOut: (str) => io.output.write(str),
    writeErr: (str) => io.errors.write(str),
  });
  if (io.exitOverride) {
    program.exitOverride();
  }

  program
    .name("passgen")
    .description("Password generator (memorable or random) that logs every password with a timestamp")
    .version("0.1.0")
    .option("--log-dir <dir>", "Directory holding the Memorable/ and Random/ logs (default: current directory)")
    .option(
      "--word-list <path>",
      "Word list file, one lowercase noun per line (default: the bundled list of about 300 nouns; pass a larger list for more entropy per word)"
    )
    .option("--word-limit <count>", "Only use the first <count> words of the list", parseInteger);

  function setup(): PasswordGenConfig {
    const config = buildConfig(program.opts<CLIOptions>());
    ensureLogDirs(config);
    return config;
  }

  function memorable(config: PasswordGenConfig, flags: MemorableFlags): void {
    // Reject a bad count before touching the word list
    validateWordCount(flags.n_words);
    const pool = loadWords(config.words.path, config.words.limit);
    const password = generateMemorable(
      { pool, wordCount: flags.n_words, case: flags.case, appendDigits: !flags.no_digit },
      createHistory(config.logs.memorable, io.now),
      sources,
    );
    io.output.write(password + "\n");
  }

  function random(config: PasswordGenConfig, flags: RandomFlags): void {
    const password = generateRandom(
      { length: flags.length, includePunctuation: !flags.no_punct, forbidden: flags.forbidden },
      createHistory(config.logs.random, io.now),
      sources,
    );
    io.output.write(password + "\n");
  }

  function stress(config: PasswordGenConfig): void {
    const pool = loadWords(config.words.path, config.words.limit);
    const summary = runStress(
      {
        pool,
        histories: {
          memorable: createHistory(config.logs.memorable, io.now),
          random: createHistory(config.logs.random, io.now),
        },
      },
      sources,
    );
    log(`Stress run: ${summary.memorable} memorable, ${summary.random} random`);
    io.output.write(`Generated ${DEFAULT_STRESS_COUNT} mixed passwords.\n`);
  }

  function run(mode: Mode, config: PasswordGenConfig): void {
    if (mode === "memorable") {
      memorable(config, MEMORABLE_DEFAULTS);
    } else if (mode === "random") {
      random(config, RANDOM_DEFAULTS);
    } else {
      stress(config);
    }
  }

  program
    .command("memorable")
    .allowExcessArguments(false)
    .description("generate memorable password")
    .option("--n_words <n>", "number of words", parseInteger, MEMORABLE_DEFAULTS.n_words)
    .addOption(
      new Option("--case <case>", "letter case for words").choices(WORD_CASES).default(MEMORABLE_DEFAULTS.case)
    )
    .option("--no_digit", "do not add a digit to each word")
    .action((flags: MemorableFlags) => {
      memorable(setup(), flags);
    });

  program
    .command("random")
    .allowExcessArguments(false)
    .description("generate random password")
    .option("--length <n>", "length of password", parseInteger, RANDOM_DEFAULTS.length)
    .option("--no_punct", "do not include punctuation characters")
    .option("--forbidden <chars>", `characters to exclude, e.g. "O0Il|\`'\\" "`, RANDOM_DEFAULTS.forbidden)
    .action((flags: RandomFlags) => {
      random(setup(), flags);
    });

  program
    .command("stress")
    .allowExcessArguments(false)
    .description(`generate ${DEFAULT_STRESS_COUNT} mixed passwords`)
    .action(() => {
      stress(setup());
    });

  // No subcommand: ask which mode to run, with default settings
  program.action(async () => {
    // Only a bare invocation prompts; anything else is a mistyped subcommand
    if (program.args.length > 0) {
      return program.error(`error: unknown command '${program.args[0]}'`, { code: "commander.unknownCommand" });
    }
    const config = setup();
    const answer = await readAnswer({ input: io.input, output: io.errors });
    const mode = parseModeChoice(answer);
    if (mode === undefined) {
      return program.error(`Invalid choice: ${answer.trim()}`);
    }
    run(mode, config);
  });

  return program;
}
