/**
 * cardcheck CLI - Main entry point
 *
 * Uses commander for option parsing and help generation. Running without
 * options prompts for every card field.
 */

import { Command, Option } from "commander";
import { validateCommand } from "./commands/validate.ts";
import { type CardcheckConfig, ConfigError, loadConfig, mergeCliFlags } from "./lib/config.ts";
import { createPrompter, type Prompter } from "./lib/prompt.ts";
import { createLogger, LOG_LEVELS } from "./logger.ts";
import { CLI_VERSION } from "./version.ts";
import type { RandomSource } from "@cardcheck/card";

export { validateCommand } from "./commands/validate.ts";
export type { ValidateCommandDeps, ValidateCommandOptions } from "./commands/validate.ts";
export {
  type CardcheckConfig,
  type CardcheckConfigInput,
  CONFIG_DEFAULTS,
  ConfigError,
  ENV_VARS,
  loadConfig,
  mergeCliFlags,
  readConfigFile,
  readEnvConfig,
} from "./lib/config.ts";
export { appendCardLog, formatCardLogEntry } from "./lib/card_log.ts";
export { renderReport, renderRiskLine } from "./lib/report.ts";
export { createPrompter, LinePrompter, type Prompter } from "./lib/prompt.ts";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./logger.ts";

type CliOptions = {
  number?: string;
  expiry?: string;
  holder?: string;
  cvv?: string;
  logFile?: string;
  cardLog: boolean;
  config?: string;
  logLevel?: string;
};

/** Process-level inputs, replaceable in tests. */
export interface CliContext {
  cwd: string;
  env: Record<string, string | undefined>;
  prompter?: Prompter;
  now?: () => Date;
  random?: RandomSource;
}

export function createProgram(
  context: CliContext = { cwd: process.cwd(), env: process.env },
): Command {
  const program = new Command()
    .name("cardcheck")
    .version(CLI_VERSION)
    .description("💳 Validate a credit card's number, CVV and expiry from the command line")
    .option("--number <digits>", "Card number, no spaces or dashes (skips the prompt)")
    .option("--expiry <MM/YY>", "Expiry date (skips the prompt)")
    .option("--holder <name>", "Card holder name (skips the prompt)")
    .option("--cvv <digits>", "Card verification value (skips the prompt)")
    .option("--log-file <path>", "Card log file (default: card_log.txt)")
    .option("--no-card-log", "Do not append this card to the card log")
    .option("--config <path>", "Config file (JSON, default: ./cardcheck.json)")
    .addOption(
      new Option("--log-level <level>", "Diagnostic log level (stderr)")
        .choices(LOG_LEVELS),
    )
    .action(async () => {
      const options = program.opts<CliOptions>();

      let config: CardcheckConfig;
      try {
        const loaded = await loadConfig({
          cwd: context.cwd,
          configPath: options.config,
          env: context.env,
        });
        config = mergeCliFlags(loaded, {
          logFile: options.logFile,
          // commander defaults --no-* flags to true; only an explicit flag counts
          cardLog: program.getOptionValueSource("cardLog") === "cli" ? options.cardLog : undefined,
          logLevel: options.logLevel,
        });
      } catch (err) {
        if (err instanceof ConfigError) {
          console.error(`[FATAL] ${err.message}`);
          return;
        }
        throw err;
      }

      const logger = createLogger(config.logLevel);
      logger.debug("Config resolved", {
        logFile: config.logFile,
        cardLog: config.cardLog,
        expiringSoonMonths: config.expiringSoonMonths,
      });

      await validateCommand(
        {
          config,
          number: options.number,
          expiry: options.expiry,
          holder: options.holder,
          cvv: options.cvv,
          cwd: context.cwd,
          now: context.now,
          random: context.random,
        },
        {
          prompter: context.prompter ?? createPrompter(),
          logger,
        },
      );
    });

  return program;
}
