import { resolve } from "node:path";
import {
  type CardInput,
  CardError,
  type RandomSource,
  riskScore,
  validateCard,
} from "@cardcheck/card";
import { appendCardLog } from "../lib/card_log.ts";
import type { CardcheckConfig } from "../lib/config.ts";
import { BANNER, UNEXPECTED_ERROR_MESSAGE } from "../lib/constants.ts";
import type { Prompter } from "../lib/prompt.ts";
import { renderReport, renderRiskLine } from "../lib/report.ts";
import type { Logger } from "../logger.ts";

export interface ValidateCommandOptions {
  config: CardcheckConfig;
  /** Fields given on the command line are not prompted for. */
  number?: string;
  expiry?: string;
  holder?: string;
  cvv?: string;
  /** Base directory for a relative card log path. Default: process.cwd(). */
  cwd?: string;
  now?: () => Date;
  random?: RandomSource;
}

export interface ValidateCommandDeps {
  prompter: Prompter;
  logger: Logger;
}

async function collectInput(
  options: ValidateCommandOptions,
  prompter: Prompter,
): Promise<CardInput> {
  const ask = async (
    given: string | undefined,
    message: string,
  ): Promise<string> => (given ?? (await prompter.ask(message))).trim();

  const number = await ask(options.number, "Enter Card Number (no spaces or dashes):");
  const expiry = await ask(options.expiry, "Enter Expiry Date (MM/YY):");
  const holderName = await ask(options.holder, "Enter Card Holder Name:");
  const cvv = await ask(options.cvv, "Enter CVV:");

  return { number, expiry, holderName, cvv };
}

/**
 * Interactive card check: prompt, validate, print the report, append the
 * card log and print the risk score.
 *
 * Never rejects. Card errors and unexpected failures end up as one line on
 * stderr; the process exit code is left alone.
 */
export async function validateCommand(
  options: ValidateCommandOptions,
  deps: ValidateCommandDeps,
): Promise<void> {
  const { config } = options;
  const { prompter } = deps;
  const logger = deps.logger.child({ command: "validate" });
  const now = options.now ?? (() => new Date());

  console.log(`${BANNER}\n`);

  try {
    const input = await collectInput(options, prompter);
    const report = validateCard(input, {
      now: now(),
      expiringSoonMonths: config.expiringSoonMonths,
    });
    logger.debug("Card validated", {
      cardType: report.record.cardType,
      cvvValid: report.cvvValid,
      expiryStatus: report.expiryStatus,
    });

    for (const line of renderReport(report)) {
      console.log(line);
    }

    if (config.cardLog) {
      const logPath = resolve(options.cwd ?? process.cwd(), config.logFile);
      await appendCardLog(logPath, report);
      logger.debug("Card log appended", { path: logPath });
    }

    console.log(renderRiskLine(riskScore(options.random)));
  } catch (err) {
    if (err instanceof CardError) {
      logger.info("Card rejected", { code: err.code });
      console.error(err.message);
    } else {
      logger.debug("Unexpected failure", {
        error: err instanceof Error ? err.message : String(err),
      });
      console.error(UNEXPECTED_ERROR_MESSAGE);
    }
  } finally {
    prompter.close();
  }
}
