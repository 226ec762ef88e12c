import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import type { Prompter } from "./lib/prompt.ts";
import { createProgram } from "./mod.ts";

const NOW = new Date(2026, 2, 15);

const CARD_ARGS = [
  "--number",
  "4111111111111111",
  "--expiry",
  "12/30",
  "--holder",
  "Jane Doe",
  "--cvv",
  "123",
];

const silentPrompter: Prompter = {
  ask: () => Promise.resolve(""),
  close: () => {},
};

let dir = "";
let stdout: string[] = [];
let stderr: string[] = [];

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "cardcheck-cli-test-"));
  stdout = [];
  stderr = [];
  vi.spyOn(console, "log").mockImplementation((msg: string) => {
    stdout.push(msg);
  });
  vi.spyOn(console, "error").mockImplementation((msg: string) => {
    stderr.push(msg);
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  await rm(dir, { recursive: true, force: true });
});

async function run(
  args: string[],
  env: Record<string, string | undefined> = {},
): Promise<void> {
  const program = createProgram({
    cwd: dir,
    env,
    prompter: silentPrompter,
    now: () => NOW,
    random: () => 0.25,
  });
  await program.parseAsync(args, { from: "user" });
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

test("cli validates a card given entirely by flags", async () => {
  await run(CARD_ARGS);

  expect(stdout[stdout.length - 1]).toBe("AI Risk Score (0=Safe, 1=High Risk): 0.25");
  expect(stderr).toEqual([]);
  expect(process.exitCode).toBeUndefined();
  expect(await readFile(join(dir, "card_log.txt"), "utf-8")).toContain(
    "Masked Card: XXXX-XXXX-XXXX-1111\n",
  );
});

test("cli --log-file overrides the default card log path", async () => {
  await run([...CARD_ARGS, "--log-file", "flag.txt"]);

  expect(await exists(join(dir, "flag.txt"))).toBe(true);
  expect(await exists(join(dir, "card_log.txt"))).toBe(false);
});

test("cli --no-card-log disables the card log", async () => {
  await run([...CARD_ARGS, "--no-card-log"]);

  expect(await exists(join(dir, "card_log.txt"))).toBe(false);
});

test("cli keeps cardLog from the config file when the flag is absent", async () => {
  await writeFile(join(dir, "cardcheck.json"), JSON.stringify({ cardLog: false }));

  await run(CARD_ARGS);

  expect(await exists(join(dir, "card_log.txt"))).toBe(false);
});

test("cli reads the card log path from the environment", async () => {
  await run(CARD_ARGS, { CARDCHECK_LOG_FILE: "env.txt" });

  expect(await exists(join(dir, "env.txt"))).toBe(true);
});

test("cli reports invalid configuration and keeps exit code 0", async () => {
  await run(CARD_ARGS, { CARDCHECK_EXPIRING_SOON_MONTHS: "soon" });

  expect(stdout).toEqual([]);
  expect(stderr).toEqual([
    "[FATAL] Invalid integer for CARDCHECK_EXPIRING_SOON_MONTHS: soon",
  ]);
  expect(process.exitCode ?? 0).toBe(0);
});

test("cli leaves the exit code alone when the card is rejected", async () => {
  await run(["--number", "1234", "--expiry", "12/30", "--holder", "X", "--cvv", "123"]);

  expect(stderr).toEqual(["❌ Invalid card number length!"]);
  expect(process.exitCode).toBeUndefined();
});
