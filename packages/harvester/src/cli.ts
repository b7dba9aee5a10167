#!/usr/bin/env node
import 'dotenv/config';
import { z } from 'zod';
import { crawlArgsSchema, resolveCrawlSettings, runCrawlAction } from './actions/crawl.js';
import { dedupeArgsSchema, runDedupeAction } from './actions/dedupe.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';
import { loadEnv, type HarvesterEnv } from './config/env.js';
import { parseArgs } from './utils/args.js';

const cliInputSchema = z.object({
  command: z.enum(['help', 'crawl', 'status', 'dedupe']),
  options: z.record(z.string(), z.string()),
});

function printHelp(): void {
  console.log(`thread-harvester CLI

Usage:
  harvester help
  harvester crawl
  harvester crawl --groups="https://groups.example.com/g/soil-carbon,https://groups.example.com/g/cover-crops"
  harvester crawl --maxItems=20 --minDelay=3 --maxDelay=6
  harvester crawl --outputFile="./data/threads.csv" --checkpoint="./data/checkpoint.json"
  harvester crawl --fresh
  harvester status --pretty
  harvester dedupe --input="./data/group_threads.csv" --outputFile="./data/threads.jsonl"

Commands:
  help    Show this help message
  crawl   Walk every group's listing and append new threads to the CSV output,
          resuming from the checkpoint
  status  Print per-group progress recorded in the checkpoint
  dedupe  Drop rows whose content was already ingested and write the rest as JSON lines

Crawl options (each overrides its environment variable):
  --groups      Comma-separated group URLs (TARGET_GROUPS).
  --maxItems    New threads to process per group in this run (MAX_THREADS_PER_GROUP, default: 100).
  --minDelay    Minimum pause between threads in seconds (MIN_DELAY, default: 3).
  --maxDelay    Maximum pause between threads in seconds (MAX_DELAY, default: 6).
  --pageWait    Wait after loading more of a listing, in seconds (PAGE_LOAD_WAIT, default: 5).
  --maxScrolls  Load attempts per listing page (MAX_SCROLL_ATTEMPTS, default: 10).
  --timeout     Thread page timeout in seconds (DETAIL_TIMEOUT, default: 30).
  --checkpoint  Checkpoint file (CHECKPOINT_FILE, default: data/scraper_checkpoint.json).
  --outputFile  CSV output file (OUTPUT_FILE, default: data/group_threads.csv).
  --errorsDir   Directory for failed-thread snapshots (ERROR_SNAPSHOT_DIR, default: data/errors).
  --fresh       Discard the checkpoint and start over.

Status options:
  --checkpoint  Checkpoint file (CHECKPOINT_FILE).
  --pretty      Pretty-print JSON output.

Dedupe options:
  --input       Required. CSV written by crawl.
  --index       Content fingerprint index (CONTENT_HASH_FILE, default: data/content_hashes.json).
  --outputFile  JSON lines output (default: input path with .jsonl).

Environment:
  Variables are read from the process and from a .env file in the working directory.
  LOG_LEVEL (default: info) and LOG_FILE control logging.
`);
}

function readEnv(): HarvesterEnv | undefined {
  try {
    return loadEnv();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(error.issues[0]?.message ?? 'Invalid environment');
      return undefined;
    }

    throw error;
  }
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const env = readEnv();
  if (!env) {
    return 1;
  }

  if (parsedCliInput.data.command === 'crawl') {
    const parsedCrawlArgs = crawlArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedCrawlArgs.success) {
      console.error(parsedCrawlArgs.error.issues[0]?.message ?? 'Invalid arguments');
      printHelp();
      return 1;
    }

    return runCrawlAction(resolveCrawlSettings(parsedCrawlArgs.data, env));
  }

  if (parsedCliInput.data.command === 'status') {
    const parsedStatusArgs = statusArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedStatusArgs.success) {
      console.error(parsedStatusArgs.error.issues[0]?.message ?? 'Invalid arguments');
      printHelp();
      return 1;
    }

    return runStatusAction(
      parsedStatusArgs.data.checkpoint ?? env.checkpointFile,
      parsedStatusArgs.data.pretty,
    );
  }

  const parsedDedupeArgs = dedupeArgsSchema.safeParse(parsedCliInput.data.options);
  if (!parsedDedupeArgs.success) {
    console.error(parsedDedupeArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  return runDedupeAction(
    parsedDedupeArgs.data.input,
    parsedDedupeArgs.data.index ?? env.contentHashFile,
    parsedDedupeArgs.data.outputFile,
  );
}

const exitCode = await main();
process.exitCode = exitCode;
