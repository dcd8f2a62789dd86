#!/usr/bin/env node
import { z } from 'zod';
import { enrichArgsSchema, runEnrichAction } from './actions/enrich.js';
import { extractArgsSchema, runExtractAction } from './actions/extract.js';
import { parseArgs } from './actions/cli-args.js';

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('enrich'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('extract'),
    options: z.record(z.string(), z.string()),
  }),
]);

function printHelp(): void {
  console.log(`news-enricher CLI

Usage:
  cli help
  cli enrich --inputDir=./input --outputDir=./output
  cli enrich --inputDir=./input --outputDir=./output --logDir=./logs
  cli enrich --inputDir=./input --outputDir=./output --urlColumn=link --fetchTimeoutMs=10000
  cli extract --url="https://www.example.com/news/story"
  cli extract --url="example.com/news/story" --pretty

Commands:
  help     Show this help message
  enrich   Add content, title, date, media_name and journalist_name columns
           to every CSV row and write enriched_data_<timestamp>.csv
  extract  Run the five extractors for a single URL and print JSON

Enrich options:
  --inputDir       Required. Directory whose *.csv files are concatenated.
  --outputDir      Required. Directory for the enriched CSV file.
  --logDir         Optional. Directory for the run log file (default: logs).
  --urlColumn      Optional. Column holding article URLs (default: page_link).
  --progressStep   Optional. Percent between progress log lines (default: 10).

Extract options:
  --url            Required. Article URL, with or without scheme.
  --pretty         Optional. Pretty-print JSON output.

Network options (enrich and extract):
  --probeTimeoutMs Optional. Scheme probe timeout (default: 5000).
  --fetchTimeoutMs Optional. Page fetch timeout (default: 6000).
  --maxAttempts    Optional. Fetch attempts on transient errors (default: 3).
  --retryDelayMs   Optional. Delay between attempts (default: 1000).
  --userAgent      Optional. User-Agent header for probes and fetches.

Logging options (enrich and extract):
  --logLevel       Optional. Overrides LOG_LEVEL for this run.

Environment:
  LOG_LEVEL        fatal, error, warn, info (default), debug, trace or silent.
`);
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

  if (parsedCliInput.data.command === 'enrich') {
    const parsedEnrichArgs = enrichArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedEnrichArgs.success) {
      console.error(
        parsedEnrichArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runEnrichAction(parsedEnrichArgs.data);
  }

  const parsedExtractArgs = extractArgsSchema.safeParse(
    parsedCliInput.data.options,
  );
  if (!parsedExtractArgs.success) {
    console.error(
      parsedExtractArgs.error.issues[0]?.message ?? 'Invalid arguments',
    );
    printHelp();
    return 1;
  }

  return runExtractAction(parsedExtractArgs.data);
}

const exitCode = await main();
process.exitCode = exitCode;
