/**
 * Parse packing-slip page text from a JSON file and print CSV or a summary.
 *
 * Usage:
 *   tsx scripts/parsePackingSlips.ts <documents.json> [--output csv|production|summary] [--group]
 *
 * The file holds `[{ name, pages }]` or `{ documents: [{ name, pages }] }`,
 * where each page is a text blob, an array of lines, or null.
 */
import { readFile } from 'fs/promises';
import pino from 'pino';
import { parseCliArgs, runPackingSlipCli } from '../src/cli/packingSlipCli';
import { config } from '../src/config/env';
import { PackingSlipService } from '../src/services/PackingSlipService';

// stdout carries the CSV, so logs go to stderr.
const logger = pino({ level: config.LOG_LEVEL }, pino.destination(2));

async function main() {
  const args = parseCliArgs(process.argv.slice(2));
  const contents = await readFile(args.input, 'utf8');
  const { text, exitCode } = await runPackingSlipCli(args, contents, new PackingSlipService(undefined, logger));

  if (exitCode === 0) {
    process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  } else {
    logger.warn(text);
  }
  process.exitCode = exitCode;
}

main().catch((err) => {
  logger.error(err, 'parsePackingSlips failed');
  process.exit(1);
});
