import z from 'zod';
import { PackingSlipDocument } from '../dtos/packingSlipDtos';
import { PackingSlipService, pageTextSource } from '../services/PackingSlipService';

export type CliOutput = 'csv' | 'production' | 'summary';

export type CliArgs = {
  input: string;
  output: CliOutput;
  group: boolean;
};

export const USAGE = 'Usage: tsx scripts/parsePackingSlips.ts <documents.json> [--output csv|production|summary] [--group]';

const OUTPUTS: readonly CliOutput[] = ['csv', 'production', 'summary'];

function isCliOutput(value: string): value is CliOutput {
  return OUTPUTS.some((o) => o === value);
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const get = (key: string) => {
    const idx = argv.indexOf(key);
    return idx >= 0 ? argv[idx + 1] : undefined;
  };

  const input = argv.find((arg, i) => !arg.startsWith('--') && argv[i - 1] !== '--output');
  const output = get('--output') ?? 'csv';

  if (!input) {
    throw new Error(`Missing input file. ${USAGE}`);
  }
  if (!isCliOutput(output)) {
    throw new Error('--output must be one of csv|production|summary');
  }

  return { input, output, group: argv.includes('--group') };
}

// Either a bare array of documents or the same body the HTTP API takes.
const DocumentsFile = z.union([
  z.array(PackingSlipDocument),
  z.object({ documents: z.array(PackingSlipDocument) }).transform((body) => body.documents),
]);

/**
 * Parses the documents in `fileContents` and renders the requested output.
 * Returns the text to print and the process exit code (1 when nothing was recognised).
 */
export async function runPackingSlipCli(
  args: CliArgs,
  fileContents: string,
  service: PackingSlipService
): Promise<{ text: string; exitCode: number }> {
  const json: unknown = JSON.parse(fileContents);
  const parsed = DocumentsFile.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid documents file ${args.input}: ${parsed.error.message}`);
  }

  const sources = parsed.data.map((doc) => pageTextSource(doc.name, doc.pages ?? null, doc.extractionError));
  const result = await service.parseDocuments(sources, { group: args.group });

  if (result.status !== 'OK') {
    return { text: result.message, exitCode: 1 };
  }

  switch (args.output) {
    case 'csv':
      return { text: service.exportCsv(result.items, 'items'), exitCode: 0 };
    case 'production':
      return { text: service.exportCsv(result.items, 'production'), exitCode: 0 };
    case 'summary':
      return {
        text: JSON.stringify(
          {
            message: result.message,
            skippedDocuments: result.skippedDocuments,
            ...service.summarize(result.items),
          },
          null,
          2
        ),
        exitCode: 0,
      };
  }
}
