import { logger } from '../infrastructure/logger';
import type { ServiceLogger } from '../infrastructure/logger';
import {
  DEFAULT_PARSER_TABLES,
  assembleDocument,
  filterLineItems,
  groupLineItems,
  normalizeDocumentLines,
  productionSummary,
  summarizeLineItems,
} from './packingSlips';
import type {
  AssembledDocument,
  LineItem,
  LineItemFilter,
  LineItemSummary,
  PageText,
  ParserTables,
  ProductionRow,
} from './packingSlips';
import { lineItemsToCsv, productionSummaryToCsv } from './export/lineItemExport';
import { buildLabels } from './labels/labelLayout';
import type { LabelKind, LabelLayout } from './labels/labelLayout';

/** Thrown by a page-text source that cannot read its document at all. */
export class DocumentExtractionError extends Error {
  readonly documentName: string;

  constructor(documentName: string, message: string) {
    super(message);
    this.name = 'DocumentExtractionError';
    this.documentName = documentName;
  }
}

/** One input document; the text extraction itself happens elsewhere. */
export interface PageTextSource {
  name: string;
  readPages(): readonly PageText[] | Promise<readonly PageText[]>;
}

export type ParseStatus = 'OK' | 'NO_DOCUMENTS' | 'NO_ITEMS' | 'NO_MATCHES';

export type SkippedDocument = { name: string; reason: string };

export type ParseResult = {
  status: ParseStatus;
  message: string;
  items: LineItem[];
  documentCount: number;
  parsedDocumentCount: number;
  skippedDocuments: SkippedDocument[];
  orderBlocks: number;
  droppedChunks: number;
};

export type ParseOptions = {
  /** Merge duplicate line items after parsing. */
  group?: boolean;
  filter?: LineItemFilter;
};

export type ExportTable = 'items' | 'production';

export type SummaryResult = {
  summary: LineItemSummary;
  production: ProductionRow[];
};

/** Wraps already-extracted page text; a non-empty `extractionError` makes `readPages` throw. */
export function pageTextSource(name: string, pages: readonly PageText[] | null, extractionError?: string): PageTextSource {
  return {
    name,
    readPages() {
      if (extractionError) throw new DocumentExtractionError(name, extractionError);
      return pages ?? [];
    },
  };
}

function statusMessage(status: ParseStatus, itemCount: number, parsedDocumentCount: number): string {
  switch (status) {
    case 'NO_DOCUMENTS':
      return 'No documents provided';
    case 'NO_ITEMS':
      return 'No recognizable items found';
    case 'NO_MATCHES':
      return `None of the ${itemCount} parsed line item(s) matched the filter`;
    case 'OK':
      return `Parsed ${itemCount} line item(s) from ${parsedDocumentCount} document(s)`;
  }
}

export class PackingSlipService {
  constructor(
    private readonly tables: ParserTables = DEFAULT_PARSER_TABLES,
    private readonly log: ServiceLogger = logger
  ) {}

  /** Runs one document's lines through segmentation and assembly. */
  parseLines(lines: readonly string[], sourceDocument: string): AssembledDocument {
    return assembleDocument(lines, sourceDocument, this.tables);
  }

  /**
   * Parses documents one at a time, in the order given. A document whose
   * extraction fails is skipped and reported; any other error propagates.
   */
  async parseDocuments(sources: readonly PageTextSource[], options: ParseOptions = {}): Promise<ParseResult> {
    const items: LineItem[] = [];
    const skippedDocuments: SkippedDocument[] = [];
    let parsedDocumentCount = 0;
    let orderBlocks = 0;
    let droppedChunks = 0;

    for (const source of sources) {
      let pages: readonly PageText[];
      try {
        pages = await source.readPages();
      } catch (error) {
        if (!(error instanceof DocumentExtractionError)) throw error;
        this.log.warn({ document: source.name, reason: error.message }, 'Skipping unreadable document');
        skippedDocuments.push({ name: source.name, reason: error.message });
        continue;
      }

      const parsed = this.parseLines(normalizeDocumentLines(pages), source.name);
      parsedDocumentCount += 1;
      orderBlocks += parsed.orderBlocks;
      droppedChunks += parsed.droppedChunks;
      items.push(...parsed.items);

      if (parsed.droppedChunks > 0) {
        this.log.warn(
          { document: source.name, droppedChunks: parsed.droppedChunks },
          'Dropped item chunks that did not form a valid line item'
        );
      }
      this.log.debug(
        { document: source.name, orderBlocks: parsed.orderBlocks, items: parsed.items.length },
        'Parsed packing slip'
      );
    }

    let result = options.group ? groupLineItems(items) : items;
    if (options.filter) result = filterLineItems(result, options.filter);

    let status: ParseStatus = 'OK';
    if (sources.length === 0) status = 'NO_DOCUMENTS';
    else if (items.length === 0) status = 'NO_ITEMS';
    else if (result.length === 0) status = 'NO_MATCHES';

    this.log.info(
      { status, documents: sources.length, skipped: skippedDocuments.length, items: result.length },
      'Packing slip parse complete'
    );

    return {
      status,
      message: statusMessage(status, status === 'NO_MATCHES' ? items.length : result.length, parsedDocumentCount),
      items: result,
      documentCount: sources.length,
      parsedDocumentCount,
      skippedDocuments,
      orderBlocks,
      droppedChunks,
    };
  }

  summarize(items: readonly LineItem[]): SummaryResult {
    return {
      summary: summarizeLineItems(items),
      production: productionSummary(items, this.tables.catalog),
    };
  }

  exportCsv(items: readonly LineItem[], table: ExportTable): string {
    if (table === 'production') return productionSummaryToCsv(productionSummary(items, this.tables.catalog));
    return lineItemsToCsv(items, this.tables.catalog);
  }

  buildLabels(items: readonly LineItem[], kind: LabelKind): LabelLayout[] {
    return buildLabels(items, kind, this.tables.catalog);
  }
}
