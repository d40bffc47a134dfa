import z from 'zod';
import { config } from '../config/env';

// A page is a text blob, a list of lines, or null when the extractor could not read it.
export const PageTextDto = z.union([z.string(), z.array(z.string()), z.null()]);

export const PackingSlipDocument = z.object({
  name: z.string().min(1, 'Document name is required'),
  pages: z.array(PageTextDto).nullable().optional(),
  // Set by the extraction step when the file could not be read at all.
  extractionError: z.string().min(1).optional(),
});

export type PackingSlipDocumentType = z.infer<typeof PackingSlipDocument>;

export const LineItemFilterDto = z.object({
  colors: z.array(z.string()).optional(),
  skus: z.array(z.string()).optional(),
  orderIds: z.array(z.string()).optional(),
  buyer: z.string().optional(),
});

export const ParseRequest = z.object({
  documents: z.array(PackingSlipDocument).max(config.MAX_DOCUMENTS_PER_REQUEST),
  group: z.boolean().optional().default(false),
  filter: LineItemFilterDto.optional(),
});

export type ParseRequestType = z.infer<typeof ParseRequest>;

export const ExportQuery = z.object({
  table: z.enum(['items', 'production']).default('items'),
});

export type ExportQueryType = z.infer<typeof ExportQuery>;

export const LabelsRequest = ParseRequest.extend({
  kind: z.enum(['manufacturing', 'gift']).default('manufacturing'),
});

export type LabelsRequestType = z.infer<typeof LabelsRequest>;
