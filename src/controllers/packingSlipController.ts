import { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { ExportQuery, LabelsRequest, ParseRequest } from '../dtos/packingSlipDtos';
import type { PackingSlipDocumentType, ParseRequestType } from '../dtos/packingSlipDtos';
import { PackingSlipService, pageTextSource } from '../services/PackingSlipService';
import type { PageTextSource, ParseResult } from '../services/PackingSlipService';
import { PackingSlipRequestError } from '../utils/httpErrors';

function toSources(documents: readonly PackingSlipDocumentType[]): PageTextSource[] {
  return documents.map((doc) => pageTextSource(doc.name, doc.pages ?? null, doc.extractionError));
}

function serviceFor(request: FastifyRequest): PackingSlipService {
  // Scoped to the request logger so service logs carry the request id.
  return new PackingSlipService(undefined, request.log);
}

async function runParse(service: PackingSlipService, body: ParseRequestType): Promise<ParseResult> {
  return service.parseDocuments(toSources(body.documents), { group: body.group, filter: body.filter });
}

/** Export and label endpoints have nothing to return without items. */
async function parseOrThrow(service: PackingSlipService, body: ParseRequestType): Promise<ParseResult> {
  const result = await runParse(service, body);
  if (result.status !== 'OK') throw new PackingSlipRequestError(result.status, result.message);
  return result;
}

export const packingSlipController = {
  async parse(request: FastifyRequest<{ Body: z.infer<typeof ParseRequest> }>, reply: FastifyReply) {
    const result = await runParse(serviceFor(request), request.body);

    return reply.send({
      status: result.status,
      message: result.message,
      itemCount: result.items.length,
      documentCount: result.documentCount,
      parsedDocumentCount: result.parsedDocumentCount,
      skippedDocuments: result.skippedDocuments,
      droppedChunks: result.droppedChunks,
      items: result.items,
    });
  },

  async summary(request: FastifyRequest<{ Body: z.infer<typeof ParseRequest> }>, reply: FastifyReply) {
    const service = serviceFor(request);
    const result = await runParse(service, request.body);
    const { summary, production } = service.summarize(result.items);

    return reply.send({
      status: result.status,
      message: result.message,
      summary,
      production,
    });
  },

  async exportCsv(
    request: FastifyRequest<{ Body: z.infer<typeof ParseRequest>; Querystring: z.infer<typeof ExportQuery> }>,
    reply: FastifyReply
  ) {
    const service = serviceFor(request);
    const { table } = request.query;
    const result = await parseOrThrow(service, request.body);
    const filename = table === 'production' ? 'production-summary.csv' : 'line-items.csv';

    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${filename}"`)
      .send(service.exportCsv(result.items, table));
  },

  async labels(request: FastifyRequest<{ Body: z.infer<typeof LabelsRequest> }>, reply: FastifyReply) {
    const service = serviceFor(request);
    const result = await parseOrThrow(service, request.body);
    const labels = service.buildLabels(result.items, request.body.kind);

    return reply.send({
      kind: request.body.kind,
      count: labels.length,
      labels,
    });
  },
};
