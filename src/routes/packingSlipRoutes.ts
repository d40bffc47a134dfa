import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { packingSlipController } from '../controllers/packingSlipController';
import { ExportQuery, LabelsRequest, ParseRequest } from '../dtos/packingSlipDtos';

export default async function packingSlipRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post('/parse', { schema: { body: ParseRequest } }, packingSlipController.parse);

  app.post('/summary', { schema: { body: ParseRequest } }, packingSlipController.summary);

  app.post(
    '/export',
    {
      schema: {
        body: ParseRequest,
        querystring: ExportQuery,
      },
    },
    packingSlipController.exportCsv
  );

  app.post('/labels', { schema: { body: LabelsRequest } }, packingSlipController.labels);
}
