import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { labelController } from '../controllers/labelController';
import { InferLabelRequest, InferLabelResponse } from '../dtos/invoiceDtos';

export default async function labelRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/infer',
    {
      schema: {
        body: InferLabelRequest,
        response: {
          200: InferLabelResponse,
        },
      },
    },
    labelController.infer
  );
}
