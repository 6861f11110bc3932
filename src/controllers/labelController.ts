import { FastifyRequest } from 'fastify';
import { inferPackaging } from '../services/packaging';
import type { InferLabelRequestType } from '../dtos/invoiceDtos';

export const labelController = {
  async infer(req: FastifyRequest<{ Body: InferLabelRequestType }>) {
    return inferPackaging(req.body.label);
  },
};
