import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerIngestionRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/ingestion/status', async () => {
    const { stream, quorum } = ctx.config;
    return {
      enabled: ctx.consumer !== null,
      topic: stream.topic,
      groupId: stream.groupId,
      writeRequiredAcks: quorum.write.requiredAcks,
      consumer: ctx.consumer ? ctx.consumer.getStatus() : null
    };
  });
};
