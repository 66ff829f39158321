import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';

import { isCalendarDate } from '../codec/observationCodec';
import { mapErrorToResponse } from '../errors';
import type { QueryOutcomeLabel } from '../metrics';
import type { AppContext } from '../types';

type Operation = 'StationSchema' | 'StationName' | 'StationMax' | 'RecordTemps';

const stationParamsSchema = z.object({
  stationId: z.string().trim().min(1)
});

const recordTempsBodySchema = z.object({
  date: z.string().trim().refine(isCalendarDate, 'expected an ISO calendar date (YYYY-MM-DD)'),
  tmax: z.number().finite(),
  tmin: z.number().finite().optional()
});

function outcomeFor(statusCode: number): QueryOutcomeLabel {
  if (statusCode === 404) {
    return 'not_found';
  }
  if (statusCode === 503) {
    return 'unavailable';
  }
  return 'error';
}

export const registerStationRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const fail = (reply: FastifyReply, operation: Operation, error: unknown) => {
    const mapped = mapErrorToResponse(error);
    ctx.metrics.queryRequests.inc({ operation, outcome: outcomeFor(mapped.statusCode) });
    if (mapped.statusCode >= 500 && mapped.statusCode !== 503) {
      reply.log.error({ err: error, operation }, 'station operation failed');
    }
    return reply
      .status(mapped.statusCode)
      .send({ code: mapped.code, message: mapped.message, details: mapped.details });
  };

  const succeed = (operation: Operation) => {
    ctx.metrics.queryRequests.inc({ operation, outcome: 'ok' });
  };

  app.get('/stations/schema', async () => {
    const schema = ctx.queries.stationSchema();
    succeed('StationSchema');
    return { schema };
  });

  app.get('/stations/:stationId/name', async (request, reply) => {
    const params = stationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return fail(reply, 'StationName', params.error);
    }

    try {
      const name = await ctx.queries.stationName(params.data.stationId);
      succeed('StationName');
      return { name };
    } catch (error) {
      return fail(reply, 'StationName', error);
    }
  });

  app.get('/stations/:stationId/max', async (request, reply) => {
    const params = stationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return fail(reply, 'StationMax', params.error);
    }

    try {
      const tmax = await ctx.queries.stationMax(params.data.stationId);
      succeed('StationMax');
      return { tmax };
    } catch (error) {
      return fail(reply, 'StationMax', error);
    }
  });

  app.post('/stations/:stationId/temps', async (request, reply) => {
    const params = stationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return fail(reply, 'RecordTemps', params.error);
    }
    const body = recordTempsBodySchema.safeParse(request.body);
    if (!body.success) {
      return fail(reply, 'RecordTemps', body.error);
    }

    try {
      await ctx.queries.recordTemps({ stationId: params.data.stationId, ...body.data });
      succeed('RecordTemps');
      reply.status(201);
      return { status: 'recorded' };
    } catch (error) {
      return fail(reply, 'RecordTemps', error);
    }
  });
};
