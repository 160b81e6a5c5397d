import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { EsError, NotFoundError, DecodingError } from "../../es/domain/errors";
import { CommandFailure, encodeEvent } from "../../es/service/commandHandler";
import type { RestaurantService } from "../service/createRestaurantService";

function sendFailure(reply: FastifyReply, failure: CommandFailure) {
  const { statusCode, ...body } = failure;
  return reply.status(statusCode).send(body);
}

function sendError(req: FastifyRequest, reply: FastifyReply, e: unknown) {
  if (e instanceof EsError) {
    return reply.status(e.statusCode).send({ ok: false, code: e.code, message: e.message });
  }
  req.log.error(e);
  return reply.status(500).send({ ok: false, code: "INTERNAL", message: "internal error" });
}

function parseVersionParam(name: string, raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new DecodingError(`invalid query param: ${name}`);
  return n;
}

export async function restaurantRoutes(app: FastifyInstance, opts: { service: RestaurantService }) {
  const { handler, aggregate } = opts.service;

  app.post("/commands", async (req, reply) => {
    try {
      const outcome = await handler.handle(req.body);
      if (!outcome.ok) return sendFailure(reply, outcome);
      return reply.status(201).send(outcome);
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.post<{ Body: { commands?: unknown } | undefined }>("/commands/batch", async (req, reply) => {
    try {
      const outcome = await handler.handleAll(req.body?.commands);
      if (!outcome.ok) return sendFailure(reply, outcome);
      return reply.status(201).send(outcome);
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: { id: string } }>("/streams/:id/state", async (req, reply) => {
    try {
      const { id } = req.params;
      const loaded = await aggregate.getState(id);
      if (loaded.version === 0) {
        throw new NotFoundError(`stream not found: ${id}`);
      }
      return reply.send({ ok: true, ...loaded });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<{ Params: { id: string }; Querystring: { from?: string; to?: string } }>(
    "/streams/:id/events",
    async (req, reply) => {
      try {
        const { id } = req.params;
        const q = req.query;

        const from = parseVersionParam("from", q.from);
        const to = parseVersionParam("to", q.to);
        if (from != null && to != null && from > to) {
          throw new DecodingError(`invalid range: from (${from}) > to (${to})`);
        }

        const events = await aggregate.getEvents(id, from, to);

        return reply.send({
          ok: true,
          stream_id: id,
          from: from ?? null,
          to: to ?? null,
          count: events.length,
          events: events.map(encodeEvent),
        });
      } catch (e) {
        return sendError(req, reply, e);
      }
    }
  );
}

