import express from 'express';
import { z } from 'zod';
import { describePlan, formatZodError, isGraphError, log, type Logger } from '@opgraph/core';
import { toDot } from './dot.js';
import type { NetworkManager } from './manager.js';

const names = z.array(z.string());

const PlanBody = z.object({
  inputs: names,
  outputs: names.optional(),
});

const ComputeBody = z.object({
  values: z.record(z.string(), z.unknown()),
  outputs: names.optional(),
  method: z.enum(['sequential', 'parallel']).optional(),
});

function sendError(res: express.Response, err: unknown, logger: Logger): void {
  if (isGraphError(err)) {
    res.status(400).json({ error: err.toJSON() });
    return;
  }
  logger.error({ err }, 'request failed');
  const message = err instanceof Error ? err.message : String(err);
  res.status(500).json({ error: { message } });
}

function sendInvalidBody(res: express.Response, error: z.ZodError): void {
  res.status(400).json({ error: { kind: 'invalid-request', message: formatZodError(error) } });
}

export function createNetworkManagerRouter(manager: NetworkManager, logger: Logger = log): express.Router {
  const router = express.Router();
  const routeLogger = logger.child({ component: 'network-manager-router' });

  router.get('/graph', (_req, res) => {
    try {
      res.json({ graph: manager.getGraph(), operations: manager.listOperations() });
    } catch (err) {
      sendError(res, err, routeLogger);
    }
  });

  router.get('/graph.dot', (_req, res) => {
    try {
      const network = manager.network();
      res.type('text/vnd.graphviz').send(toDot(network.network, { title: network.name }));
    } catch (err) {
      sendError(res, err, routeLogger);
    }
  });

  router.post('/plan', (req, res) => {
    const body = PlanBody.safeParse(req.body ?? {});
    if (!body.success) {
      sendInvalidBody(res, body.error);
      return;
    }
    try {
      const plan = manager.plan(body.data.inputs, body.data.outputs);
      res.json({ plan: describePlan(plan), graph: manager.getGraph(plan) });
    } catch (err) {
      sendError(res, err, routeLogger);
    }
  });

  router.post('/compute', async (req, res) => {
    const body = ComputeBody.safeParse(req.body ?? {});
    if (!body.success) {
      sendInvalidBody(res, body.error);
      return;
    }
    try {
      const { values, outputs, method } = body.data;
      res.json(await manager.compute(values, outputs, method ? { method } : {}));
    } catch (err) {
      sendError(res, err, routeLogger);
    }
  });

  return router;
}
