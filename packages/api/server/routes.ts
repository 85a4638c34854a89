/**
 * API Routes
 *
 * Pipeline CRUD, the status-update callback, triggers, and an SSE stream
 * that forwards EventBus notifications.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { z } from 'zod';
import {
  createEvent,
  ValidationError,
  type EventBus,
  type Logger,
  type PipelineStore,
  type StatusUpdate,
} from '@pipetrack/shared';
import type { FlowRunParams, PipelineDispatcher, StatusUpdateProtocol, TriggerResult } from '@pipetrack/flow';
import {
  CreatePipelineBody,
  CreateRunBody,
  formatIssues,
  IdParam,
  ListQuery,
  serializeEvent,
  serializePipeline,
  serializeStage,
  StatusUpdateBody,
  TriggerBody,
} from './schemas.js';

export interface RouteDeps {
  store: PipelineStore;
  protocol: StatusUpdateProtocol;
  dispatcher: PipelineDispatcher;
  bus: EventBus;
  logger: Logger;
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function asyncRoute(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

function parseId(raw: string | undefined): number {
  const parsed = IdParam.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid id: ${String(raw)}`, ['id: must be a positive integer']);
  }
  return parsed.data;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const message = formatIssues(parsed.error);
    throw new ValidationError(message, parsed.error.issues.map(i => i.message));
  }
  return parsed.data;
}

function sendTrigger(res: Response, result: TriggerResult): void {
  if (result.ok) {
    res.status(202).json({
      success: true,
      message: `Pipeline ${result.pipelineId} triggered`,
      pipeline_id: result.pipelineId,
      run_id: result.runId,
    });
    return;
  }
  res.status(result.reason === 'pipeline_not_found' ? 404 : 409).json({
    success: false,
    reason: result.reason,
    error: result.message,
  });
}

export function createRoutes(deps: RouteDeps): Router {
  const { store, protocol, dispatcher, bus } = deps;
  const logger = deps.logger.child({ component: 'api' });
  const router = Router();

  // ─── Health ──────────────────────────────────────────────────

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ─── Pipelines ───────────────────────────────────────────────

  router.post('/pipelines', asyncRoute(async (req, res) => {
    const body = parseBody(CreatePipelineBody, req.body);
    const pipeline = store.createPipeline({ name: body.name, description: body.description ?? null });
    logger.info('pipeline created', { pipelineId: pipeline.id, name: pipeline.name });
    await bus.emit(createEvent('pipeline.created', 'api', { name: pipeline.name }, pipeline.id));
    res.status(201).json(serializePipeline(pipeline));
  }));

  router.get('/pipelines', (req, res) => {
    const query = parseBody(ListQuery, req.query);
    res.json(store.listPipelines(query.skip, query.limit).map(serializePipeline));
  });

  router.get('/pipelines/:id', (req, res) => {
    const id = parseId(req.params.id);
    const pipeline = store.getPipeline(id);
    if (!pipeline) {
      res.status(404).json({ success: false, error: `Pipeline ${id} not found` });
      return;
    }
    res.json(serializePipeline(pipeline));
  });

  router.get('/pipelines/:id/stages', (req, res) => {
    const id = parseId(req.params.id);
    if (!store.getPipeline(id)) {
      res.status(404).json({ success: false, error: `Pipeline ${id} not found` });
      return;
    }
    res.json(store.getStages(id).map(serializeStage));
  });

  router.delete('/pipelines/:id', asyncRoute(async (req, res) => {
    const id = parseId(req.params.id);
    if (!store.deletePipeline(id)) {
      res.status(404).json({ success: false, error: `Pipeline ${id} not found` });
      return;
    }
    logger.info('pipeline deleted', { pipelineId: id });
    await bus.emit(createEvent('pipeline.deleted', 'api', {}, id));
    res.status(204).end();
  }));

  // ─── Status callback ─────────────────────────────────────────

  router.post('/status-update', asyncRoute(async (req, res) => {
    const body = parseBody(StatusUpdateBody, req.body);
    const update: StatusUpdate = {
      pipelineId: body.pipeline_id,
      status: body.status,
      ...(body.stage_name ? { stageName: body.stage_name } : {}),
      ...(body.error_message ? { errorMessage: body.error_message } : {}),
      ...(body.records_processed !== undefined && body.records_processed !== null
        ? { recordsProcessed: body.records_processed }
        : {}),
    };

    const result = await protocol.applyStatusUpdate(update);
    if (!result.ok) {
      res.status(404).json({ success: false, reason: result.reason, error: result.message });
      return;
    }
    res.json({ success: true });
  }));

  // ─── Triggers ────────────────────────────────────────────────

  router.post('/trigger', asyncRoute(async (req, res) => {
    const body = parseBody(TriggerBody, req.body);
    sendTrigger(res, await dispatcher.trigger(body.pipeline_id, runParams(body.record_count)));
  }));

  router.post('/trigger/:id', asyncRoute(async (req, res) => {
    const id = parseId(req.params.id);
    sendTrigger(res, await dispatcher.trigger(id));
  }));

  router.post('/runs', asyncRoute(async (req, res) => {
    const body = parseBody(CreateRunBody, req.body);
    const { pipeline, trigger } = await dispatcher.createAndTrigger(
      {
        name: body.name ?? `Pipeline run ${new Date().toISOString()}`,
        description: body.description ?? null,
      },
      runParams(body.record_count)
    );
    if (!trigger.ok) {
      sendTrigger(res, trigger);
      return;
    }
    res.status(202).json({
      success: true,
      pipeline_id: pipeline.id,
      run_id: trigger.runId,
    });
  }));

  // ─── Events (SSE) ────────────────────────────────────────────

  router.get('/events', (req, res) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(': connected\n\n');

    const unsubscribe = bus.on('*', (event) => {
      res.write(`event: ${event.channel}\ndata: ${JSON.stringify(serializeEvent(event))}\n\n`);
    });

    req.on('close', () => {
      unsubscribe();
      logger.debug('event stream closed');
    });
  });

  return router;
}

function runParams(recordCount: number | undefined): FlowRunParams | undefined {
  return recordCount !== undefined ? { input: { recordCount } } : undefined;
}
