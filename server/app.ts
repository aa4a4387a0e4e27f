import express, { type ErrorRequestHandler } from 'express';
import { z } from 'zod';
import { loadConfig, type AppConfig } from './config';
import { initDatabase } from './db';
import { recomputeThreadStats } from './db/recompute';
import { LEAD_STATUSES, REPLY_SCOPES, THREAD_STATUSES } from './db/schema';
import { isInboxError, ValidationError, type InboxErrorCode } from './errors';
import {
  addLeadNote,
  completeTask,
  createLead,
  createTask,
  getLead,
  getLeadByThread,
  listLeads,
  listTasks,
  setLeadTags,
  updateLeadStatus,
} from './crm/store';
import {
  appendOutbound,
  getThread,
  importMessages,
  listThreads,
  setThreadStatus,
} from './inbox/store';
import { reportError } from './observability/reportError';
import { createDefaultRegistry } from './plugins';
import { suggestReply, validateReply } from './replies/engine';
import { createReply, deleteReply, listReplies } from './replies/store';
import { buildInboxReport, buildSlaSummary, REPORT_MODES } from './reports';
import { getProfile, saveProfile } from './workspace/store';
import { computeSla } from '../src/shared/sla';
import { parseOrThrow } from './validation';

export type CreateAppOptions = {
  config?: Partial<AppConfig>;
  clock?: () => Date;
};

const HTTP_STATUS: Record<InboxErrorCode, number> = {
  VALIDATION_FAILED: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
};

const IdSchema = z.coerce.number().int().positive();

const ImportBodySchema = z.union([
  z.array(z.unknown()),
  z.object({ records: z.array(z.unknown()) }).transform((body) => body.records),
]);

const ThreadQuerySchema = z.object({
  platform: z.string().trim().min(1).optional(),
  status: z.enum(THREAD_STATUSES).optional(),
});

const ThreadStatusBodySchema = z.object({ status: z.enum(THREAD_STATUSES) });

const ReplyBodySchema = z.object({
  body: z.string(),
  language: z.string().trim().min(1).optional(),
});

const ReplyQuerySchema = z.object({
  scope: z.enum(REPLY_SCOPES).optional(),
  plugin: z.string().trim().min(1).optional(),
  language: z.string().trim().min(1).optional(),
});

const LeadQuerySchema = z.object({
  status: z.enum(LEAD_STATUSES).optional(),
});

const LeadStatusBodySchema = z.object({ status: z.enum(LEAD_STATUSES) });

const LeadBodySchema = z
  .object({ threadId: z.string().trim().min(1).optional() })
  .passthrough();

const NoteBodySchema = z.object({ note: z.string() });

const TagsBodySchema = z.object({ tags: z.array(z.unknown()) });

const TaskQuerySchema = z.object({
  includeDone: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

const ReportPeriodSchema = z.union([z.enum(REPORT_MODES), z.literal('sla')]);

// body-parser and other express middleware raise errors carrying an HTTP status.
const HttpClientErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  type: z.string().optional(),
});

function parseId(value: string): number {
  return parseOrThrow(IdSchema, value, `Invalid id "${value}"`);
}

export const handleError: ErrorRequestHandler = (
  err: unknown,
  req,
  res,
  next,
) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isInboxError(err)) {
    res.status(HTTP_STATUS[err.code]).json({
      error: err.message,
      code: err.code,
      ...(err instanceof ValidationError ? { issues: err.issues } : {}),
    });
    return;
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }
  const clientError = HttpClientErrorSchema.safeParse(err);
  if (clientError.success) {
    const { status, type } = clientError.data;
    res.status(status).json({
      error: err instanceof Error ? err.message : 'Bad request',
      ...(type ? { code: type } : {}),
    });
    return;
  }
  reportError({
    errorKey: 'UNHANDLED',
    kind: 'http',
    route: `${req.method} ${req.path}`,
    message: err instanceof Error ? err.message : String(err),
  });
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(options: CreateAppOptions = {}) {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  const clock = options.clock ?? (() => new Date());
  const { db } = initDatabase(config.databasePath);
  const registry = createDefaultRegistry(config.plugins);
  const profileOptions = () => ({
    now: clock(),
    defaultLanguage: config.defaultLanguage,
  });

  const app = express();
  app.use(express.json({ limit: '5mb' }));
  // Log every HTTP request
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.info(
        `[${new Date().toISOString()}] ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`,
      );
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      plugins: registry.list().map((plugin) => plugin.name),
    });
  });

  app.post('/api/inbox/import', (req, res) => {
    const batch = parseOrThrow(
      ImportBodySchema,
      req.body,
      'Expected an array of message records',
    );
    const result = importMessages(db, batch, {
      defaultLanguage: config.defaultLanguage,
    });
    res.json(result);
  });

  app.get('/api/threads', (req, res) => {
    const query = parseOrThrow(
      ThreadQuerySchema,
      req.query,
      'Invalid thread filters',
    );
    res.json(listThreads(db, { ...query, now: clock() }));
  });

  app.get('/api/threads/:id', (req, res) => {
    const thread = getThread(db, req.params.id);
    res.json({
      ...thread,
      sla: computeSla(thread.messages, clock()),
      lead: getLeadByThread(db, thread.id),
    });
  });

  app.post('/api/threads/:id/status', (req, res) => {
    const { status } = parseOrThrow(
      ThreadStatusBodySchema,
      req.body,
      'Invalid thread status',
    );
    res.json(setThreadStatus(db, req.params.id, status));
  });

  app.post('/api/threads/:id/reply', (req, res) => {
    const body = parseOrThrow(ReplyBodySchema, req.body, 'Invalid reply');
    const now = clock();
    const thread = getThread(db, req.params.id);
    const check = validateReply(thread, body.body, now);
    if (!check.canSend) {
      throw new ValidationError('Reply cannot be sent', check.warnings);
    }
    const message = appendOutbound(db, thread.id, body.body, {
      now,
      language: body.language,
    });
    res.status(201).json({ message, warnings: check.warnings });
  });

  app.get('/api/threads/:id/suggestion', (req, res) => {
    const thread = getThread(db, req.params.id);
    const profile = getProfile(db, profileOptions());
    res.json(suggestReply(thread, registry, profile, { now: clock() }));
  });

  app.post('/api/recompute', (_req, res) => {
    res.json(recomputeThreadStats(db));
  });

  app.get('/api/workspace', (_req, res) => {
    res.json(getProfile(db, profileOptions()));
  });

  app.put('/api/workspace', (req, res) => {
    res.json(saveProfile(db, req.body, profileOptions()));
  });

  app.get('/api/replies', (req, res) => {
    const query = parseOrThrow(
      ReplyQuerySchema,
      req.query,
      'Invalid reply filters',
    );
    res.json(
      listReplies(db, {
        scope: query.scope,
        pluginName: query.plugin,
        language: query.language,
      }),
    );
  });

  app.post('/api/replies', (req, res) => {
    res.status(201).json(createReply(db, req.body, clock()));
  });

  app.delete('/api/replies/:id', (req, res) => {
    deleteReply(db, parseId(req.params.id));
    res.status(204).end();
  });

  app.get('/api/leads', (req, res) => {
    const query = parseOrThrow(
      LeadQuerySchema,
      req.query,
      'Invalid lead filters',
    );
    res.json(listLeads(db, query.status));
  });

  app.post('/api/leads', (req, res) => {
    const { threadId, ...fields } = parseOrThrow(
      LeadBodySchema,
      req.body,
      'Invalid lead',
    );
    let input: Record<string, unknown> = fields;
    if (threadId && fields.phone === undefined) {
      const thread = getThread(db, threadId);
      const route = registry.route(thread.platform);
      const inbound = thread.messages.filter(
        (message) => message.direction === 'in',
      );
      const latest = inbound[inbound.length - 1];
      if (route.handled && latest) {
        const entities = route.plugin.extract(latest.body, latest.language);
        input = {
          ...fields,
          ...(entities.phone ? { phone: entities.phone } : {}),
          ...(fields.name === undefined && entities.name
            ? { name: entities.name }
            : {}),
        };
      }
    }
    const id = createLead(db, input, threadId ?? null, clock());
    res.status(201).json(getLead(db, id));
  });

  app.post('/api/leads/:id/status', (req, res) => {
    const { status } = parseOrThrow(
      LeadStatusBodySchema,
      req.body,
      'Invalid lead status',
    );
    res.json(updateLeadStatus(db, parseId(req.params.id), status, clock()));
  });

  app.post('/api/leads/:id/notes', (req, res) => {
    const { note } = parseOrThrow(NoteBodySchema, req.body, 'Invalid note');
    res.json(addLeadNote(db, parseId(req.params.id), note, clock()));
  });

  app.put('/api/leads/:id/tags', (req, res) => {
    const { tags } = parseOrThrow(TagsBodySchema, req.body, 'Invalid tags');
    res.json(setLeadTags(db, parseId(req.params.id), tags, clock()));
  });

  app.get('/api/tasks', (req, res) => {
    const query = parseOrThrow(
      TaskQuerySchema,
      req.query,
      'Invalid task filters',
    );
    res.json(listTasks(db, { includeDone: query.includeDone }));
  });

  app.post('/api/tasks', (req, res) => {
    res.status(201).json(createTask(db, req.body, clock()));
  });

  app.post('/api/tasks/:id/complete', (req, res) => {
    res.json(completeTask(db, parseId(req.params.id)));
  });

  app.get('/api/reports/:period', (req, res) => {
    const period = parseOrThrow(
      ReportPeriodSchema,
      req.params.period,
      `Unknown report "${req.params.period}"`,
    );
    if (period === 'sla') {
      res.json(buildSlaSummary(db, clock()));
      return;
    }
    res.json(buildInboxReport(db, period));
  });

  app.use(handleError);

  return { app, config, db, registry };
}
