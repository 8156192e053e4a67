import { Router, type IRouter } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import * as fs from 'fs';
import { z } from 'zod';
import { isTerminalEvent, SEARCH_FIELDS, type LoadEvent } from '@mbox-search/shared';
import {
  logger,
  normalizeField,
  type MboxSession,
  type MboxWorkspace,
  type MessageRef,
} from '@mbox-search/mbox-core';
import { BadRequestError } from '../middleware/error-handler';

const openLocalSchema = z.object({
  filePath: z.string().min(1, 'Missing filePath in request body'),
});

const searchQuerySchema = z.object({
  q: z.string().default(''),
  field: z
    .string()
    .optional()
    .refine((v) => !v || SEARCH_FIELDS.some((f) => f === v.toLowerCase()), {
      message: `must be one of ${SEARCH_FIELDS.join(', ')}`,
    }),
  caseSensitive: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v === 'true'),
  limit: z.coerce.number().int().positive().optional(),
});

const messageParamsSchema = z.object({
  index: z.coerce.number().int().nonnegative(),
  attachmentIndex: z.coerce.number().int().nonnegative().optional(),
});

/** `?offset=` pins the reference to the archive the caller searched */
const messageQuerySchema = z.object({
  offset: z.coerce.number().int().nonnegative().optional(),
});

const SSE_KEEP_ALIVE_MS = 30000;

function toRef(req: Request): { ref: MessageRef; attachmentIndex: number | undefined } {
  const { index, attachmentIndex } = messageParamsSchema.parse(req.params);
  const { offset } = messageQuerySchema.parse(req.query);
  return { ref: offset === undefined ? index : { index, offset }, attachmentIndex };
}

export function createMboxRouter(workspace: MboxWorkspace, upload: RequestHandler): IRouter {
  const router: IRouter = Router();

  // POST /api/mbox/open: multipart upload, deleted once its session is replaced or closed
  router.post('/open', upload, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new BadRequestError('No file uploaded');
      }
      const session = await workspace.beginLoad(req.file.path, {}, { temporary: true });
      res.status(202).json({ ...session.status, fileName: req.file.originalname });
    } catch (err) {
      next(err);
    }
  });

  // POST /api/mbox/open-local: open a local file by path
  router.post('/open-local', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { filePath } = openLocalSchema.parse(req.body ?? {});
      if (!fs.existsSync(filePath)) {
        res.status(404).json({ error: `File not found: ${filePath}`, code: 'IO_FAILURE' });
        return;
      }
      const session = await workspace.beginLoad(filePath);
      res.status(202).json(session.status);
    } catch (err) {
      next(err);
    }
  });

  // GET /api/mbox/sessions/:sessionId
  router.get('/sessions/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(workspace.getStatus(req.params.sessionId));
    } catch (err) {
      next(err);
    }
  });

  // GET /api/mbox/sessions/:sessionId/events: Server-Sent Events until the load ends
  router.get('/sessions/:sessionId/events', (req: Request, res: Response, next: NextFunction) => {
    const { sessionId } = req.params;
    let session: MboxSession;
    try {
      session = workspace.getSession(sessionId);
    } catch (err) {
      next(err);
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    logger.info(`SSE connection established for session ${sessionId}`);
    res.write(`data: ${JSON.stringify({ type: 'connected', sessionId })}\n\n`);

    let keepAliveInterval: NodeJS.Timeout | undefined;
    let unsubscribe: () => void = () => undefined;

    const sendEvent = (event: LoadEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
      if (isTerminalEvent(event)) {
        clearInterval(keepAliveInterval);
        unsubscribe();
        res.end();
      }
    };

    unsubscribe = session.subscribe(sendEvent);
    if (res.writableEnded) return;

    keepAliveInterval = setInterval(() => {
      res.write(': keep-alive\n\n');
    }, SSE_KEEP_ALIVE_MS);

    req.on('close', () => {
      logger.info(`SSE connection closed for session ${sessionId}`);
      clearInterval(keepAliveInterval);
      unsubscribe();
    });
  });

  // POST /api/mbox/sessions/:sessionId/cancel
  router.post('/sessions/:sessionId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await workspace.cancelLoad(req.params.sessionId));
    } catch (err) {
      next(err);
    }
  });

  // DELETE /api/mbox/sessions/:sessionId
  router.delete('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await workspace.closeSession(req.params.sessionId);
      res.json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/mbox/search?q=...&field=...&caseSensitive=...&limit=...
  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q, field, caseSensitive, limit } = searchQuerySchema.parse(req.query);
      const results = await workspace.search(q, normalizeField(field), caseSensitive, limit);
      res.json({ results, total: results.length });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/mbox/messages/:index
  router.get('/messages/:index', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { ref } = toRef(req);
      const detail = await workspace.getBody(ref);
      res.json({ message: detail });
    } catch (err) {
      next(err);
    }
  });

  // GET /api/mbox/messages/:index/attachments/:attachmentIndex
  router.get(
    '/messages/:index/attachments/:attachmentIndex',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { ref, attachmentIndex } = toRef(req);
        const { buffer, filename, mimeType } = await workspace.getAttachment(
          ref,
          attachmentIndex ?? 0
        );
        res.set('Content-Type', mimeType);
        res.set('Content-Disposition', `attachment; filename="${encodeURIComponent(filename)}"`);
        res.send(buffer);
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
