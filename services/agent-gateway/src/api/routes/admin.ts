import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../../errors/index.js';
import { adminAuth } from '../../middleware/admin-auth.js';
import { agentKey } from '../../services/pool-manager.js';
import { parseInput } from '../validation.js';
import { GatewayServices } from './types.js';

const sessionListQuery = z.object({
  account: z.string().min(1).optional(),
  agent: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const costQuery = z
  .object({
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
  })
  .refine(range => !range.from || !range.to || range.from <= range.to, { message: 'from must not be after to' });

const uuidParam = z.string().uuid();

function requireUuid(value: string | undefined, what: string): string {
  const parsed = uuidParam.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${what} must be a valid UUID`, { value });
  }
  return parsed.data;
}

/**
 * Create the admin API routes, mounted under `/api/admin`
 * @param services - Gateway services
 * @returns Express router guarded by HTTP Basic auth
 */
export function createAdminRoutes(services: GatewayServices): Router {
  const router = Router();
  router.use(adminAuth(services.adminCredentials));

  /**
   * List sessions, newest first
   */
  router.get('/sessions', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseInput(sessionListQuery, req.query, 'session list query');
      const { sessions, total } = await services.sessions.listSessions({
        accountSlug: query.account,
        agentInstanceSlug: query.agent,
        limit: query.limit,
        offset: query.offset,
      });

      res.json({
        sessions: sessions.map(session => ({
          id: session.id,
          account_slug: session.accountSlug,
          agent_instance_slug: session.agentInstanceSlug,
          email: session.email,
          is_anonymous: session.isAnonymous,
          created_at: session.createdAt.toISOString(),
          last_activity_at: session.lastActivityAt.toISOString(),
          message_count: session.messageCount,
        })),
        total,
        limit: query.limit,
        offset: query.offset,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Messages of one session, oldest first
   */
  router.get('/sessions/:id/messages', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const sessionId = requireUuid(req.params['id'], 'session id');
      const session = await services.sessions.getSessionById(sessionId);
      if (!session) {
        throw new NotFoundError(`Session not found: ${sessionId}`, { sessionId });
      }

      const messages = await services.messages.getSessionMessages(sessionId, { limit: 1000 });
      res.json({
        session_id: sessionId,
        messages: messages.map(message => ({
          id: message.id,
          role: message.role,
          content: message.content,
          agent_instance_id: message.agentInstanceId,
          llm_request_id: message.llmRequestId,
          created_at: message.createdAt.toISOString(),
        })),
        total: messages.length,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * One LLM request with its bodies, tokens and cost
   */
  router.get('/llm-requests/:id', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const requestId = requireUuid(req.params['id'], 'LLM request id');
      const record = await services.tracker.getLlmRequest(requestId);
      if (!record) {
        throw new NotFoundError(`LLM request not found: ${requestId}`, { requestId });
      }
      res.json({ ...record, createdAt: record.createdAt.toISOString() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Cost summary of an account
   */
  router.get('/accounts/:account/costs', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const range = parseInput(costQuery, req.query, 'cost query');
      const summary = await services.tracker.getCostSummary(req.params['account'], range);
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Pool manager status
   */
  router.get('/pools', (req: Request, res: Response): void => {
    res.json({ ...services.pools.getStatus(), timestamp: new Date().toISOString() });
  });

  /**
   * Drop the cached config and agent so the next request rebuilds from disk
   */
  router.post('/accounts/:account/agents/:instance/reload', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const account = req.params['account'];
      const instance = req.params['instance'];
      await services.loader.getInstanceMetadata(account, instance);

      await services.loader.invalidate(account, instance);
      const agentRemoved = services.pools.removeAgent(agentKey(account, instance));
      console.log(`[admin] Reloaded ${account}/${instance} (agent was loaded: ${agentRemoved})`);

      res.json({ success: true, account, instance, agentRemoved, timestamp: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
