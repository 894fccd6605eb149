import { Router, Request, Response, NextFunction } from 'express';
import { errorMessage, isGatewayError } from '../../errors/index.js';
import { RateLimiter } from '../../middleware/rate-limiter.js';
import { getRequestSession, setRequestSession } from '../../middleware/session-middleware.js';
import { ChatTurnResult, PreparedTurn } from '../../services/chat-service.js';
import { isRecord } from '../../utils/objects.js';
import { GatewayServices } from './types.js';

function sseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

function responseData(result: ChatTurnResult): ChatTurnResult {
  return {
    response: result.response,
    sessionId: result.sessionId,
    llmRequestId: result.llmRequestId,
    model: result.model,
    usage: result.usage,
    cost: result.cost,
  };
}

/**
 * Create the per-account agent routes, mounted under `/accounts`
 * @param services - Gateway services
 * @param chatLimiter - Limiter applied to the chat and stream endpoints
 * @returns Express router
 */
export function createAccountAgentRoutes(services: GatewayServices, chatLimiter: RateLimiter): Router {
  const router = Router();
  const cookie = services.sessions.getCookieConfig();

  /** Re-issues the cookie when the turn had to move to a fresh session. */
  const adoptTurnSession = (res: Response, turn: PreparedTurn): void => {
    if (getRequestSession(res)?.id !== turn.session.id) {
      setRequestSession(res, turn.session, cookie);
    }
  };

  /**
   * Router health check
   */
  router.get('/:account/agents/health', (req: Request, res: Response): void => {
    const account = req.params['account'];
    res.json({
      status: 'healthy',
      account,
      router: 'account-agents',
      endpoints: {
        list: `/accounts/${account}/agents`,
        chat: `/accounts/${account}/agents/{instance}/chat`,
        stream: `/accounts/${account}/agents/{instance}/stream`,
        history: `/accounts/${account}/agents/{instance}/history`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * List the account's active agent instances
   */
  router.get('/:account/agents', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const account = req.params['account'];
      const instances = await services.loader.listAccountInstances(account);
      res.json({ account, instances, total: instances.length });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Send a message and wait for the full reply
   */
  router.post(
    '/:account/agents/:instance/chat',
    chatLimiter.middleware(),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const body: unknown = req.body;
        const turn = await services.chat.prepareTurn({
          accountSlug: req.params['account'],
          instanceSlug: req.params['instance'],
          message: isRecord(body) ? body['message'] : undefined,
          session: getRequestSession(res),
        });
        adoptTurnSession(res, turn);

        const result = await services.chat.runTurn(turn);
        res.json({ success: true, data: responseData(result) });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * Send a message and stream the reply as server-sent events
   */
  router.get(
    '/:account/agents/:instance/stream',
    chatLimiter.middleware(),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      let turn: PreparedTurn;
      try {
        turn = await services.chat.prepareTurn({
          accountSlug: req.params['account'],
          instanceSlug: req.params['instance'],
          message: req.query['message'],
          session: getRequestSession(res),
        });
        adoptTurnSession(res, turn);
      } catch (error) {
        next(error);
        return;
      }

      res.status(200);
      res.set({
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
        'X-Accel-Buffering': 'no',
      });
      res.flushHeaders();

      let clientGone = false;
      res.on('close', () => {
        clientGone = !res.writableEnded;
      });

      try {
        for await (const event of services.chat.streamTurn(turn)) {
          if (clientGone) break;
          if (event.type === 'chunk') {
            res.write(sseFrame('chunk', { content: event.content }));
          } else {
            res.write(sseFrame('done', { success: true, data: responseData(event.data) }));
          }
        }
      } catch (error) {
        const code = isGatewayError(error) ? error.code : 'INTERNAL_ERROR';
        const message = isGatewayError(error)
          ? services.errorHandler.publicMessage(error.statusCode, error.message)
          : services.errorHandler.publicMessage(500, errorMessage(error));
        console.error(`[stream] ${req.params['account']}/${req.params['instance']} failed:`, errorMessage(error));
        if (!clientGone) {
          res.write(sseFrame('error', { message, code }));
        }
      } finally {
        res.end();
      }
    }
  );

  /**
   * Conversation history of the current session with this instance
   */
  router.get('/:account/agents/:instance/history', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const account = req.params['account'];
      const instance = await services.loader.getInstanceMetadata(account, req.params['instance']);
      const session = getRequestSession(res);

      const messages =
        session && session.agentInstanceId === instance.id
          ? await services.messages.getSessionMessages(session.id)
          : [];

      res.json({
        account,
        instance: instance.instanceSlug,
        sessionId: session?.id ?? null,
        messages: messages.map(message => ({
          id: message.id,
          role: message.role,
          content: message.content,
          createdAt: message.createdAt.toISOString(),
        })),
        total: messages.length,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
