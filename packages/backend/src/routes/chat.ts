import { Router } from "express";
import { z } from "zod";
import type {
  ChatSessionDetailResponse,
  CreateChatMessageResponse,
  CreateChatSessionResponse,
  ListChatSessionsResponse
} from "@supply-rag/shared";
import { validate } from "../middleware/validator.js";
import {
  ensureGraphStoreConnected,
  getChatServiceSingleton
} from "../runtime/graphRuntime.js";
import {
  ChatService,
  ChatSessionBusyError,
  ChatSessionNotFoundError
} from "../services/ChatService.js";
import { logger } from "../utils/logger.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const createSessionBodySchema = z.object({
  title: z.string().min(1).max(120).optional()
});

const createMessageBodySchema = z.object({
  content: z.string().trim().min(1).max(2000)
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

interface CreateChatRouterOptions {
  chatService?: ChatService;
  ensureStoreConnected?: () => Promise<void>;
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const getChatService = (): ChatService => options.chatService ?? getChatServiceSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureGraphStoreConnected());

  const chatRouter = Router();

  chatRouter.post(
    "/sessions",
    validate({ body: createSessionBodySchema }),
    (req, res) => {
      const body = req.body as z.infer<typeof createSessionBodySchema>;
      const session = getChatService().createSession({
        title: body.title ?? "New Session"
      });

      const response: CreateChatSessionResponse = { session };
      res.status(201).json(response);
    }
  );

  chatRouter.get(
    "/sessions",
    validate({ query: listSessionsQuerySchema }),
    (req, res) => {
      const { limit } = req.query as unknown as z.infer<typeof listSessionsQuerySchema>;
      const response: ListChatSessionsResponse = {
        sessions: getChatService().listSessions(limit)
      };
      res.json(response);
    }
  );

  chatRouter.get(
    "/sessions/:id",
    validate({ params: sessionParamsSchema }),
    (req, res) => {
      const sessionId = req.params.id ?? "";
      const sessionWithTurns = getChatService().getSessionWithTurns(sessionId);
      if (!sessionWithTurns) {
        return res.status(404).json({ error: "Session not found" });
      }

      const response: ChatSessionDetailResponse = {
        session: {
          ...sessionWithTurns.session,
          messages: sessionWithTurns.turns
        }
      };
      return res.json(response);
    }
  );

  chatRouter.delete(
    "/sessions/:id",
    validate({ params: sessionParamsSchema }),
    (req, res) => {
      const deleted = getChatService().deleteSession(req.params.id ?? "");
      if (!deleted) {
        return res.status(404).json({ error: "Session not found" });
      }

      return res.status(204).send();
    }
  );

  chatRouter.post(
    "/sessions/:id/messages",
    validate({
      params: sessionParamsSchema,
      body: createMessageBodySchema
    }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      const body = req.body as z.infer<typeof createMessageBodySchema>;

      try {
        await ensureStoreConnected();
      } catch (error) {
        // Retrieval degrades to its error sentinel; the turn still completes.
        logger.error({ err: error }, "Graph store connection failed");
      }

      try {
        const result = await getChatService().ask(sessionId, body.content);
        const response: CreateChatMessageResponse = {
          sessionId,
          message: result.assistantTurn
        };
        return res.status(201).json(response);
      } catch (error) {
        if (error instanceof ChatSessionNotFoundError) {
          return res.status(404).json({ error: "Session not found" });
        }
        if (error instanceof ChatSessionBusyError) {
          return res.status(409).json({ error: "Session is still processing a question" });
        }

        logger.error({ err: error, sessionId }, "Chat turn failed");
        return res.status(500).json({ error: "Failed to process chat message" });
      }
    }
  );

  return chatRouter;
}
