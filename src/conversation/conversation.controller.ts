import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { HttpError } from "../utils/http-error";
import { ConversationService } from "./conversation.service";

const conversationIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9_-]+$/, "Invalid conversation id");

const parseId = (req: Request): string => {
  const parsed = conversationIdSchema.safeParse(req.params.id);
  if (!parsed.success) throw new HttpError(400, "Invalid conversation id");
  return parsed.data;
};

export const createConversationRouter = (service: ConversationService) => {
  const router = Router();

  // POST /api/conversations
  router.post("/", (_req: Request, res: Response) => {
    const data = service.startConversation();
    res.status(201).json({ data });
  });

  // POST /api/conversations/:id/turns
  // A non-string utterance is processed as empty text.
  router.post(
    "/:id/turns",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req);
        const body: unknown = req.body;
        const utterance =
          typeof body === "object" && body !== null && "utterance" in body
            ? body.utterance
            : undefined;
        const result = await service.processTurn(id, utterance);
        if (!result.ok) {
          return res.status(503).json({ error: result.error });
        }
        res.status(200).json({ data: result });
      } catch (error) {
        next(error);
      }
    }
  );

  // GET /api/conversations/:id
  router.get("/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req);
      const data = service.getConversation(id);
      if (!data) throw new HttpError(404, `Conversation '${id}' not found.`);
      res.status(200).json({ data });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/conversations/:id/turns
  router.get(
    "/:id/turns",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req);
        const data = await service.listTurns(id);
        res.status(200).json({ data });
      } catch (error) {
        next(error);
      }
    }
  );

  // DELETE /api/conversations/:id
  router.delete("/:id", (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req);
      if (!service.endConversation(id)) {
        throw new HttpError(404, `Conversation '${id}' not found.`);
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
};
