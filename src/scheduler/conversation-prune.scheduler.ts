import cron from "node-cron";
import type { ConversationService } from "../conversation/conversation.service";
import { logger } from "../utils/logger";

export const pruneIdleConversations = (
  service: ConversationService,
  idleMinutes: number,
  now: number = Date.now()
): string[] => {
  const removed = service.pruneIdleConversations(idleMinutes * 60 * 1000, now);
  if (removed.length) {
    logger.info(
      { count: removed.length },
      "[Scheduler] Discarded idle conversations"
    );
  }
  return removed;
};

/**
 * Every 5 minutes, discard conversations with no turn in the last
 * `idleMinutes`.
 */
export const initConversationPruneScheduler = (
  service: ConversationService,
  idleMinutes: number
) => {
  logger.info("[Scheduler] Initializing conversation prune scheduler...");
  return cron.schedule("*/5 * * * *", () => {
    try {
      pruneIdleConversations(service, idleMinutes);
    } catch (error) {
      logger.error({ err: error }, "[Scheduler] Error pruning conversations");
    }
  });
};
