import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import * as Sentry from "@sentry/node";
import { z } from "zod";
import { challengeService, reconcileService, type CompletionSubject } from "../../services";
import { saveVisitorSession, sendValidationError } from "../../middleware";
import { formatCompletionKey, parseCompletionKey } from "../../utils/completion-keys";

const completeSchema = z.object({
  challengeId: z.string().trim(),
});

export function subjectFor(request: FastifyRequest): CompletionSubject {
  const user = request.visitor.user;
  if (user) return { kind: "user", userId: user.id };
  return { kind: "anonymous", keys: request.visitor.session.data.challengesCompleted ?? [] };
}

// A signed-in visitor whose session still holds anonymous keys gets another merge attempt
async function retryPendingMerge(request: FastifyRequest, reply: FastifyReply) {
  const user = request.visitor.user;
  const pending = request.visitor.session.data.challengesCompleted ?? [];
  if (!user || pending.length === 0) return;

  try {
    const result = await reconcileService.reconcile(user.id, pending);
    await saveVisitorSession(
      request,
      reply,
      result.remainingKeys.length > 0 ? { challengesCompleted: result.remainingKeys } : {}
    );
  } catch (error) {
    console.warn(`Retrying merge for user:${user.id} failed:`, error);
    Sentry.captureException(error);
  }
}

async function buildChallengeBoard(request: FastifyRequest) {
  const subject = subjectFor(request);
  const [challenges, completedIds] = await Promise.all([
    challengeService.listActive(),
    reconcileService.completedChallengeIds(subject),
  ]);
  const summary = challengeService.summarize(challenges, completedIds);

  return {
    challenges: challenges.map((challenge) => ({
      id: formatCompletionKey(challenge.id),
      dbId: challenge.id,
      title: challenge.title,
      co2Saved: challenge.co2Saved,
      completed: completedIds.includes(challenge.id),
    })),
    completed: completedIds.map(formatCompletionKey),
    ...summary,
  };
}

export function registerChallengeRoutes(app: FastifyInstance) {
  app.get("/challenges", async (request, reply) => {
    await retryPendingMerge(request, reply);
    return buildChallengeBoard(request);
  });

  app.post("/challenges/complete", async (request, reply) => {
    const parsed = completeSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const challengeId = parseCompletionKey(parsed.data.challengeId);
    if (challengeId === null) {
      return reply.code(400).send({ error: "malformed_key", message: "Unknown challenge id format." });
    }

    const result = await challengeService.complete(subjectFor(request), challengeId);
    if (!result.found) {
      return reply.code(404).send({ error: "not_found", message: "Challenge not found." });
    }

    if (result.keys && result.created) {
      await saveVisitorSession(request, reply, {
        ...request.visitor.session.data,
        challengesCompleted: result.keys,
      });
    }

    return {
      created: result.created,
      message: `Challenge completed: ${result.challenge.title}!`,
      ...(await buildChallengeBoard(request)),
    };
  });
}
