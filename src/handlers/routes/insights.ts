import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { adviceService, ecoTipService, llmService, quizService, valueEstimatorService } from "../../services";
import { answerLabels, QUIZ_LENGTH, scoreQuiz } from "../../services/quiz.service";
import { buildEducationPrompt, buildHazardPrompt } from "../../services/llm.service";
import { sendValidationError } from "../../middleware";

const topicSchema = z.object({
  topic: z.string().trim().min(1, "Please enter a component to learn about.").max(100),
});

const valueSchema = z.object({
  model: z.string().trim().min(1).max(100),
  age: z.coerce.number().min(0).max(50).default(0),
});

const decisionSchema = z.object({
  item: z.string().trim().min(1, "Please describe the item.").max(200),
});

const reuseSchema = z.object({
  model: z.string().trim().max(100).default(""),
  condition: z.string().trim().toLowerCase().max(100).default(""),
  age: z.coerce.number().min(0).max(50).optional(),
});

const answerSchema = z.enum(answerLabels);

const quizScoreSchema = z.object({
  questions: z
    .array(
      z.object({
        question: z.string().min(1),
        options: z.array(z.object({ label: answerSchema, text: z.string() })).length(answerLabels.length),
        answer: answerSchema,
      })
    )
    .min(1)
    .max(QUIZ_LENGTH),
  answers: z.array(answerSchema.nullable()).max(QUIZ_LENGTH),
});

export function registerInsightRoutes(app: FastifyInstance) {
  app.post("/education", async (request, reply) => {
    const parsed = topicSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const explanation = await llmService.explain(buildEducationPrompt(parsed.data.topic));
    return { topic: parsed.data.topic, explanation };
  });

  app.post("/hazard", async (request, reply) => {
    const parsed = topicSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const explanation = await llmService.explain(buildHazardPrompt(parsed.data.topic));
    return { component: parsed.data.topic, explanation };
  });

  app.post("/value", async (request, reply) => {
    const parsed = valueSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    return valueEstimatorService.estimate(parsed.data.model, parsed.data.age);
  });

  app.get("/tips", async () => ecoTipService.tipFor());

  app.get("/quiz", async () => ({ questions: await quizService.generate() }));

  app.post("/quiz/score", async (request, reply) => {
    const parsed = quizScoreSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    return scoreQuiz(parsed.data.questions, parsed.data.answers);
  });

  app.post("/decision", async (request, reply) => {
    const parsed = decisionSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    return adviceService.decide(parsed.data.item);
  });

  app.post("/reuse", async (request, reply) => {
    const parsed = reuseSchema.safeParse(request.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    const { model, condition, age } = parsed.data;
    return adviceService.reuse({ model, condition, ageYears: age ?? null });
  });
}
