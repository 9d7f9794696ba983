export { challengeService, badgeFor } from "./challenge.service";
export type { Badge, ChallengeSummary, CompleteResult } from "./challenge.service";
export { completionService } from "./completion.service";
export type { CompletionStore } from "./completion.service";
export { reconcileService, createCompletionReconciler } from "./reconcile.service";
export type {
  CompletionReconciler,
  CompletionSubject,
  ReconcileResult,
  SkippedKey,
  FailedKey,
} from "./reconcile.service";
export { sessionService } from "./session.service";
export { authService, toPublicUser } from "./auth.service";
export type { AuthResult, LoginOutcome } from "./auth.service";
export { centerService } from "./center.service";
export { deviceService } from "./device.service";
export { creditService } from "./credit.service";
export { pickupService, pickupInputSchema } from "./pickup.service";
export { llmService } from "./llm.service";
export { valueEstimatorService } from "./value-estimator.service";
export { quizService } from "./quiz.service";
export type { AnswerLabel, QuizQuestion, QuizResult } from "./quiz.service";
export { adviceService } from "./advice.service";
export type { DecisionAdvice, ReuseAdvice } from "./advice.service";
export { ecoTipService } from "./eco-tip.service";
export { collectorService, nominationInputSchema } from "./collector.service";
export type { Collector } from "./collector.service";
