import { llmService } from "./llm.service";

export const QUIZ_LENGTH = 5;

export const answerLabels = ["A", "B", "C", "D"] as const;
export type AnswerLabel = (typeof answerLabels)[number];

export interface QuizOption {
  label: AnswerLabel;
  text: string;
}

export interface QuizQuestion {
  question: string;
  options: QuizOption[];
  answer: AnswerLabel;
}

export interface QuizResult {
  score: number;
  total: number;
  results: Array<QuizQuestion & { choice: AnswerLabel | null; correct: boolean }>;
}

interface DraftQuestion {
  question: string;
  options: QuizOption[];
  answer: AnswerLabel | null;
}

const QUESTION_LINE = /^(?:q\s*[1-5]\s*[.):-]?|[1-5]\s*[.)])\s*(.+)$/i;
const OPTION_LINE = /^([a-d])\s*[:).]\s*(.+)$/i;
const ANSWER_LINE = /^(?:correct\s+answer|answer|correct|ans)\s*[:-]\s*\(?([a-d])\b/i;

export function isAnswerLabel(value: string): value is AnswerLabel {
  return answerLabels.some((label) => label === value);
}

export function buildQuizPrompt(): string {
  return (
    `Create ${QUIZ_LENGTH} multiple-choice questions about e-waste, sustainability, or recycling. ` +
    `Number each question like '1. ...'. Give exactly 4 options on their own lines as 'A) ...' to 'D) ...', ` +
    `then a line 'Answer: <letter>'. Keep questions concise.`
  );
}

export function fallbackQuestion(position: number): QuizQuestion {
  return {
    question: `Which is best for e-waste? (Q${position})`,
    options: [
      { label: "A", text: "Throw in regular trash" },
      { label: "B", text: "Burn to reduce volume" },
      { label: "C", text: "Recycle at certified center" },
      { label: "D", text: "Dump in river" },
    ],
    answer: "C",
  };
}

function isComplete(draft: DraftQuestion): draft is QuizQuestion {
  return draft.question.length > 0 && draft.options.length === answerLabels.length && draft.answer !== null;
}

/** Reads numbered questions, lettered options and answer lines from the model's reply. */
export function readQuizQuestions(text: string): QuizQuestion[] {
  const drafts: DraftQuestion[] = [];
  let current: DraftQuestion | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\*\*/g, "").trim();
    if (!line) continue;

    const question = QUESTION_LINE.exec(line);
    if (question?.[1]) {
      current = { question: question[1].trim(), options: [], answer: null };
      drafts.push(current);
      continue;
    }
    if (!current) continue;

    const answer = ANSWER_LINE.exec(line);
    if (answer?.[1]) {
      const label = answer[1].toUpperCase();
      if (isAnswerLabel(label)) current.answer = label;
      continue;
    }

    const option = OPTION_LINE.exec(line);
    if (option?.[1] && option[2]) {
      const label = option[1].toUpperCase();
      if (isAnswerLabel(label) && !current.options.some((entry) => entry.label === label)) {
        current.options.push({ label, text: option[2].trim() });
      }
    }
  }

  // Questions without four options and an answer are dropped
  return drafts.filter(isComplete).slice(0, QUIZ_LENGTH);
}

export function padQuiz(questions: QuizQuestion[]): QuizQuestion[] {
  const padded = [...questions];
  while (padded.length < QUIZ_LENGTH) {
    padded.push(fallbackQuestion(padded.length + 1));
  }
  return padded;
}

export function parseQuiz(text: string): QuizQuestion[] {
  return padQuiz(readQuizQuestions(text));
}

export function scoreQuiz(questions: QuizQuestion[], answers: ReadonlyArray<AnswerLabel | null>): QuizResult {
  const results = questions.slice(0, QUIZ_LENGTH).map((question, index) => {
    const choice = answers[index] ?? null;
    return { ...question, choice, correct: choice === question.answer };
  });
  return {
    score: results.filter((result) => result.correct).length,
    total: results.length,
    results,
  };
}

export const quizService = {
  async generate(): Promise<QuizQuestion[]> {
    const reply = await llmService.explain(buildQuizPrompt(), { maxTokens: 800 });
    const parsed = readQuizQuestions(reply);
    if (parsed.length < QUIZ_LENGTH) {
      console.warn(`[quiz] reply held ${parsed.length} usable questions, padding with fallbacks`);
    }
    return padQuiz(parsed);
  },
};
