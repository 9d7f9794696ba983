import { describe, it, expect, afterEach, vi } from "vitest";
import { fallbackQuestion, parseQuiz, quizService, readQuizQuestions, scoreQuiz } from "../quiz.service";

const reply = [
  "1. What is e-waste?",
  "A) Food scraps",
  "B) Discarded electronics",
  "C) Garden clippings",
  "D) Paper",
  "Answer: B",
  "",
  "**2. Which metal is toxic in old CRT TVs?**",
  "A: Lead",
  "B: Gold",
  "C: Tin",
  "D: Zinc",
  "Correct answer: A",
  "",
  "3. A question missing two options",
  "A) One",
  "B) Two",
  "Answer: A",
].join("\n");

describe("readQuizQuestions", () => {
  it("reads numbered questions with four options and an answer", () => {
    expect(readQuizQuestions(reply)).toEqual([
      {
        question: "What is e-waste?",
        options: [
          { label: "A", text: "Food scraps" },
          { label: "B", text: "Discarded electronics" },
          { label: "C", text: "Garden clippings" },
          { label: "D", text: "Paper" },
        ],
        answer: "B",
      },
      {
        question: "Which metal is toxic in old CRT TVs?",
        options: [
          { label: "A", text: "Lead" },
          { label: "B", text: "Gold" },
          { label: "C", text: "Tin" },
          { label: "D", text: "Zinc" },
        ],
        answer: "A",
      },
    ]);
  });

  it("drops a question whose answer is missing", () => {
    const text = ["1. Pick one", "A) w", "B) x", "C) y", "D) z"].join("\n");
    expect(readQuizQuestions(text)).toEqual([]);
  });
});

describe("parseQuiz", () => {
  it("pads the quiz to five questions", () => {
    const questions = parseQuiz(reply);

    expect(questions).toHaveLength(5);
    expect(questions[1]?.question).toBe("Which metal is toxic in old CRT TVs?");
    expect(questions[2]).toEqual(fallbackQuestion(3));
    expect(questions[4]?.question).toBe("Which is best for e-waste? (Q5)");
  });

  it("is all fallback questions when nothing parses", () => {
    expect(parseQuiz("Sorry, I can't help with that.")).toEqual([1, 2, 3, 4, 5].map(fallbackQuestion));
  });
});

describe("scoreQuiz", () => {
  it("counts matching answers and marks each choice", () => {
    const result = scoreQuiz(parseQuiz(reply), ["B", "C", null, "C"]);

    expect(result.score).toBe(2);
    expect(result.total).toBe(5);
    expect(result.results.map((entry) => [entry.choice, entry.correct])).toEqual([
      ["B", true],
      ["C", false],
      [null, false],
      ["C", true],
      [null, false],
    ]);
  });
});

describe("quizService.generate", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the quiz from the model's reply", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ choices: [{ message: { content: reply } }] }), { status: 200 }))
    );

    const questions = await quizService.generate();

    expect(questions.map((question) => question.answer)).toEqual(["B", "A", "C", "C", "C"]);
  });
});
