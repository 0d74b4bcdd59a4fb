import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { AnswerEvaluatorService } from "../../interviews/answer-evaluator.service";
import { InterviewEngine } from "../../interviews/interview.engine";
import { QuestionGeneratorService } from "../../interviews/question-generator.service";
import { ConversationTurn, SessionState } from "../../shared/types/state.types";
import { failWith, InMemoryCandidateStore, noopLogger, ScriptedLlmClient } from "../helpers/fakes";
import { TextCompletionClient } from "../../ai/llm.client";

const PROFILE_INPUTS = [
  "Ada Lovelace",
  "ada@example.com",
  "+15550100",
  "4",
  "Backend Engineer",
  "London",
  "Python, Django",
];

function scriptedInterviewer(): ScriptedLlmClient {
  return new ScriptedLlmClient(async (prompt) => {
    if (prompt.includes("generate 3-5 specific technical interview questions")) {
      return "1. Q one?\n2. Q two?";
    }
    return "Score: 9/10\nFeedback: Nice.";
  });
}

function buildEngine(client: TextCompletionClient, store?: InMemoryCandidateStore): InterviewEngine {
  return new InterviewEngine({
    questionGenerator: new QuestionGeneratorService(client, noopLogger),
    answerEvaluator: new AnswerEvaluatorService(client, noopLogger),
    logger: noopLogger,
    candidateStore: store,
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  });
}

async function feed(engine: InterviewEngine, state: SessionState, inputs: string[]): Promise<ConversationTurn> {
  let turn: ConversationTurn = { state, replies: [] };
  for (const input of inputs) {
    turn = await engine.handleMessage(turn.state, input);
  }
  return turn;
}

describe("interview conversation", () => {
  it("opens with the welcome and the first field prompt", () => {
    const engine = buildEngine(scriptedInterviewer());
    const opening = engine.start();
    assert.equal(opening.state.phase, "collecting_info");
    assert.deepEqual(opening.replies, [
      "Welcome! I will conduct an interactive technical interview. Type 'exit' anytime to leave.",
      "Please provide your Full Name.",
    ]);
  });

  it("re-asks an invalid field without moving on", async () => {
    const engine = buildEngine(scriptedInterviewer());
    const afterName = await engine.handleMessage(engine.start().state, "Ada Lovelace");
    assert.deepEqual(afterName.replies, ["Please provide your Email Address."]);

    const retry = await engine.handleMessage(afterName.state, "not-an-email");
    assert.equal(retry.state, afterName.state);
    assert.deepEqual(retry.replies, [
      "Sorry, I didn't understand your response for Email Address. Could you please rephrase or provide a valid input?",
    ]);

    const again = await engine.handleMessage(retry.state, "still wrong");
    assert.equal(again.state.fieldIndex, 1);
  });

  it("runs intake, confirmation and interview to a persisted summary", async () => {
    const store = new InMemoryCandidateStore();
    const engine = buildEngine(scriptedInterviewer(), store);

    const intake = await feed(engine, engine.start().state, PROFILE_INPUTS);
    assert.equal(intake.state.phase, "confirming");
    assert.deepEqual(intake.replies, [
      [
        "Here are the details you provided:",
        "Full Name: Ada Lovelace",
        "Email Address: ada@example.com",
        "Phone Number: +15550100",
        "Years of Experience: 4",
        "Desired Position: Backend Engineer",
        "Current Location: London",
        "Tech Stack (comma-separated, e.g., Python, Django, PostgreSQL): Python, Django",
      ].join("\n"),
      "Type 'start' to begin the technical interview.",
    ]);

    const notYet = await engine.handleMessage(intake.state, "hmm");
    assert.equal(notYet.state, intake.state);
    assert.deepEqual(notYet.replies, ["Type 'start' to begin the technical interview."]);

    const started = await engine.handleMessage(intake.state, " Start ");
    assert.equal(started.state.phase, "interviewing");
    assert.deepEqual(started.state.questions, ["Q one?", "Q two?"]);
    assert.deepEqual(started.replies, [
      "Great! Let's start your technical interview. I'll ask you questions one by one and evaluate your answers.",
      "Question 1: Q one?",
    ]);

    const blank = await engine.handleMessage(started.state, "   ");
    assert.equal(blank.state, started.state);
    assert.deepEqual(blank.replies, ["Please provide an answer before submitting."]);

    const first = await engine.handleMessage(started.state, "First answer");
    assert.deepEqual(first.replies, ["Score: 9/10\nFeedback: Nice.", "Question 2: Q two?"]);

    const last = await engine.handleMessage(first.state, "Second answer");
    assert.equal(last.state.phase, "completed");
    assert.equal(last.state.endedBy, "finished");
    assert.deepEqual(last.replies, [
      "Score: 9/10\nFeedback: Nice.",
      [
        "Interview Complete!",
        "",
        "Final Evaluation:",
        "- Total Questions: 2",
        "- Average Score: 9.0/10",
        "- Overall Performance: Excellent",
        "",
        "Detailed Results:",
        "Question 1: Q one?",
        "Score: 9/10",
        "Feedback: Nice.",
        "Question 2: Q two?",
        "Score: 9/10",
        "Feedback: Nice.",
      ].join("\n"),
      "Thank you for your time! Your interview results have been recorded. Our team will contact you soon.",
    ]);

    assert.deepEqual(store.records, [
      {
        name: "Ada Lovelace",
        email: "ada@example.com",
        phone: "+15550100",
        experience: 4,
        position: "Backend Engineer",
        location: "London",
        tech_stack: ["Python", "Django"],
        questions: ["Q one?", "Q two?"],
        results: [
          { question: "Q one?", answer: "First answer", score: 9, feedback: "Nice." },
          { question: "Q two?", answer: "Second answer", score: 9, feedback: "Nice." },
        ],
        summary: { totalQuestions: 2, averageScore: 9, performance: "Excellent" },
        completed_at: "2026-01-02T03:04:05.000Z",
      },
    ]);

    const ignored = await engine.handleMessage(last.state, "hello?");
    assert.equal(ignored.state, last.state);
    assert.deepEqual(ignored.replies, []);
  });

  it("ends immediately on exit during phone collection", async () => {
    const store = new InMemoryCandidateStore();
    const engine = buildEngine(scriptedInterviewer(), store);
    const beforePhone = await feed(engine, engine.start().state, PROFILE_INPUTS.slice(0, 2));
    assert.equal(beforePhone.state.fieldIndex, 2);

    const exit = await engine.handleMessage(beforePhone.state, "  EXIT ");

    assert.equal(exit.state.phase, "completed");
    assert.equal(exit.state.endedBy, "exit");
    assert.deepEqual(exit.state.results, []);
    assert.equal(exit.state.candidate.techStack, undefined);
    assert.equal(exit.state.summary, null);
    assert.deepEqual(exit.replies, ["Session ended. Goodbye!"]);
    assert.deepEqual(store.records, []);
  });

  it("does not treat a sentence containing exit as the exit command", async () => {
    const engine = buildEngine(scriptedInterviewer());
    const turn = await engine.handleMessage(engine.start().state, "exit strategy");
    assert.equal(turn.state.phase, "collecting_info");
    assert.deepEqual(turn.state.candidate, { name: "exit strategy" });
  });

  it("stays in confirming when question generation fails", async () => {
    const engine = buildEngine(failWith("Gemini API error: HTTP 400 - API key not valid"));
    const intake = await feed(engine, engine.start().state, PROFILE_INPUTS);

    const attempt = await engine.handleMessage(intake.state, "start");

    assert.equal(attempt.state, intake.state);
    assert.deepEqual(attempt.replies, ["Sorry, there was an error generating questions. Please try again later."]);
  });

  it("interviews offline from the fallback catalog and heuristic", async () => {
    const engine = buildEngine(failWith("Gemini API error: HTTP 503 - The model is overloaded."));
    const intake = await feed(engine, engine.start().state, PROFILE_INPUTS);

    const started = await engine.handleMessage(intake.state, "yes");
    assert.equal(started.state.questions.length, 5);
    assert.equal(started.state.questions[0], "Explain the difference between lists and tuples in Python.");

    const answered = await engine.handleMessage(
      started.state,
      "I use def and class with try/except to handle errors in a list comprehension",
    );
    assert.deepEqual(answered.state.results[0], {
      question: "Explain the difference between lists and tuples in Python.",
      answer: "I use def and class with try/except to handle errors in a list comprehension",
      score: 10,
      feedback: "Excellent answer! You demonstrate strong technical knowledge.",
    });
  });
});
