import { errorMessage, Logger, logContext } from "../config/logger";
import { CONFIRM_COMMANDS, EXIT_COMMANDS, INFO_FIELDS } from "../shared/constants";
import { ConversationTurn, SessionState } from "../shared/types/state.types";
import { isCompleteProfile, parseInfoField, toCandidateRecord } from "../profiles/candidate-info.fields";
import {
  completeSession,
  createSessionState,
  currentQuestion,
  recordInfoField,
  recordResult,
  startInterview,
} from "../state/session-state";
import { acceptsInput } from "../state/transition-rules";
import { CandidateStore } from "../storage/candidate-storage.service";
import {
  completedMessage,
  confirmPrompt,
  emptyAnswerMessage,
  evaluationMessage,
  finalSummaryMessage,
  infoFallbackPrompt,
  infoPrompt,
  interviewIntroMessage,
  profileSummaryMessage,
  questionGenerationFailedMessage,
  questionMessage,
  sessionEndedMessage,
  welcomeMessage,
} from "../chat/ui/messages";
import { AnswerScorer } from "./answer-evaluator.service";
import { isQuestionGenerationError, QuestionSource } from "./question-generator.service";

export interface InterviewEngineDeps {
  questionGenerator: QuestionSource;
  answerEvaluator: AnswerScorer;
  logger: Logger;
  /** Finished interviews are appended here; omit to keep nothing. */
  candidateStore?: CandidateStore;
  now?: () => Date;
}

export function isExitCommand(text: string): boolean {
  return EXIT_COMMANDS.includes(text.trim().toLowerCase());
}

export function isConfirmCommand(text: string): boolean {
  return CONFIRM_COMMANDS.includes(text.trim().toLowerCase());
}

/**
 * Drives one candidate through intake, confirmation and the interview. The
 * engine holds no session data: every call takes a SessionState and returns
 * the next one together with the replies to show.
 */
export class InterviewEngine {
  constructor(private readonly deps: InterviewEngineDeps) {}

  start(): ConversationTurn {
    const state = createSessionState();
    return {
      state,
      replies: [welcomeMessage(), infoPrompt(INFO_FIELDS[0].label)],
    };
  }

  async handleMessage(state: SessionState, text: string): Promise<ConversationTurn> {
    if (!acceptsInput(state.phase)) {
      this.deps.logger.debug("conversation.input.ignored", { phase: state.phase });
      return { state, replies: [] };
    }

    if (isExitCommand(text)) {
      const next = completeSession(state, "exit");
      logContext(this.deps.logger, "info", "conversation.exit", {
        phase: state.phase,
      });
      const replies = [sessionEndedMessage()];
      if (next.summary) {
        replies.push(finalSummaryMessage(next.summary, next.results));
      }
      return { state: next, replies };
    }

    switch (state.phase) {
      case "collecting_info":
        return this.handleInfoField(state, text);
      case "confirming":
        if (isConfirmCommand(text)) {
          return this.confirm(state);
        }
        return { state, replies: [confirmPrompt()] };
      case "interviewing":
        return this.handleAnswer(state, text);
      case "completed":
        return { state, replies: [] };
    }
  }

  async confirm(state: SessionState): Promise<ConversationTurn> {
    if (state.phase !== "confirming" || !isCompleteProfile(state.candidate)) {
      throw new Error(`Cannot start the interview from phase ${state.phase}`);
    }

    const questions = await this.deps.questionGenerator.generateQuestions(state.candidate.techStack);
    if (isQuestionGenerationError(questions)) {
      logContext(this.deps.logger, "warn", "conversation.questions.unavailable", {
        phase: state.phase,
        ok: false,
      }, { detail: questions[0] });
      return { state, replies: [questionGenerationFailedMessage()] };
    }

    const next = startInterview(state, questions);
    logContext(this.deps.logger, "info", "conversation.interview.started", {
      phase: next.phase,
    }, { questions: questions.length });
    return {
      state: next,
      replies: [interviewIntroMessage(), questionMessage(0, questions[0])],
    };
  }

  private handleInfoField(state: SessionState, text: string): ConversationTurn {
    const field = INFO_FIELDS[state.fieldIndex];
    const patch = parseInfoField(field.key, text);
    if (!patch) {
      logContext(this.deps.logger, "debug", "conversation.field.rejected", {
        phase: state.phase,
        field: field.key,
      });
      return { state, replies: [infoFallbackPrompt(field.label)] };
    }

    const next = recordInfoField(state, patch);
    if (next.phase === "confirming") {
      return {
        state: next,
        replies: [profileSummaryMessage(next.candidate), confirmPrompt()],
      };
    }
    return {
      state: next,
      replies: [infoPrompt(INFO_FIELDS[next.fieldIndex].label)],
    };
  }

  private async handleAnswer(state: SessionState, text: string): Promise<ConversationTurn> {
    const question = currentQuestion(state);
    if (question === null) {
      throw new Error(`No current question at index ${state.questionIndex}`);
    }
    if (!text.trim()) {
      return { state, replies: [emptyAnswerMessage()] };
    }

    const evaluation = await this.deps.answerEvaluator.evaluateAnswer(question, text);
    const result = {
      question,
      answer: text,
      score: evaluation.score,
      feedback: evaluation.feedback,
    };
    const next = recordResult(state, result);
    const replies = [evaluationMessage(result)];
    logContext(this.deps.logger, "info", "conversation.answer.recorded", {
      phase: next.phase,
      question_index: state.questionIndex,
    }, { score: result.score });

    if (next.phase !== "completed") {
      const upcoming = currentQuestion(next);
      if (upcoming !== null) {
        replies.push(questionMessage(next.questionIndex, upcoming));
      }
      return { state: next, replies };
    }

    if (next.summary) {
      replies.push(finalSummaryMessage(next.summary, next.results));
    }
    await this.persistCandidate(next);
    replies.push(completedMessage());
    return { state: next, replies };
  }

  private async persistCandidate(state: SessionState): Promise<void> {
    const store = this.deps.candidateStore;
    if (!store || !isCompleteProfile(state.candidate)) {
      return;
    }
    const record = toCandidateRecord({
      profile: state.candidate,
      questions: state.questions,
      results: state.results,
      summary: state.summary,
      completedAt: (this.deps.now ?? (() => new Date()))().toISOString(),
    });
    try {
      await store.appendCandidate(record);
    } catch (error) {
      // The interview already finished; a failed save is reported, not fatal.
      this.deps.logger.error("conversation.persist.failed", {
        error: errorMessage(error),
      });
    }
  }
}
