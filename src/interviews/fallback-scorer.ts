import { DEFAULT_SCORE, MAX_SCORE, MIN_SCORE } from "../shared/constants";
import { AnswerEvaluation } from "../shared/types/answer-evaluator.types";
import { PerformanceLabel } from "../shared/types/domain.types";

interface ScoringDomain {
  name: string;
  markers: ReadonlyArray<string>;
  keywords: ReadonlyArray<string>;
}

// Order matters: the first domain whose marker appears in the question wins.
const SCORING_DOMAINS: ReadonlyArray<ScoringDomain> = [
  {
    name: "python",
    markers: ["python"],
    keywords: ["def", "class", "import", "try", "except", "list", "tuple", "dict", "decorator", "generator"],
  },
  {
    name: "javascript",
    markers: ["javascript", "js"],
    keywords: ["function", "const", "let", "var", "async", "await", "promise", "closure", "hoisting"],
  },
  {
    name: "react",
    markers: ["react"],
    keywords: ["component", "state", "props", "hook", "usestate", "useeffect", "virtual", "dom"],
  },
  {
    name: "django",
    markers: ["django"],
    keywords: ["model", "view", "template", "orm", "migration", "signal", "authentication"],
  },
];

const KEYWORD_POINTS = 2;
const CODE_EXAMPLE_POINTS = 2;
const CODE_EXAMPLE_MARKERS = ["```", "def ", "function "];
const LENGTH_BONUS_THRESHOLDS = [100, 200];

const FEEDBACK_TIERS: ReadonlyArray<{ minScore: number; feedback: string; label: PerformanceLabel }> = [
  {
    minScore: 8,
    feedback: "Excellent answer! You demonstrate strong technical knowledge.",
    label: "Excellent",
  },
  {
    minScore: 6,
    feedback: "Good answer! You show solid understanding of the concept.",
    label: "Good",
  },
  {
    minScore: 4,
    feedback: "Fair attempt. Consider providing more specific examples and technical details.",
    label: "Needs Improvement",
  },
  {
    minScore: Number.NEGATIVE_INFINITY,
    feedback: "Try to provide more detailed technical explanations with examples.",
    label: "Poor",
  },
];

export function scoreFallback(question: string, answer: string): AnswerEvaluation {
  const questionLower = question.toLowerCase();
  const answerLower = answer.toLowerCase();
  let score = DEFAULT_SCORE;

  const domain = classifyQuestion(questionLower);
  if (domain) {
    for (const keyword of domain.keywords) {
      if (answerLower.includes(keyword)) {
        score += KEYWORD_POINTS;
      }
    }
  }

  for (const threshold of LENGTH_BONUS_THRESHOLDS) {
    if (answer.length > threshold) {
      score += 1;
    }
  }

  if (CODE_EXAMPLE_MARKERS.some((marker) => answer.includes(marker))) {
    score += CODE_EXAMPLE_POINTS;
  }

  const clamped = clampScore(score);
  return {
    score: clamped,
    feedback: feedbackForScore(clamped),
  };
}

export function classifyQuestion(questionLower: string): ScoringDomain | null {
  return SCORING_DOMAINS.find((domain) => domain.markers.some((marker) => questionLower.includes(marker))) ?? null;
}

export function clampScore(score: number): number {
  return Math.min(Math.max(Math.round(score), MIN_SCORE), MAX_SCORE);
}

export function feedbackForScore(score: number): string {
  return resolveTier(score).feedback;
}

export function performanceLabel(averageScore: number): PerformanceLabel {
  return resolveTier(averageScore).label;
}

function resolveTier(score: number): (typeof FEEDBACK_TIERS)[number] {
  const tier = FEEDBACK_TIERS.find((item) => score >= item.minScore);
  return tier ?? FEEDBACK_TIERS[FEEDBACK_TIERS.length - 1];
}
