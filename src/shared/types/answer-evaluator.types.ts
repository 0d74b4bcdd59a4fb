export interface AnswerEvaluation {
  score: number;
  feedback: string;
}
