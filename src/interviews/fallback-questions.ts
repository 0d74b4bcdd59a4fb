import { MAX_INTERVIEW_QUESTIONS } from "../shared/constants";

const FALLBACK_QUESTION_CATALOG: ReadonlyArray<{ technology: string; questions: ReadonlyArray<string> }> = [
  {
    technology: "Python",
    questions: [
      "Explain the difference between lists and tuples in Python.",
      "How do you handle exceptions in Python? Provide an example.",
      "What are decorators in Python? Give a practical example.",
      "Explain the concept of generators in Python.",
      "How does Python's garbage collection work?",
    ],
  },
  {
    technology: "Django",
    questions: [
      "What is Django ORM and how does it work?",
      "Explain Django's MVT (Model-View-Template) architecture.",
      "How do you handle database migrations in Django?",
      "What are Django signals and when would you use them?",
      "Explain Django's authentication system.",
    ],
  },
  {
    technology: "JavaScript",
    questions: [
      "Explain the difference between var, let, and const.",
      "What are closures in JavaScript? Provide an example.",
      "Explain the concept of promises and async/await.",
      "How does JavaScript handle hoisting?",
      "What is the event loop in JavaScript?",
    ],
  },
  {
    technology: "React",
    questions: [
      "Explain the difference between state and props in React.",
      "What are React hooks? Give examples of useState and useEffect.",
      "Explain the concept of virtual DOM in React.",
      "How do you handle component lifecycle in React?",
      "What is the difference between controlled and uncontrolled components?",
    ],
  },
  {
    technology: "Node.js",
    questions: [
      "Explain the event-driven nature of Node.js.",
      "What is the difference between require and import?",
      "How do you handle asynchronous operations in Node.js?",
      "Explain the concept of streams in Node.js.",
      "What are middleware functions in Express.js?",
    ],
  },
];

function genericQuestions(technology: string): string[] {
  return [
    `Explain the core concepts of ${technology}.`,
    `What are the best practices for ${technology}?`,
    `How would you troubleshoot common issues in ${technology}?`,
    `What are the key features of ${technology}?`,
    `How would you optimize performance in ${technology}?`,
  ];
}

/**
 * Offline question set. Each technology takes the first catalog entry whose name
 * contains it or is contained by it; short names like "js" can hit unrelated
 * entries, and callers rely on that matching as it is.
 */
export function getFallbackQuestions(techStack: ReadonlyArray<string>): string[] {
  const questions: string[] = [];
  for (const technology of techStack) {
    const techLower = technology.toLowerCase();
    const entry = FALLBACK_QUESTION_CATALOG.find((item) => {
      const keyLower = item.technology.toLowerCase();
      return techLower.includes(keyLower) || keyLower.includes(techLower);
    });
    questions.push(...(entry ? entry.questions : genericQuestions(technology)));
  }
  return questions.slice(0, MAX_INTERVIEW_QUESTIONS);
}
