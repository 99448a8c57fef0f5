import { Annotation } from '@langchain/langgraph';
import type { AnalysisReport, DiagnosticRecord } from '../schemas/index.js';
import type { AiAttempt } from '../dispatcher/index.js';

const lastValue = <T>(_current: T, update: T) => update;

// Define state using LangGraph Annotation
export const DiagnosisStateAnnotation = Annotation.Root({
  // Input
  targetUrl: Annotation<string>,
  question: Annotation<string | undefined>,
  forceFallback: Annotation<boolean>({
    reducer: lastValue,
    default: () => false,
  }),

  // Probe result
  record: Annotation<DiagnosticRecord | undefined>,

  // Set when the AI path was tried and did not produce a report
  aiAttempt: Annotation<AiAttempt | undefined>,

  // Output
  report: Annotation<AnalysisReport | undefined>,
  error: Annotation<string | undefined>,
});

export type DiagnosisState = typeof DiagnosisStateAnnotation.State;
