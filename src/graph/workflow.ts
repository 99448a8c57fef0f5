import { StateGraph, END, START } from '@langchain/langgraph';
import { DiagnosisStateAnnotation, type DiagnosisState } from './state.js';
import { createAiAnalysisNode, createFallbackNode, createProbeNode, type WorkflowConfig } from './nodes.js';

/**
 * Routing after probing: stop on invalid input, skip the AI path when disabled
 */
function createRouteAfterProbe(aiEnabled: boolean) {
  return (state: DiagnosisState): string => {
    if (state.error || !state.record) {
      return END;
    }
    if (state.forceFallback || !aiEnabled) {
      return 'fallback';
    }
    return 'ai_analysis';
  };
}

function routeAfterAi(state: DiagnosisState): string {
  return state.report ? END : 'fallback';
}

/**
 * Creates the diagnosis workflow
 *
 * Flow:
 * 1. probe: connectivity checks → DiagnosticRecord
 * 2. Route:
 *    - invalid input → END
 *    - AI disabled → fallback → END
 *    - otherwise → ai_analysis → (soft failure → fallback) → END
 */
export function createWorkflow(config: WorkflowConfig) {
  const workflow = new StateGraph(DiagnosisStateAnnotation)
    .addNode('probe', createProbeNode(config.prober))
    .addNode('ai_analysis', createAiAnalysisNode(config.dispatcher))
    .addNode('fallback', createFallbackNode(config.dispatcher))

    .addEdge(START, 'probe')
    .addConditionalEdges('probe', createRouteAfterProbe(config.dispatcher.aiEnabled), [
      'ai_analysis',
      'fallback',
      END,
    ])
    .addConditionalEdges('ai_analysis', routeAfterAi, ['fallback', END])
    .addEdge('fallback', END);

  return workflow.compile();
}

export type DiagnosisWorkflow = ReturnType<typeof createWorkflow>;

export interface DiagnosisInput {
  url: string;
  question?: string;
  noAi?: boolean;
}

export async function runDiagnosis(workflow: DiagnosisWorkflow, input: DiagnosisInput): Promise<DiagnosisState> {
  return workflow.invoke({
    targetUrl: input.url,
    question: input.question,
    forceFallback: input.noAi ?? false,
  });
}
