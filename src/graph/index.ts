export { createWorkflow, runDiagnosis } from './workflow.js';
export type { DiagnosisWorkflow, DiagnosisInput } from './workflow.js';
export { DiagnosisStateAnnotation } from './state.js';
export type { DiagnosisState } from './state.js';
export type { WorkflowConfig } from './nodes.js';
