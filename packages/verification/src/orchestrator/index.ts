export { VerificationOrchestrator } from './verification-orchestrator.js';
export type { VerificationOrchestratorOptions } from './verification-orchestrator.js';
