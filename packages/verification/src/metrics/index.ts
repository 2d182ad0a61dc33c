export { VerificationMetrics } from './verification-metrics.js';
