/**
 * Regime Pipeline Module
 *
 * Per-cycle market analysis over stored market windows:
 * - liquidation cascades, funding anomalies, volatility regimes
 * - multi-timeframe regime agreement
 * - pairwise correlation breakouts
 */

// Orchestration
export {
  PipelineOrchestrator,
  type CycleOptions,
  type CycleOutcome,
} from './pipeline-orchestrator';
export { RegimeStateStore } from './regime-state.store';
export { UnavailabilityTracker } from './unavailability-tracker';

// Analyzers
export { CascadeAnalyzer } from './analyzers/cascade.analyzer';
export { FundingAnomalyAnalyzer } from './analyzers/funding-anomaly.analyzer';
export { VolatilityRegimeAnalyzer } from './analyzers/volatility-regime.analyzer';
export { MultiTimeframeAnalyzer, aggregateRegimes } from './analyzers/multi-timeframe.analyzer';
export { CorrelationAnalyzer, pairKey, symbolPairs } from './analyzers/correlation.analyzer';

// Events
export { evaluateEvents, type EmissionContext } from './emission-policy';
