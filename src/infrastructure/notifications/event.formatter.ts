import { MarketEvent } from '../../domain/types/event.types';
import { AnalysisPayload, REPORT_SCHEMA_VERSION } from '../../domain/types/results.types';

export interface WebhookBody {
  schema_version: number;
  event_type: string;
  timestamp: string;
  symbol: string;
  severity: string;
  title: string;
  description: string;
  source: string;
  data: AnalysisPayload;
}

export function toWebhookBody(event: MarketEvent): WebhookBody {
  return {
    schema_version: REPORT_SCHEMA_VERSION,
    event_type: event.eventType,
    timestamp: new Date(event.timestamp).toISOString(),
    symbol: event.subject,
    severity: event.severity,
    title: event.title,
    description: event.description,
    source: event.source,
    data: event.payload,
  };
}

const SEVERITY_EMOJI: Record<MarketEvent['severity'], string> = {
  INFO: 'ℹ️',
  WARNING: '⚠️',
  CRITICAL: '🚨',
};

export function formatTelegramMessage(event: MarketEvent): string {
  const time = new Date(event.timestamp).toISOString().slice(0, 16).replace('T', ' ');
  return [
    `${SEVERITY_EMOJI[event.severity]} <b>${escapeHtml(event.title)}</b>`,
    `${escapeHtml(event.description)} · ⏰ ${time} UTC`,
    '━━━━━━━━━━━━━━━━',
    ...payloadLines(event.payload),
  ].join('\n');
}

function payloadLines(payload: AnalysisPayload): string[] {
  switch (payload.kind) {
    case 'cascade':
      return [
        `💥 Liquidated: <b>${formatUsd(payload.totalLiquidatedUsd)}</b> in ${payload.lookbackHours}h`,
        `   ├ Longs: ${formatUsd(payload.longLiquidatedUsd)}`,
        `   ├ Shorts: ${formatUsd(payload.shortLiquidatedUsd)}`,
        `   └ Bias: ${payload.sideBias}`,
        `🚀 Velocity: ${formatUsd(payload.velocityUsdPerHour)}/h · severity ${payload.severity}/5`,
      ];
    case 'funding':
      return [
        `💸 Funding: <b>${(payload.fundingRate * 100).toFixed(4)}%</b> (z ${payload.zScore.toFixed(2)})`,
        `   ├ Mean: ${(payload.mean * 100).toFixed(4)}% over ${payload.sampleCount} samples`,
        `   └ Persistence: ${(payload.persistenceScore * 100).toFixed(0)}%`,
        ...payload.reasons.map((r) => `• ${escapeHtml(r)}`),
      ];
    case 'volatility':
      return [
        `📈 Regime: <b>${payload.regime}</b> · risk x${payload.riskMultiplier}`,
        `   ├ 24h vol: ${(payload.volatility24h * 100).toFixed(2)}%`,
        `   ├ vs baseline: ${payload.volRatio.toFixed(2)}x`,
        `   └ Clustering: ${(payload.clusteringProbability * 100).toFixed(0)}%`,
      ];
    case 'regime':
      return [
        `🧭 Regime: <b>${payload.primaryRegime}</b>`,
        `   └ ${payload.agreementCount}/${payload.availableTimeframes} timeframes agree`,
      ];
    case 'correlation':
      return [
        `🔗 Correlation: <b>${payload.currentCorrelation.toFixed(2)}</b>` +
          (payload.baselineCorrelation === null
            ? ''
            : ` (baseline ${payload.baselineCorrelation.toFixed(2)})`),
        `   └ Leader: ${payload.leadAsset}`,
      ];
  }
}

function formatUsd(v: number): string {
  const abs = Math.abs(v);
  if (abs >= 1_000_000_000) return `$${(v / 1_000_000_000).toFixed(2)}B`;
  if (abs >= 1_000_000) return `$${(v / 1_000_000).toFixed(2)}M`;
  if (abs >= 1_000) return `$${(v / 1_000).toFixed(2)}K`;
  return `$${v.toFixed(2)}`;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
