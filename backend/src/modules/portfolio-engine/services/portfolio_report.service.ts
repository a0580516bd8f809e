/**
 * PORTFOLIO REPORT
 *
 * Plain-text summary of one analysis: latest closes, performance, correlation,
 * and how far unit holdings moved from the initial allocation.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { PortfolioAnalysis } from '../contracts/analysis.contract.js';
import type { RebalancingFrequency } from '../contracts/portfolio.contract.js';

const RULE = '====================================================';
const SUB_RULE = '----------------------------------------------------';

const STRATEGY_LABELS: Record<RebalancingFrequency, string> = {
  none: 'Buy & Hold (no rebalancing)',
  daily: 'Daily Rebalancing',
  weekly: 'Weekly Rebalancing',
  monthly: 'Monthly Rebalancing',
};

function pct(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

function signedPct(value: number): string {
  const s = value.toFixed(2);
  return value >= 0 ? `+${s}%` : `${s}%`;
}

function usd(value: number): string {
  return `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function stamp(now: Date): string {
  return now.toISOString().slice(0, 16).replace('T', ' ');
}

function correlationLines(analysis: PortfolioAnalysis): string[] {
  const { assets, matrix } = analysis.metrics.correlation;
  const width = Math.max(6, ...assets.map(a => a.length + 1));
  const header = ' '.repeat(width) + assets.map(a => a.padStart(width)).join('');
  const rows = assets.map((a, i) =>
    a.padEnd(width) + matrix[i].map(c => c.toFixed(2).padStart(width)).join('')
  );
  return [header, ...rows];
}

export function buildPortfolioReport(analysis: PortfolioAnalysis, now: Date): string {
  const { metrics, simulation } = analysis;
  const lines: string[] = [];

  lines.push(RULE);
  lines.push(`PORTFOLIO REPORT - ${stamp(now)} UTC`);
  lines.push(RULE);
  lines.push('');
  lines.push(`Assets: ${analysis.assets.map((a, i) => `${a} ${pct(analysis.weights[i])}`).join(' | ')}`);
  lines.push(`Period: ${analysis.period.from} -> ${analysis.period.to} (${analysis.period.observations} observations)`);
  lines.push(`Strategy: ${STRATEGY_LABELS[simulation.frequency]}`);
  lines.push('');

  lines.push(`LATEST PRICES (${analysis.period.to}, change vs previous close)`);
  lines.push(SUB_RULE);
  for (const p of analysis.latestPrices) {
    lines.push(` • ${p.asset}: ${usd(p.close)} (${signedPct(p.changePct)})`);
  }
  lines.push('');

  lines.push('PERFORMANCE');
  lines.push(SUB_RULE);
  lines.push(` • Annualized Return: ${metrics.annualizedReturnPct.toFixed(2)}%`);
  lines.push(` • Annualized Volatility: ${metrics.annualizedVolatilityPct.toFixed(2)}%`);
  lines.push(` • Sharpe Ratio: ${metrics.sharpeRatio.toFixed(2)} (risk-free ${pct(metrics.riskFreeRate)})`);
  lines.push(` • Max Drawdown: ${pct(metrics.maxDrawdown)}`);
  lines.push(
    ` • Simulated Value: ${simulation.summary.finalValue.toFixed(4)} ` +
    `(${signedPct(simulation.summary.totalReturnPct)}, ${simulation.summary.rebalanceCount} rebalances)`
  );
  lines.push('');

  lines.push('CORRELATION (daily log returns)');
  lines.push(SUB_RULE);
  lines.push(...correlationLines(analysis));
  if (metrics.correlation.undefinedPairs.length > 0) {
    lines.push(`Undefined (zero variance): ${metrics.correlation.undefinedPairs.map(p => p.join('/')).join(', ')}`);
  }
  lines.push('');

  lines.push('LATEST QUANTITY ADJUSTMENTS');
  lines.push(SUB_RULE);
  const first = simulation.quantities[0];
  const last = simulation.quantities[simulation.quantities.length - 1];
  analysis.assets.forEach((asset, i) => {
    const drift = first[i] > 0 ? ((last[i] - first[i]) / first[i]) * 100 : 0;
    lines.push(` • ${asset}: ${last[i].toPrecision(6)} units (${signedPct(drift)} total drift)`);
  });
  lines.push('');
  lines.push('[End of Portfolio Report]');

  return lines.join('\n');
}

/**
 * Writes portfolio_report_YYYY-MM-DD.txt under dir, returns the path
 */
export function writePortfolioReport(dir: string, text: string, now: Date): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, `portfolio_report_${now.toISOString().split('T')[0]}.txt`);
  fs.writeFileSync(file, text, 'utf-8');
  console.log(`[Report] Written ${file}`);
  return file;
}
