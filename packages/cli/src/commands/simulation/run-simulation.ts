import {
  SimulationDriver,
  TIMEFRAMES,
  assertMinimumActivity,
  assertSignalsMatchTargets,
  calculatePerformanceMetrics,
  isTimeframe,
  scorePerformance,
  symbolTimeframes,
  toTradeLogTable,
  validateCandles,
  validateSignals,
  validateStrategyMetadata,
} from '@tradesim/simulation';
import type {
  PerformanceMetrics,
  PerformanceScore,
  PositionSnapshot,
  SimulationSummary,
  StrategyMetadata,
  Timeframe,
} from '@tradesim/simulation';
import { ConfigurationError, createPackageLogger, withContextLabel } from '@tradesim/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { SimulateArgs } from '../../command-defs/simulation.js';

const logger = createPackageLogger('@tradesim/cli');

const MS_PER_HOUR = 60 * 60 * 1000;

export interface SimulationReport {
  submissionId: string | null;
  initialCash: number;
  feeRate: number;
  finalCash: number;
  finalPortfolioValue: number;
  summary: SimulationSummary;
  openPositions: PositionSnapshot[];
  metrics: PerformanceMetrics;
  score: PerformanceScore;
  /** Candle closes that could not be read as numbers */
  candleQualityIssues: number;
  tradeLogPath: string | null;
}

function resolvePrimaryTimeframe(args: SimulateArgs, envTimeframe: string): Timeframe {
  if (args.primaryTimeframe) {
    return args.primaryTimeframe;
  }
  if (!isTimeframe(envTimeframe)) {
    throw new ConfigurationError(
      `TRADESIM_PRIMARY_TIMEFRAME must be one of ${TIMEFRAMES.join(', ')}, got '${envTimeframe}'`,
      'TRADESIM_PRIMARY_TIMEFRAME'
    );
  }
  return envTimeframe;
}

async function runPipeline(args: SimulateArgs, ctx: CommandContext): Promise<SimulationReport> {
  const datasets = ctx.services.datasets();
  const env = ctx.services.envConfig();

  const initialCash = args.initialCash ?? env.initialCash;
  const feeRate = args.feeRate ?? env.feeRate;
  const primaryTimeframe = resolvePrimaryTimeframe(args, env.primaryTimeframe);

  let metadata: StrategyMetadata | null = null;
  if (args.metadata) {
    metadata = validateStrategyMetadata(await datasets.readJson(args.metadata));
  }

  const signals = validateSignals(await datasets.readTable(args.signals));
  assertMinimumActivity(signals, args.minPairs);
  if (metadata) {
    assertSignalsMatchTargets(signals, metadata);
  }

  const driver = new SimulationDriver({
    initialCash,
    feeRate,
    primaryTimeframe,
    symbolTimeframes: metadata ? symbolTimeframes(metadata) : {},
    failOnRejection: args.failOnRejection,
    maxStalenessMs:
      args.maxStalenessHours === undefined ? undefined : Math.round(args.maxStalenessHours * MS_PER_HOUR),
  });

  const candles = validateCandles(await datasets.readTable(args.candles), {
    primaryTimeframe: driver.config.primaryTimeframe,
    symbolTimeframes: driver.config.symbolTimeframes,
  });
  if (candles.qualityIssues.length > 0) {
    logger.warn('Candle closes could not be read as numbers', {
      count: candles.qualityIssues.length,
      first: candles.qualityIssues[0],
    });
  }

  const result = driver.simulate(signals, candles.bars);
  const metrics = calculatePerformanceMetrics(result, initialCash);
  const score = scorePerformance(metrics);

  if (args.tradeLog) {
    await datasets.writeTable(args.tradeLog, toTradeLogTable(result.tradeLog));
    logger.info('Trade log written', { path: args.tradeLog, entries: result.tradeLog.length });
  }

  return {
    submissionId: args.submissionId ?? null,
    initialCash,
    feeRate,
    finalCash: result.finalCash,
    finalPortfolioValue: result.finalPortfolioValue,
    summary: result.summary,
    openPositions: result.openPositions,
    metrics,
    score,
    candleQualityIssues: candles.qualityIssues.length,
    tradeLogPath: args.tradeLog ?? null,
  };
}

/**
 * Validate the inputs, replay the signals and score the outcome. Fatal
 * errors carry the submission id when one was given.
 */
export async function runSimulationHandler(
  args: SimulateArgs,
  ctx: CommandContext
): Promise<SimulationReport> {
  try {
    return await runPipeline(args, ctx);
  } catch (error) {
    if (args.submissionId) {
      throw withContextLabel(error, `submission: ${args.submissionId}`);
    }
    throw error;
  }
}

export interface ReportRow {
  section: string;
  metric: string;
  value: string | number | boolean | null;
}

/**
 * Flatten a report into section/metric/value rows for table output
 */
export function reportToRows(report: SimulationReport): ReportRow[] {
  const rows: ReportRow[] = [];
  const add = (section: string, metric: string, value: ReportRow['value']) => {
    rows.push({ section, metric, value });
  };

  if (report.submissionId) add('run', 'submission', report.submissionId);
  add('run', 'initial_cash', report.initialCash);
  add('run', 'fee_rate', report.feeRate);
  add('run', 'final_cash', report.finalCash);
  add('run', 'final_portfolio_value', report.finalPortfolioValue);

  const { summary } = report;
  add('signals', 'processed', summary.processedSignals);
  add('signals', 'buys', summary.executedBuys);
  add('signals', 'sells', summary.executedSells);
  add('signals', 'holds', summary.holds);
  add('signals', 'rejected', summary.rejected);
  for (const [code, count] of Object.entries(summary.rejectionsByCode)) {
    add('rejections', code, count ?? 0);
  }

  for (const position of report.openPositions) {
    add('positions', position.symbol, `${position.shares} @ ${position.averageCostBasis}`);
  }

  add('metrics', 'total_return_pct', report.metrics.totalReturnPct);
  add('metrics', 'sharpe_ratio', report.metrics.sharpeRatio);
  add('metrics', 'max_drawdown_pct', report.metrics.maxDrawdownPct);
  add('metrics', 'win_rate', report.metrics.winRate);
  add('metrics', 'num_trades', report.metrics.numTrades);

  add('score', 'profitability', report.score.profitability);
  add('score', 'sharpe', report.score.sharpe);
  add('score', 'drawdown', report.score.drawdown);
  add('score', 'total', report.score.total);
  add('score', 'qualifies', report.score.qualifies);
  if (report.score.failedCriteria.length > 0) {
    add('score', 'failed', report.score.failedCriteria.join(', '));
  }

  if (report.candleQualityIssues > 0) add('data', 'candle_quality_issues', report.candleQualityIssues);
  if (report.tradeLogPath) add('data', 'trade_log', report.tradeLogPath);

  return rows;
}
