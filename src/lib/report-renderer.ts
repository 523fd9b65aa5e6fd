/**
 * @file src/lib/report-renderer.ts
 * @description Renders an evaluation report as the terminal summary: ranked worst documents,
 *              deficit counts, recurring boilerplate tokens and the worst document side by side.
 */

import chalk from 'chalk';
import type { DeficitThresholds, RankKey } from '../shared/evaluator-config';
import { DEFICIT_THRESHOLDS } from '../shared/evaluator-config';
import type { ComparisonPair, EvaluationReport, RankedDocument } from './aggregator';

const RULE_WIDTH = 100;
const ID_WIDTH = 40;
const CELL_WIDTH = 8;

const RANK_LABELS: Record<RankKey, string> = {
  f1_gap: 'F1',
  precision_gap: 'PRECISION',
  recall_gap: 'RECALL',
};

export interface RenderOptions {
  color?: boolean;
  thresholds?: DeficitThresholds;
}

const paletteFor = (color: boolean): chalk.Chalk => (color ? chalk : new chalk.Instance({ level: 0 }));

const num = (value: number): string => value.toFixed(3).padStart(CELL_WIDTH);

const count = (value: number): string => String(value).padStart(CELL_WIDTH);

const cell = (label: string): string => label.padStart(CELL_WIDTH);

export const formatRankedHeader = (): string =>
  [
    'File ID'.padEnd(ID_WIDTH),
    cell('C Prec'),
    cell('C Rec'),
    cell('C F1'),
    cell('B Prec'),
    cell('B Rec'),
    cell('B F1'),
    cell('Gap'),
    cell('C Len'),
    cell('B Len'),
  ].join(' ');

export const formatRankedRow = (row: RankedDocument): string =>
  [
    row.documentId.padEnd(ID_WIDTH),
    num(row.candidate.precision),
    num(row.candidate.recall),
    num(row.candidate.f1),
    num(row.baseline.precision),
    num(row.baseline.recall),
    num(row.baseline.f1),
    num(row.gap),
    count(row.candidate.length),
    count(row.baseline.length),
  ].join(' ');

const banner = (title: string, palette: chalk.Chalk): string[] => [
  '='.repeat(RULE_WIDTH),
  palette.bold(title),
  '='.repeat(RULE_WIDTH),
];

export const renderRankedTable = (
  ranked: readonly RankedDocument[],
  pair: ComparisonPair,
  rankBy: RankKey,
  options: RenderOptions = {},
): string[] => {
  const palette = paletteFor(options.color ?? false);
  const lines = [
    ...banner(
      `TOP ${ranked.length} WORST ${RANK_LABELS[rankBy]} GAPS (${pair.candidate} vs ${pair.baseline})`,
      palette,
    ),
    formatRankedHeader(),
    '-'.repeat(RULE_WIDTH),
  ];
  ranked.forEach((row) => {
    const line = formatRankedRow(row);
    lines.push(row.gap > 0 ? palette.red(line) : line);
  });
  return lines;
};

const formatAverages = (label: string, averages: EvaluationReport['averages'][string]): string =>
  `Average ${label}: precision ${averages.precision.toFixed(3)} · recall ${averages.recall.toFixed(
    3,
  )} · F1 ${averages.f1.toFixed(3)}`;

export const renderSummary = (report: EvaluationReport, options: RenderOptions = {}): string[] => {
  const palette = paletteFor(options.color ?? false);
  const thresholds = options.thresholds ?? DEFICIT_THRESHOLDS;
  const { pair, deficits } = report;
  const lines = [...banner('SUMMARY STATISTICS', palette)];
  lines.push(`Documents evaluated: ${report.documentCount}`);
  [pair.candidate, pair.baseline].forEach((source) => {
    const averages = report.averages[source];
    if (averages) {
      lines.push(formatAverages(source, averages));
    }
  });
  lines.push(`Files with F1 gap > ${thresholds.deficit}: ${deficits.counts.f1Deficit}`);
  lines.push(
    `Files with precision deficit > ${thresholds.deficit}: ${deficits.counts.precisionDeficit}`,
  );
  lines.push(`Files with recall deficit > ${thresholds.deficit}: ${deficits.counts.recallDeficit}`);
  lines.push(`Files where ${pair.candidate} extracts nothing: ${deficits.counts.emptyExtraction}`);
  if (deficits.emptyExtractionSample.length) {
    lines.push(palette.yellow(`  Empty files: ${deficits.emptyExtractionSample.join(', ')}`));
  }
  lines.push(
    `Files where ${pair.candidate} extracts >${thresholds.overExtractionRatio}x ${pair.baseline} length: ${deficits.counts.overExtraction}`,
  );
  return lines;
};

export const renderBoilerplate = (report: EvaluationReport, options: RenderOptions = {}): string[] => {
  const palette = paletteFor(options.color ?? false);
  const lines = [
    ...banner(
      `COMMON BOILERPLATE IN WORST ${report.boilerplate.documents} ${RANK_LABELS[report.rankBy]} DOCS (${report.pair.candidate})`,
      palette,
    ),
  ];
  if (!report.boilerplate.tokens.length) {
    lines.push('No extra tokens found.');
    return lines;
  }
  lines.push('Most common extra words:');
  report.boilerplate.tokens.forEach(({ token, count: occurrences }) => {
    lines.push(`  ${token}: ${occurrences}`);
  });
  return lines;
};

export const renderWorstDocument = (report: EvaluationReport, options: RenderOptions = {}): string[] => {
  const palette = paletteFor(options.color ?? false);
  const lines = [...banner('WORST DOC SAMPLE', palette)];
  const { worst, pair } = report;
  if (!worst) {
    lines.push('No documents evaluated.');
    return lines;
  }
  const { document } = worst;
  lines.push(`File: ${document.documentId}`);
  lines.push(
    `${pair.candidate} P/R/F1: ${document.candidate.precision.toFixed(3)}/${document.candidate.recall.toFixed(
      3,
    )}/${document.candidate.f1.toFixed(3)}, ${pair.baseline} P/R/F1: ${document.baseline.precision.toFixed(
      3,
    )}/${document.baseline.recall.toFixed(3)}/${document.baseline.f1.toFixed(3)}`,
  );
  lines.push(
    `${pair.candidate}: ${document.candidate.length} words, ${pair.baseline}: ${document.baseline.length} words, Truth: ${document.truthLength} words`,
  );
  lines.push('', palette.cyan(`Truth excerpt:`), worst.truthExcerpt);
  lines.push('', palette.cyan(`${pair.candidate} excerpt:`), worst.candidateExcerpt);
  lines.push('', palette.cyan(`${pair.baseline} excerpt:`), worst.baselineExcerpt);
  return lines;
};

export const renderReport = (report: EvaluationReport, options: RenderOptions = {}): string =>
  [
    renderRankedTable(report.ranked, report.pair, report.rankBy, options),
    renderSummary(report, options),
    renderBoilerplate(report, options),
    renderWorstDocument(report, options),
  ]
    .map((section) => section.join('\n'))
    .join('\n\n');
