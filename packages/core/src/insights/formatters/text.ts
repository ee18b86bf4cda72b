import chalk from 'chalk';
import type {
  AnalysisDiagnostic,
  AnalysisResult,
  FileRecord,
  FolderRecord,
  FunctionRecord,
} from '../../types.js';
import { riskBand } from '../score.js';
import type { RiskBand } from '../score.js';

type Paint = (text: string) => string;

interface Column<T> {
  header: string;
  align: 'left' | 'right';
  cell: (row: T) => string;
  paint?: (row: T) => Paint;
}

const BAND_COLORS: Record<RiskBand, Paint> = {
  high: text => chalk.red(text),
  moderate: text => chalk.yellow(text),
  low: text => chalk.green(text),
};

function bandColor(score: number): Paint {
  return BAND_COLORS[riskBand(score)];
}

function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Render rows as aligned columns separated by two spaces.
 * Padding is applied before colouring so escape codes don't skew widths.
 */
function renderTable<T>(title: string, columns: Column<T>[], rows: readonly T[]): string[] {
  const lines = [chalk.bold(title)];
  if (rows.length === 0) {
    lines.push(chalk.dim('  (none)'));
    return lines;
  }

  const cells = rows.map(row => columns.map(column => column.cell(row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map(rowCells => rowCells[i]?.length ?? 0)),
  );

  const pad = (text: string, i: number): string => {
    const width = widths[i] ?? text.length;
    return columns[i]?.align === 'right' ? text.padStart(width) : text.padEnd(width);
  };

  lines.push(chalk.dim(columns.map((column, i) => pad(column.header, i)).join('  ').trimEnd()));

  rows.forEach((row, r) => {
    const rowCells = cells[r] ?? [];
    const rendered = columns.map((column, i) => {
      const padded = pad(rowCells[i] ?? '', i);
      // Last column is left-aligned text; don't carry its padding to the line end
      const text = i === columns.length - 1 ? padded.trimEnd() : padded;
      return column.paint ? column.paint(row)(text) : text;
    });
    lines.push(rendered.join('  '));
  });

  return lines;
}

const functionColumns: Column<FunctionRecord>[] = [
  { header: 'CRAP', align: 'right', cell: f => f.score.toFixed(2), paint: f => bandColor(f.score) },
  { header: 'CC', align: 'right', cell: f => String(f.complexity) },
  { header: 'Coverage', align: 'right', cell: f => formatPercent(f.coverageRatio) },
  { header: 'Function', align: 'left', cell: f => f.qualifiedName },
  { header: 'File', align: 'left', cell: f => `${f.filePath}:${f.lineStart}` },
];

const fileColumns: Column<FileRecord>[] = [
  { header: 'CRAP (max)', align: 'right', cell: f => f.maxScore.toFixed(2), paint: f => bandColor(f.maxScore) },
  { header: '#>=thr', align: 'right', cell: f => String(f.countAboveThreshold) },
  { header: 'Functions', align: 'right', cell: f => String(f.functionCount) },
  { header: 'File', align: 'left', cell: f => f.filePath },
];

const folderColumns: Column<FolderRecord>[] = [
  { header: 'CRAP (max)', align: 'right', cell: f => f.maxScore.toFixed(2), paint: f => bandColor(f.maxScore) },
  { header: '#>=thr', align: 'right', cell: f => String(f.countAboveThreshold) },
  { header: 'Files', align: 'right', cell: f => String(f.fileCount) },
  { header: 'Folder', align: 'left', cell: f => f.folderPath },
];

function formatDiagnostic(diagnostic: AnalysisDiagnostic): string {
  switch (diagnostic.kind) {
    case 'parse-failure': {
      const location = diagnostic.line !== undefined ? `:${diagnostic.line}:${diagnostic.column ?? 1}` : '';
      return chalk.red(`  ✖ ${diagnostic.filePath}${location}`) + chalk.dim(` - ${diagnostic.message}`);
    }
    case 'read-failure':
      return chalk.red(`  ✖ ${diagnostic.filePath}`) + chalk.dim(` - ${diagnostic.message}`);
    case 'missing-coverage':
      return chalk.yellow(`  ⚠ ${diagnostic.filePath}`) + chalk.dim(` - ${diagnostic.message}`);
  }
}

/**
 * Human-readable report: function, file and folder tables, then diagnostics
 * and a one-line summary.
 */
export function formatTextReport(result: AnalysisResult): string {
  const { summary } = result;
  const lines: string[] = [
    ...renderTable('CRAP by Function', functionColumns, result.functions),
    '',
    ...renderTable('CRAP by File', fileColumns, result.files),
    '',
    ...renderTable('CRAP by Folder', folderColumns, result.folders),
  ];

  if (result.diagnostics.length > 0) {
    lines.push('', chalk.bold('Diagnostics:'), ...result.diagnostics.map(formatDiagnostic));
  }

  const above = summary.functionsAboveThreshold;
  const aboveText = `${above} at or above threshold ${summary.threshold}`;
  lines.push(
    '',
    `Analyzed ${summary.filesAnalyzed} file${summary.filesAnalyzed === 1 ? '' : 's'}, ` +
      `${summary.functionsAnalyzed} function${summary.functionsAnalyzed === 1 ? '' : 's'}; ` +
      (above > 0 ? chalk.red(aboveText) : chalk.green(aboveText)),
  );

  return lines.join('\n');
}
