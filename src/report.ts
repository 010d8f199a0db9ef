/**
 * Human-readable and JSON renderings of a run report
 */

import type { RunReport } from './types.js';

const RULE = '='.repeat(60);
const PREVIEW_LIMIT = 5;
const CATEGORY_PREVIEW = 3;

function previewCategory(files: string[]): string[] {
  if (files.length <= PREVIEW_LIMIT) {
    return files.map(file => `      • ${file}`);
  }
  return [
    ...files.slice(0, CATEGORY_PREVIEW).map(file => `      • ${file}`),
    `      ... and ${files.length - CATEGORY_PREVIEW} more`,
  ];
}

function previewPairs(pairs: Array<{ file: string; detail: string }>): string[] {
  const lines = pairs.slice(0, PREVIEW_LIMIT).map(({ file, detail }) => `   • ${file}: ${detail}`);
  if (pairs.length > PREVIEW_LIMIT) {
    lines.push(`   ... and ${pairs.length - PREVIEW_LIMIT} more`);
  }
  return lines;
}

export function formatRunReport(report: RunReport): string {
  if (report.status === 'failed') {
    return `❌ Critical error: ${report.error ?? 'unknown error'}`;
  }

  if (report.status === 'empty') {
    return `📭 ${report.message ?? 'No files found to organize'} in ${report.directory}`;
  }

  const { results, dryRun } = report;
  const { stats } = results;
  const lines: string[] = [
    '',
    RULE,
    dryRun ? '🗂️  DOWNLOADS ORGANIZATION PLAN (DRY RUN)' : '🗂️  DOWNLOADS ORGANIZATION COMPLETE',
    RULE,
    '📊 SUMMARY:',
    `   Total files processed: ${stats.totalFiles}`,
    dryRun ? `   ✅ Planned moves: ${stats.moved}` : `   ✅ Successfully moved: ${stats.moved}`,
    `   ⏭️  Skipped: ${stats.skipped}`,
    `   ❌ Errors: ${stats.errors}`,
    `   ⏱️  Execution time: ${stats.executionTimeSeconds} seconds`,
  ];

  const categories = Object.entries(results.moved);
  if (categories.length > 0) {
    lines.push('', dryRun ? '📁 FILES TO ORGANIZE BY CATEGORY:' : '📁 FILES ORGANIZED BY CATEGORY:');
    for (const [category, files] of categories) {
      lines.push(`   ${category.toUpperCase()}: ${files.length} files`, ...previewCategory(files));
    }
  }

  if (results.skipped.length > 0) {
    lines.push('', '⏭️  SKIPPED FILES:');
    lines.push(...previewPairs(results.skipped.map(({ file, reason }) => ({ file, detail: reason }))));
  }

  if (results.errors.length > 0) {
    lines.push('', '❌ ERRORS:');
    lines.push(...previewPairs(results.errors.map(({ file, message }) => ({ file, detail: message }))));
  }

  lines.push('', `📂 Organized files location: ${report.directory}`, RULE);
  return lines.join('\n');
}

export function toJsonReport(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}
