/**
 * Plain-text rendering of duplicate groups for the operator.
 */

import { formatFileSize } from './path-translator.js';
import type { FileId } from './types.js';

export interface PresentedInstance {
  index: number;
  directory: string;
  filename: string;
  size: number;
  path: string;
  underSweepLocation: boolean;
}

export const CURRENT_LOCATION_NOTE = 'current loc';
export const ELSEWHERE_NOTE = 'duplicate';

export function renderGroup(
  fileId: FileId,
  instances: readonly PresentedInstance[],
  position: { current: number; total: number }
): string[] {
  const title = instances.length > 0 ? instances[0].filename : '';
  const header = ['#', 'File Path', 'Size', 'Notes'];
  const rows = instances.map(instance => [
    String(instance.index),
    instance.path,
    formatFileSize(instance.size),
    instance.underSweepLocation ? CURRENT_LOCATION_NOTE : ELSEWHERE_NOTE
  ]);

  const widths = header.map((cell, column) =>
    Math.max(cell.length, ...rows.map(row => row[column].length))
  );
  const formatRow = (row: string[]): string =>
    row
      .map((cell, column) => (column === 0 || column === 2 ? cell.padStart(widths[column]) : cell.padEnd(widths[column])))
      .join('  ')
      .trimEnd();

  return [
    `File ${position.current} of ${position.total} | File ID: ${fileId} (${title})`,
    formatRow(header),
    widths.map(width => '-'.repeat(width)).join('  '),
    ...rows.map(formatRow)
  ];
}

export function renderDeletionPlan(selected: readonly PresentedInstance[], groupSize: number): string[] {
  const lines = [`You are about to delete ${selected.length} file(s):`];
  for (const instance of selected) {
    lines.push(`  [${instance.index}] ${instance.path}`);
  }
  if (selected.length === groupSize) {
    lines.push('Warning: this selects every copy. No instance of this file will remain.');
  }
  return lines;
}
