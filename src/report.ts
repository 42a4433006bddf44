/**
 * Plain-text and JSON renderings of a scan, for the command line
 */

import { countEntries } from '@diskrings/scanner';
import type { FileSystemEntry } from '@diskrings/scanner';
import type { Ring, SliceGeometry } from '@diskrings/sunburst';
import { entryKind } from './entry-kind';
import { formatBytes, formatPercent } from './format';

export interface ReportOptions {
  /** Slices listed per ring before the rest are summarised */
  maxSlicesPerRing: number;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function sliceLine(slice: SliceGeometry<FileSystemEntry>): string {
  const entry = slice.node;
  const suffix = entryKind(entry) === 'folder' ? '/' : '';
  const span = `[${slice.startAngleDeg.toFixed(1)}°, ${slice.endAngleDeg.toFixed(1)}°)`;
  return `  ${entry.name}${suffix}  ${formatBytes(entry.sizeBytes)}  ${formatPercent(entry.percentageOfTotal)}  ${span}`;
}

/**
 * One header line for the focus, then each ring's slices in layout order
 */
export function renderReport(
  focus: FileSystemEntry,
  rings: readonly Ring<FileSystemEntry>[],
  options: ReportOptions
): string[] {
  const counts = countEntries(focus);
  const lines = [
    `${focus.name}  ${formatBytes(focus.sizeBytes)}  (${plural(counts.files, 'file')}, ${plural(counts.directories, 'folder')})`
  ];

  rings.forEach((ring, index) => {
    lines.push(`Ring ${index + 1}`);
    for (const slice of ring.slice(0, options.maxSlicesPerRing)) {
      lines.push(sliceLine(slice));
    }
    const hidden = ring.length - options.maxSlicesPerRing;
    if (hidden > 0) {
      lines.push(`  … ${hidden} more`);
    }
  });

  return lines;
}

export interface JsonEntry {
  name: string;
  path: string;
  sizeBytes: number;
  percentageOfTotal: number;
  children?: JsonEntry[];
}

export function toJsonTree(entry: FileSystemEntry): JsonEntry {
  const json: JsonEntry = {
    name: entry.name,
    path: entry.path,
    sizeBytes: entry.sizeBytes,
    percentageOfTotal: entry.percentageOfTotal
  };
  if (entry.children) {
    json.children = entry.children.map(toJsonTree);
  }
  return json;
}
