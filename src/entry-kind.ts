import * as path from 'path';
import type { FileSystemEntry } from '@diskrings/scanner';

export type EntryKind =
  | 'folder'
  | 'application'
  | 'image'
  | 'video'
  | 'audio'
  | 'document'
  | 'archive'
  | 'disk-image'
  | 'file';

const KIND_BY_EXTENSION: Record<string, EntryKind> = {
  jpg: 'image',
  jpeg: 'image',
  png: 'image',
  gif: 'image',
  heic: 'image',
  webp: 'image',
  mp4: 'video',
  mov: 'video',
  avi: 'video',
  mkv: 'video',
  mp3: 'audio',
  wav: 'audio',
  flac: 'audio',
  aac: 'audio',
  pdf: 'document',
  zip: 'archive',
  rar: 'archive',
  '7z': 'archive',
  tar: 'archive',
  gz: 'archive',
  app: 'application',
  dmg: 'disk-image'
};

/**
 * Icon category for an entry. Bundles are classified by extension like files.
 */
export function entryKind(entry: Pick<FileSystemEntry, 'name' | 'isDirectory' | 'isBundle'>): EntryKind {
  if (entry.isDirectory && !entry.isBundle) return 'folder';
  const ext = path.extname(entry.name).slice(1).toLowerCase();
  return KIND_BY_EXTENSION[ext] ?? (entry.isBundle ? 'folder' : 'file');
}
