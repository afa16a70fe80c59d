import type { EntryType } from '@/core/objects';

export interface TreeFileInfo {
  sha: string;
  mode: EntryType; // Git file mode from tree entry
}

export type FileOperation =
  | { action: 'create' | 'modify'; path: string; target: TreeFileInfo }
  | { action: 'delete'; path: string };

export interface ChangeAnalysis {
  operations: FileOperation[];
  summary: { created: number; modified: number; deleted: number };
}
