import { WorkingDirectoryValidator } from './workingdir-validator';
import { FileOperationService } from './file-operation';
import { TreeAnalyzer } from './tree-analyzer';
import { IndexUpdater } from './index-updater';

export { WorkingDirectoryValidator, FileOperationService, TreeAnalyzer, IndexUpdater };
export type { FileOperation, TreeFileInfo, ChangeAnalysis } from './types';
