export { WorkingDirectoryManager, type UpdateResult } from './work-dir-manager';
