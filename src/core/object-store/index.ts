export type { ObjectStore, RawObject } from './store';
export { FileObjectStore } from './file-object-store';
export { PackFile } from './pack/pack-file';
export { PackIndex } from './pack/pack-index';
export { Delta } from './pack/delta';
