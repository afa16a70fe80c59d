export { RefManager, type RefRecord, type RefValue } from './ref-manager';
export { PackedRefs, type PackedRef } from './packed-refs';
export { RefNames } from './ref-names';
