export { GitObject, type ObjectHeader } from './git-object';
export { ObjectType, ObjectTypeHelper } from './object-type';
