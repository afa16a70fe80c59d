import { ObjectException } from '@/core/exceptions';

/**
 * Enum representing the different types of Git objects.
 */
export enum ObjectType {
  BLOB = 'blob',
  TREE = 'tree',
  COMMIT = 'commit',
  TAG = 'tag',
}

export class ObjectTypeHelper {
  private constructor() {}

  public static fromString(type: string): ObjectType {
    const objectType = Object.values(ObjectType).find((t) => t === type);
    if (!objectType) {
      throw new ObjectException(`Unknown object type: ${type}`);
    }
    return objectType;
  }

  /**
   * Pack files number the object types: 1 commit, 2 tree, 3 blob, 4 tag.
   */
  public static fromPackCode(code: number): ObjectType | null {
    switch (code) {
      case 1:
        return ObjectType.COMMIT;
      case 2:
        return ObjectType.TREE;
      case 3:
        return ObjectType.BLOB;
      case 4:
        return ObjectType.TAG;
      default:
        return null;
    }
  }
}
