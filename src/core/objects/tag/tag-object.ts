import { ObjectException } from '@/core/exceptions';
import { GitObject, ObjectType, ObjectTypeHelper } from '../base';

/**
 * Annotated tag. Only the fields needed to follow a tag to its target are parsed;
 * the original bytes are kept as the content.
 */
export class TagObject extends GitObject {
  constructor(
    readonly objectSha: string,
    readonly targetType: ObjectType,
    readonly tagName: string,
    private readonly raw: Uint8Array
  ) {
    super();
  }

  override type(): ObjectType {
    return ObjectType.TAG;
  }

  override content(): Uint8Array {
    return this.raw;
  }

  static fromContent(content: Uint8Array): TagObject {
    const text = new TextDecoder().decode(content);
    const end = text.indexOf('\n\n');
    const headers = new Map<string, string>();
    for (const line of (end === -1 ? text : text.substring(0, end)).split('\n')) {
      const space = line.indexOf(' ');
      if (space > 0 && !headers.has(line.substring(0, space))) {
        headers.set(line.substring(0, space), line.substring(space + 1));
      }
    }

    const objectSha = headers.get('object');
    const targetType = headers.get('type');
    if (!objectSha || !targetType) {
      throw new ObjectException('Invalid tag object: missing object or type header');
    }
    return new TagObject(
      objectSha,
      ObjectTypeHelper.fromString(targetType),
      headers.get('tag') ?? '',
      content
    );
  }
}
