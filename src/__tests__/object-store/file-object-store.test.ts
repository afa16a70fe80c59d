import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { FileObjectStore } from '../../core/object-store';
import { BlobObject, ObjectType } from '../../core/objects';
import {
  buildPack,
  fullEntry,
  objectId,
  offsetDeltaEntry,
  refDeltaEntry,
} from './pack-fixture';

const HELLO_SHA = 'ce013625030ba8dba906f756967f9e9ca394464a';

const text = (content: Uint8Array | undefined): string => Buffer.from(content ?? []).toString();

describe('FileObjectStore', () => {
  let tmpRoot: string;
  let objectsPath: string;
  let store: FileObjectStore;

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'object-store-'));
    objectsPath = path.join(tmpRoot, 'objects');
    await fs.ensureDir(objectsPath);
    store = new FileObjectStore(objectsPath);
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(tmpRoot);
  });

  const writePack = async (name: string, pack: Buffer, index: Buffer): Promise<string> => {
    const packPath = path.join(objectsPath, 'pack', `pack-${name}.pack`);
    await fs.outputFile(packPath, pack);
    await fs.outputFile(path.join(objectsPath, 'pack', `pack-${name}.idx`), index);
    return packPath;
  };

  describe('loose objects', () => {
    it('writes compressed objects under their id', async () => {
      const sha = await store.writeObject(new BlobObject(Buffer.from('hello\n')));

      expect(sha).toBe(HELLO_SHA);
      expect(await fs.pathExists(path.join(objectsPath, 'ce', HELLO_SHA.substring(2)))).toBe(true);
      expect(await store.hasObject(sha)).toBe(true);
    });

    it('reads objects back', async () => {
      await store.writeObject(new BlobObject(Buffer.from('hello\n')));

      const raw = await store.readRawObject(HELLO_SHA);
      const parsed = await store.readObject(HELLO_SHA);

      expect(raw?.type).toBe(ObjectType.BLOB);
      expect(text(raw?.content)).toBe('hello\n');
      expect(parsed).toBeInstanceOf(BlobObject);
    });

    it('writes the same object twice without error', async () => {
      const blob = new BlobObject(Buffer.from('hello\n'));
      await store.writeObject(blob);
      expect(await store.writeObject(blob)).toBe(HELLO_SHA);
    });

    it('answers null for missing or malformed ids', async () => {
      expect(await store.readObject('0'.repeat(40))).toBeNull();
      expect(await store.readObject('not-an-id')).toBeNull();
      expect(await store.hasObject('not-an-id')).toBe(false);
    });

    it('fails on a corrupt loose object', async () => {
      await fs.outputFile(path.join(objectsPath, 'ab', 'c'.repeat(38)), 'garbage');
      const sha = `ab${'c'.repeat(38)}`;

      await expect(store.readObject(sha)).rejects.toThrow(`Failed to read object: ${sha}`);
    });
  });

  describe('pack files', () => {
    const base = Buffer.from('hello world\n');
    const target = Buffer.from('hello there\n');
    const delta = Buffer.concat([Buffer.from([12, 12, 0x90, 6, 6]), Buffer.from('there\n')]);

    it('reads whole and offset-delta entries', async () => {
      const { pack, index } = buildPack([
        fullEntry('blob', base),
        offsetDeltaEntry(objectId('blob', target), 12, delta),
      ]);
      await writePack('one', pack, index);

      const baseObject = await store.readRawObject(objectId('blob', base));
      const deltified = await store.readRawObject(objectId('blob', target));

      expect(text(baseObject?.content)).toBe('hello world\n');
      expect(deltified?.type).toBe(ObjectType.BLOB);
      expect(text(deltified?.content)).toBe('hello there\n');
    });

    it('resolves a ref-delta base stored loose', async () => {
      const baseSha = await store.writeRawObject({ type: ObjectType.BLOB, content: base });
      const { pack, index } = buildPack([refDeltaEntry(objectId('blob', target), baseSha, delta)]);
      await writePack('thin', pack, index);

      const deltified = await store.readObject(objectId('blob', target));

      expect(text(deltified?.content())).toBe('hello there\n');
    });

    it('fails when a ref-delta base is nowhere', async () => {
      const missing = objectId('blob', base);
      const { pack, index } = buildPack([refDeltaEntry(objectId('blob', target), missing, delta)]);
      const packPath = await writePack('broken', pack, index);

      await expect(store.readObject(objectId('blob', target))).rejects.toThrow(
        `Missing delta base ${missing} in ${packPath}`
      );
    });

    it('picks up packs added after the first lookup', async () => {
      const sha = objectId('blob', base);
      expect(await store.hasObject(sha)).toBe(false);

      const { pack, index } = buildPack([fullEntry('blob', base)]);
      await writePack('late', pack, index);

      expect(await store.hasObject(sha)).toBe(true);
      expect(text((await store.readRawObject(sha))?.content)).toBe('hello world\n');
    });

    it('rejects a pack without the PACK signature', async () => {
      const { pack, index } = buildPack([fullEntry('blob', base)]);
      pack.write('NOPE', 0, 'latin1');
      const packPath = await writePack('bad', pack, index);

      await expect(store.readObject(objectId('blob', base))).rejects.toThrow(
        `Invalid pack signature in ${packPath}`
      );
    });
  });
});
