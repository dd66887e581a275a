import { describe, expect, test } from 'vitest';
import { FileAccessError, FileChannel } from '../../src/index.js';
import { MemoryFileSystem } from '../fake-file-system.js';

describe('FileChannel', () => {
  test('delivers a read on the next poll, once', async () => {
    const fs = new MemoryFileSystem();
    fs.files.set('pool.iop', Uint8Array.from([1, 2, 3]));
    const channel = new FileChannel(fs);

    channel.requestRead('pool.iop', 'importPool');
    expect(channel.pending).toBe(1);
    await channel.settled();
    expect(channel.pending).toBe(0);

    expect(channel.poll()).toEqual({
      kind: 'read',
      reason: 'importPool',
      path: 'pool.iop',
      bytes: Uint8Array.from([1, 2, 3]),
    });
    expect(channel.poll()).toBeUndefined();
  });

  test('writes and reports completion', async () => {
    const fs = new MemoryFileSystem();
    const channel = new FileChannel(fs);
    channel.requestWrite('out.vtp', Uint8Array.from([9]), 'saveProject');
    await channel.settled();
    expect(channel.poll()).toEqual({ kind: 'written', reason: 'saveProject', path: 'out.vtp' });
    expect([...(fs.files.get('out.vtp') ?? [])]).toEqual([9]);
  });

  test('turns failures into events', async () => {
    const channel = new FileChannel(new MemoryFileSystem());
    channel.requestRead('missing.iop', 'loadProject');
    await channel.settled();
    const event = channel.poll();
    expect(event?.kind).toBe('failed');
    if (event?.kind === 'failed') {
      expect(event.error).toBeInstanceOf(FileAccessError);
      expect(event.error.message).toBe('missing.iop: no such file');
      expect(event.error.path).toBe('missing.iop');
    }
  });

  test('a later delivery replaces an unread one', async () => {
    const fs = new MemoryFileSystem();
    fs.files.set('a.iop', Uint8Array.from([1]));
    fs.files.set('b.iop', Uint8Array.from([2]));
    const channel = new FileChannel(fs);
    channel.requestRead('a.iop', 'importPool');
    channel.requestRead('b.iop', 'importPool');
    await channel.settled();
    expect(channel.poll()).toMatchObject({ path: 'b.iop' });
    expect(channel.poll()).toBeUndefined();
  });
});
