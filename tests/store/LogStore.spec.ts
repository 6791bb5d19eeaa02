import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_LOG_FILES, LogStore } from '../../src/store/LogStore.js';
import { createTempDir, listRotated, readText } from '../_helpers.js';

const rotationTime = new Date('2024-03-05T14:07:09.000Z');

describe('LogStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should resolve default file names inside the directory', () => {
    // Arrange
    const store = new LogStore({ directory: dir });

    // Act & Assert
    expect(store.pathFor('application')).toBe(path.join(dir, DEFAULT_LOG_FILES.application));
    expect(store.pathFor('runtime')).toBe(path.join(dir, 'runtime_errors.log'));
    expect(store.pathFor('database')).toBe(path.join(dir, 'database_errors.log'));
  });

  it('should create the directory and append entries in order', async () => {
    // Arrange
    const nested = path.join(dir, 'nested', 'logs');
    const store = new LogStore({ directory: nested, files: { application: 'client.log' } });

    // Act
    await store.append('application', 'first\n');
    await store.append('application', 'second\n');

    // Assert
    expect(await readText(path.join(nested, 'client.log'))).toBe('first\nsecond\n');
  });

  it('should report no rotation when the active file does not exist', async () => {
    // Arrange
    const store = new LogStore({ directory: dir });

    // Act
    const rotated = await store.rotateIfOversize('runtime');

    // Assert
    expect(rotated).toBeNull();
  });

  it('should leave a file at exactly the ceiling in place', async () => {
    // Arrange
    const store = new LogStore({ directory: dir, maxFileSize: 10 });
    await writeFile(store.pathFor('application'), '0123456789');

    // Act
    const rotated = await store.rotateIfOversize('application');

    // Assert
    expect(rotated).toBeNull();
    expect(await listRotated(dir, 'app_errors.log')).toEqual([]);
  });

  it('should rotate an oversize file once and keep its content', async () => {
    // Arrange
    const onRotate = vi.fn();
    const store = new LogStore({
      directory: dir,
      maxFileSize: 10,
      now: () => rotationTime,
      onRotate,
    });
    const original = 'x'.repeat(11);
    await writeFile(store.pathFor('application'), original);

    // Act
    const rotated = await store.rotateIfOversize('application');
    await store.append('application', 'fresh\n');

    // Assert
    const expectedPath = path.join(dir, 'app_errors.log.20240305_140709.old');
    expect(rotated).toBe(expectedPath);
    expect(onRotate).toHaveBeenCalledTimes(1);
    expect(onRotate).toHaveBeenCalledWith('application', expectedPath);
    expect(await readText(expectedPath)).toBe(original);
    expect(await readText(store.pathFor('application'))).toBe('fresh\n');
  });

  it('should add a counter when the rotated name is already taken', async () => {
    // Arrange
    const store = new LogStore({ directory: dir, maxFileSize: 1, now: () => rotationTime });
    await writeFile(path.join(dir, 'runtime_errors.log.20240305_140709.old'), 'older');
    await writeFile(store.pathFor('runtime'), 'oversize');

    // Act
    const rotated = await store.rotateIfOversize('runtime');

    // Assert
    expect(rotated).toBe(path.join(dir, 'runtime_errors.log.20240305_140709-1.old'));
    expect(await readText(path.join(dir, 'runtime_errors.log.20240305_140709.old'))).toBe('older');
  });

  it('should rotate before an append that finds the file oversize', async () => {
    // Arrange
    const store = new LogStore({ directory: dir, maxFileSize: 5, now: () => rotationTime });
    await writeFile(store.pathFor('database'), 'abcdef');

    // Act
    await store.append('database', 'next\n');

    // Assert
    expect(await listRotated(dir, 'database_errors.log')).toEqual([
      'database_errors.log.20240305_140709.old',
    ]);
    expect(await readText(store.pathFor('database'))).toBe('next\n');
  });

  it('should rotate only once when concurrent writers find the file oversize', async () => {
    // Arrange
    const store = new LogStore({ directory: dir, maxFileSize: 10, now: () => rotationTime });
    await writeFile(store.pathFor('application'), 'y'.repeat(20));

    // Act
    const results = await Promise.all([
      store.rotateIfOversize('application'),
      store.rotateIfOversize('application'),
      store.rotateIfOversize('application'),
    ]);

    // Assert
    expect(results.filter((result) => result !== null)).toHaveLength(1);
    expect(await listRotated(dir, 'app_errors.log')).toHaveLength(1);
  });

  it('should never interleave concurrent appends', async () => {
    // Arrange
    const store = new LogStore({ directory: dir });
    const entries = Array.from(
      { length: 25 },
      (_, index) => `entry-${index}\n${'z'.repeat(2000)}\nend-${index}\n`,
    );

    // Act
    await Promise.all(entries.map((entry) => store.append('application', entry)));

    // Assert
    expect(await readText(store.pathFor('application'))).toBe(entries.join(''));
  });

  it('should keep working after a failed append', async () => {
    // Arrange
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'file');
    const store = new LogStore({ directory: dir, files: { runtime: path.join('blocker', 'nested.log') } });

    // Act
    const failed = store.append('runtime', 'lost\n');
    const succeeded = store.append('application', 'kept\n');

    // Assert
    await expect(failed).rejects.toBeInstanceOf(Error);
    await succeeded;
    expect(await readText(store.pathFor('application'))).toBe('kept\n');
    expect((await readdir(dir)).sort()).toEqual(['app_errors.log', 'blocker']);
  });
});
