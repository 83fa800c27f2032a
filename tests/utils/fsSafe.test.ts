import { describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { isTransientFsError, readTextFile, withFsRetry } from '../../src/utils/fsSafe';
import { InputFileError } from '../../src/core/errors';

const fsError = (code: string) => Object.assign(new Error(`${code}: simulated`), { code });

describe('fsSafe', () => {
  describe('isTransientFsError', () => {
    it('should recognise transient codes only', () => {
      expect(isTransientFsError(fsError('EBUSY'))).toBe(true);
      expect(isTransientFsError(fsError('EMFILE'))).toBe(true);
      expect(isTransientFsError(fsError('ENOENT'))).toBe(false);
      expect(isTransientFsError('EBUSY')).toBe(false);
    });
  });

  describe('withFsRetry', () => {
    it('should retry transient failures until the operation succeeds', async () => {
      const operation = vi.fn()
        .mockRejectedValueOnce(fsError('EBUSY'))
        .mockRejectedValueOnce(fsError('EAGAIN'))
        .mockResolvedValue('ok');

      await expect(withFsRetry(operation, 'Test read', {}, { times: 2, baseMs: 1 })).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should give up after the configured number of retries', async () => {
      const operation = vi.fn().mockRejectedValue(fsError('EBUSY'));

      await expect(withFsRetry(operation, 'Test read', {}, { times: 1, baseMs: 1 })).rejects.toThrow('EBUSY: simulated');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should not retry permanent failures', async () => {
      const operation = vi.fn().mockRejectedValue(fsError('ENOENT'));

      await expect(withFsRetry(operation, 'Test read', {}, { times: 3, baseMs: 1 })).rejects.toThrow('ENOENT: simulated');
      expect(operation).toHaveBeenCalledTimes(1);
    });
  });

  describe('readTextFile', () => {
    it('should read UTF-8 text', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'fill-'));
      try {
        const path = join(dir, 'items.txt');
        await writeFile(path, '1 Fackel\n', 'utf8');
        await expect(readTextFile(path)).resolves.toBe('1 Fackel\n');
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    it('should wrap failures in InputFileError', async () => {
      const path = join(tmpdir(), 'fill-does-not-exist', 'items.txt');
      const error = await readTextFile(path).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InputFileError);
      expect(error).toMatchObject({ filePath: path, reason: 'ENOENT', message: `Cannot read ${path}: ENOENT` });
    });
  });
});
