import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'confguard-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string | Buffer): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content);
  return filePath;
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should return the whole file', async () => {
      const filePath = writeTempFile('read-basic.json', '{\n  "host": "localhost"\n}\n');
      const source = new FilePathSource(filePath);

      expect(await source.read()).toBe('{\n  "host": "localhost"\n}\n');
    });

    it('should honour a custom encoding', async () => {
      const filePath = writeTempFile('latin1.json', Buffer.from([0x22, 0xe9, 0x22]));
      const source = new FilePathSource(filePath, { encoding: 'latin1' });

      expect(await source.read()).toBe('"é"');
    });

    it('should reject when the file does not exist', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'missing.json'));
      await expect(source.read()).rejects.toThrow();
    });
  });

  describe('metadata()', () => {
    it('should report file name and size in bytes', () => {
      const filePath = writeTempFile('meta.json', '{"name":"café"}');
      const meta = new FilePathSource(filePath).metadata();

      expect(meta.fileName).toBe('meta.json');
      expect(meta.fileSize).toBe(16);
    });
  });
});
