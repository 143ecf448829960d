import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalAttachmentStorage } from './localStorage.service';

describe('LocalAttachmentStorage', () => {
  let uploadDir: string;
  let storage: LocalAttachmentStorage;

  beforeEach(async () => {
    uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'it-desk-uploads-'));
    storage = new LocalAttachmentStorage(uploadDir);
  });

  afterEach(async () => {
    await fs.rm(uploadDir, { recursive: true, force: true });
  });

  it('writes the file under issue_files and returns the relative path', async () => {
    const stored = await storage.save({
      buffer: Buffer.from('router log'),
      originalName: 'Router Log (1).TXT',
    });

    expect(stored).toMatch(/^issue_files\/Router-Log-1--\d+-[0-9a-f]{8}\.txt$/);
    await expect(fs.readFile(path.join(uploadDir, stored), 'utf8')).resolves.toBe('router log');
  });

  it('gives two uploads with the same name different paths', async () => {
    const first = await storage.save({ buffer: Buffer.from('a'), originalName: 'screen.png' });
    const second = await storage.save({ buffer: Buffer.from('b'), originalName: 'screen.png' });

    expect(first).not.toBe(second);
  });

  it('removes a stored file', async () => {
    const stored = await storage.save({ buffer: Buffer.from('x'), originalName: 'note.txt' });

    await storage.remove(stored);

    await expect(fs.access(path.join(uploadDir, stored))).rejects.toThrow();
  });

  it('ignores a missing file on remove', async () => {
    await expect(storage.remove('issue_files/missing.txt')).resolves.toBeUndefined();
  });

  it('refuses paths that escape the upload directory', async () => {
    const outside = path.join(path.dirname(uploadDir), 'outside.txt');
    await fs.writeFile(outside, 'keep');

    await storage.remove('../outside.txt');

    await expect(fs.readFile(outside, 'utf8')).resolves.toBe('keep');
    expect(storage.resolve('../outside.txt')).toBeNull();
    await fs.rm(outside, { force: true });
  });
});
