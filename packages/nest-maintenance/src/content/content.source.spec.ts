import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryMaintenanceFiles, NodeMaintenanceFiles } from './content.source';

describe('NodeMaintenanceFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nest-maintenance-'));
    writeFileSync(join(dir, 'maintenance.html'), '<h1>Down for maintenance</h1>');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('probes existence relative to the base directory', async () => {
    const files = new NodeMaintenanceFiles(dir);

    await expect(files.exists('maintenance.html')).resolves.toBe(true);
    await expect(files.exists('maintenance.on')).resolves.toBe(false);
  });

  it('accepts absolute paths', async () => {
    const files = new NodeMaintenanceFiles('/does/not/matter');

    await expect(files.exists(join(dir, 'maintenance.html'))).resolves.toBe(true);
  });

  it('reads the content bytes', async () => {
    const content = await new NodeMaintenanceFiles(dir).read('maintenance.html');

    expect(content.toString('utf-8')).toBe('<h1>Down for maintenance</h1>');
  });

  it('rejects reads of missing files', async () => {
    await expect(new NodeMaintenanceFiles(dir).read('missing.html')).rejects.toThrow('ENOENT');
  });
});

describe('MemoryMaintenanceFiles', () => {
  it('stores, reads and removes entries', async () => {
    const files = new MemoryMaintenanceFiles({ 'page.html': 'hello' });

    await expect(files.read('page.html')).resolves.toEqual(Buffer.from('hello'));
    files.remove('page.html');
    await expect(files.exists('page.html')).resolves.toBe(false);
    await expect(files.read('page.html')).rejects.toThrow("ENOENT: no such file 'page.html'");
  });
});
