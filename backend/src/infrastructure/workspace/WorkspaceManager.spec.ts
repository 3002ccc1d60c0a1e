import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { WorkspaceManager } from './WorkspaceManager';

describe('WorkspaceManager', () => {
  let root: string;
  let manager: WorkspaceManager;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'feedbacker-ws-'));
    manager = new WorkspaceManager(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should allocate a per-attempt path under the root', () => {
    expect(manager.allocate('job-1', 2)).toBe(join(root, 'job-1-2'));
    expect(manager.held()).toEqual(['job-1']);
  });

  it('should refuse a second workspace for the same job', () => {
    manager.allocate('job-1', 1);
    expect(() => manager.allocate('job-1', 2)).toThrow(`Job job-1 already holds workspace ${join(root, 'job-1-1')}`);
  });

  it('should refuse a path that already exists on disk', () => {
    mkdirSync(join(root, 'job-2-1'));
    expect(() => manager.allocate('job-2', 1)).toThrow('already exists');
  });

  it('should remove the directory on release', async () => {
    const dir = manager.allocate('job-1', 1);
    mkdirSync(dir);
    writeFileSync(join(dir, 'file.txt'), 'x');

    await manager.release('job-1');

    expect(existsSync(dir)).toBe(false);
    expect(manager.held()).toEqual([]);
    expect(manager.allocate('job-1', 2)).toBe(join(root, 'job-1-2'));
  });

  it('should ignore release for a job without a workspace', async () => {
    await expect(manager.release('unknown')).resolves.toBeUndefined();
  });

  it('should sweep leftovers from a previous process', async () => {
    mkdirSync(join(root, 'old-job-1'));
    writeFileSync(join(root, 'stray.tmp'), 'x');

    await manager.prepare();

    expect(existsSync(join(root, 'old-job-1'))).toBe(false);
    expect(existsSync(join(root, 'stray.tmp'))).toBe(false);
  });

  it('should create the root when missing', async () => {
    const nested = new WorkspaceManager(join(root, 'a', 'b'));
    await nested.prepare();
    expect(existsSync(join(root, 'a', 'b'))).toBe(true);
  });
});
