import { beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { TempCopyInspector, scratchName, viewerCommand } from './file-inspector.js';

describe('viewerCommand', () => {
  it('picks the platform viewer', () => {
    expect(viewerCommand('win32', 'C:\\tmp\\a.pdf')).toEqual({ command: 'cmd', args: ['/c', 'start', '', 'C:\\tmp\\a.pdf'] });
    expect(viewerCommand('darwin', '/tmp/a.pdf')).toEqual({ command: 'open', args: ['/tmp/a.pdf'] });
    expect(viewerCommand('linux', '/tmp/a.pdf')).toEqual({ command: 'xdg-open', args: ['/tmp/a.pdf'] });
  });
});

describe('scratchName', () => {
  it('takes the last segment of either separator style', () => {
    expect(scratchName('N:\\PPDO\\Records\\A\\plan.pdf')).toBe('plan.pdf');
    expect(scratchName('/mnt/records/A/plan.pdf')).toBe('plan.pdf');
  });
});

describe('TempCopyInspector', () => {
  const dir = join(process.cwd(), '.test-tmp', 'file-inspector');
  const scratch = join(dir, 'scratch');
  const source = join(dir, 'archive', 'plan.pdf');

  beforeEach(() => {
    rmSync(dir, { recursive: true, force: true });
    mkdirSync(join(dir, 'archive'), { recursive: true });
    writeFileSync(source, 'drawing');
  });

  it('opens a scratch copy, never the archive file', async () => {
    const launched: string[] = [];
    const inspector = new TempCopyInspector(scratch, path => launched.push(path));

    expect(await inspector.open(source)).toBe(true);

    expect(launched).toEqual([join(scratch, 'plan.pdf')]);
    expect(readFileSync(join(scratch, 'plan.pdf'), 'utf-8')).toBe('drawing');
  });

  it('reports a missing file without launching anything', async () => {
    const launched: string[] = [];
    const inspector = new TempCopyInspector(scratch, path => launched.push(path));

    expect(await inspector.open(join(dir, 'archive', 'gone.pdf'))).toBe(false);
    expect(launched).toEqual([]);
  });

  it('removes the scratch directory on cleanup', async () => {
    const inspector = new TempCopyInspector(scratch, () => undefined);
    await inspector.open(source);

    await inspector.cleanup();

    expect(existsSync(scratch)).toBe(false);
    expect(existsSync(source)).toBe(true);
  });
});
