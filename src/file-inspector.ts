/**
 * "Open" support: copy a file to a scratch directory and hand it to the
 * platform viewer, so the archive copy is never opened in place.
 */

import { spawn } from 'child_process';
import { copyFile, mkdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { Logger, errorMessage } from './logger.js';

export interface FileInspector {
  open(path: string): Promise<boolean>;
  cleanup(): Promise<void>;
}

export type Launcher = (path: string) => void;

export function viewerCommand(platform: NodeJS.Platform, path: string): { command: string; args: string[] } {
  switch (platform) {
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '', path] };
    case 'darwin':
      return { command: 'open', args: [path] };
    default:
      return { command: 'xdg-open', args: [path] };
  }
}

function launchViewer(path: string): void {
  const { command, args } = viewerCommand(process.platform, path);
  const child = spawn(command, args, { detached: true, stdio: 'ignore' });
  child.on('error', (error) => {
    new Logger({ context: 'FileInspector' }).warn('Viewer failed to start', { command, error: error.message });
  });
  child.unref();
}

/**
 * Windows source paths use backslashes, which `basename` on POSIX does not split.
 */
export function scratchName(sourcePath: string): string {
  return basename(sourcePath.replace(/\\/g, '/'));
}

export class TempCopyInspector implements FileInspector {
  private readonly scratchDir: string;
  private readonly launch: Launcher;
  private created = false;
  private readonly logger = new Logger({ context: 'FileInspector' });

  constructor(scratchDir?: string, launch: Launcher = launchViewer) {
    this.scratchDir = scratchDir ?? join(tmpdir(), 'sweep-deduper-open');
    this.launch = launch;
  }

  async open(path: string): Promise<boolean> {
    try {
      await mkdir(this.scratchDir, { recursive: true });
      this.created = true;
      const destination = join(this.scratchDir, scratchName(path));
      await copyFile(path, destination);
      this.launch(destination);
      return true;
    } catch (error) {
      this.logger.warn('Could not open file', { path, error: errorMessage(error) });
      return false;
    }
  }

  async cleanup(): Promise<void> {
    if (!this.created) return;
    await rm(this.scratchDir, { recursive: true, force: true });
    this.created = false;
  }
}
