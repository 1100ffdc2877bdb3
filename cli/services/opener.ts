import { spawn, type ChildProcess } from 'node:child_process';
import { describeError } from '../errors';

export interface OpenOutcome {
  opened: boolean;
  error?: string;
}

export interface OpenCommand {
  command: string;
  args: string[];
}

export const openCommandFor = (filePath: string, platform: NodeJS.Platform = process.platform): OpenCommand => {
  if (platform === 'darwin') return { command: 'open', args: [filePath] };
  // the empty string is the window title `start` expects before a quoted path
  if (platform === 'win32') return { command: 'cmd', args: ['/c', 'start', '', filePath] };
  return { command: 'xdg-open', args: [filePath] };
};

/**
 * Hands the file to the desktop's default handler. Never rejects: a missing opener or a
 * headless host yields `{ opened: false, error }`.
 */
export const openInDefaultApp = (filePath: string, platform: NodeJS.Platform = process.platform): Promise<OpenOutcome> =>
  new Promise((resolve) => {
    const { command, args } = openCommandFor(filePath, platform);
    let child: ChildProcess;
    try {
      child = spawn(command, args, { detached: true, stdio: 'ignore' });
    } catch (error) {
      resolve({ opened: false, error: describeError(error) });
      return;
    }
    child.once('error', (error) => resolve({ opened: false, error: `${command}: ${error.message}` }));
    child.once('spawn', () => {
      child.unref();
      resolve({ opened: true });
    });
  });
