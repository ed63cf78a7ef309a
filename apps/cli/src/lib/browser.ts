import { spawn } from 'node:child_process';

function openerFor(platform: NodeJS.Platform, target: string): { command: string; args: string[] } {
  if (platform === 'darwin') {
    return { command: 'open', args: [target] };
  }
  if (platform === 'win32') {
    return { command: 'cmd', args: ['/c', 'start', '""', target] };
  }
  return { command: 'xdg-open', args: [target] };
}

/** Hands a URL to the desktop's default handler without waiting for it. */
export function openInBrowser(target: string): Promise<void> {
  const { command, args } = openerFor(process.platform, target);
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'ignore', detached: true });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
