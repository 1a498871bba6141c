import { execFile } from 'node:child_process';
import { basename } from 'node:path';
import type { ProcessLister, ProcessSample } from './types.js';

export type PsRunner = () => Promise<string>;

function runPs(): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile('ps', ['-axo', 'pid=,comm='], { encoding: 'utf8', maxBuffer: 8 * 1024 * 1024 }, (error, stdout) => {
      if (error) reject(error);
      else resolve(stdout);
    });
  });
}

/**
 * Parse `ps -axo pid=,comm=` output. The name is the base name of the
 * command, so an app bundle path yields the app's executable name.
 */
export function parsePsOutput(output: string): ProcessSample[] {
  const out: ProcessSample[] = [];
  for (const line of output.split('\n')) {
    const match = /^\s*(\d+)\s+(.+?)\s*$/.exec(line);
    if (!match) continue;
    const name = basename(match[2]);
    if (name) out.push({ pid: Number(match[1]), name });
  }
  return out;
}

export class PsProcessLister implements ProcessLister {
  constructor(private readonly run: PsRunner = runPs) {}

  async list(): Promise<ProcessSample[]> {
    return parsePsOutput(await this.run());
  }
}
