import fs from 'fs-extra';
import os from 'os';
import path from 'path';

export interface EphemeralWorkspace {
  dir: string;
  dispose(): Promise<void>;
}

const active = new Set<string>();
let handlersInstalled = false;

function removeActiveSync(): void {
  for (const dir of active) {
    try {
      fs.removeSync(dir);
    } catch (e) {
      process.stderr.write(JSON.stringify({ level: 'warn', msg: 'workspace_cleanup_failed', dir, err: String(e) }) + '\n');
    }
  }
  active.clear();
}

function installSignalHandlers(): void {
  if (handlersInstalled) return;
  handlersInstalled = true;
  const onSignal = (signal: NodeJS.Signals, code: number) => {
    process.stderr.write(JSON.stringify({ ts: new Date().toISOString(), level: 'warn', msg: 'interrupted', signal, cleaned: active.size }) + '\n');
    removeActiveSync();
    process.exit(code);
  };
  process.once('SIGINT', () => onSignal('SIGINT', 130));
  process.once('SIGTERM', () => onSignal('SIGTERM', 143));
  process.once('exit', removeActiveSync);
}

/**
 * Private temp directory for one run's store. Removed on dispose, and on
 * SIGINT/SIGTERM if the run is interrupted.
 */
export async function createEphemeralWorkspace(prefix = 'retrieval-harness-'): Promise<EphemeralWorkspace> {
  installSignalHandlers();
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  active.add(dir);
  return {
    dir,
    dispose: async () => {
      active.delete(dir);
      await fs.remove(dir);
    },
  };
}

export function activeWorkspaceCount(): number {
  return active.size;
}
