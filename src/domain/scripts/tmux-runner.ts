import { execFile as defaultExecFile } from 'node:child_process';
import { pathExists } from '../../infra/fs-utils.js';
import { ScriptError } from '../../errors.js';
import type { Logger } from '../../logging/logger.js';
import type { ExecFileFn } from '../vcs/git-client.js';
import type { ScriptRunner } from './types.js';

/** Sources plugin scripts into the running tmux server via `tmux run-shell`. */
export class TmuxScriptRunner implements ScriptRunner {
  private execFile: ExecFileFn;

  constructor(
    private logger: Logger,
    execFile?: ExecFileFn,
    private tmuxBinary = 'tmux',
  ) {
    this.execFile = execFile ?? defaultExecFile;
  }

  async run(scriptPath: string): Promise<void> {
    if (!(await pathExists(scriptPath))) {
      this.logger.warn('Script not found, skipping', { scriptPath });
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.execFile(this.tmuxBinary, ['run-shell', scriptPath], { encoding: 'utf8' }, (error, _stdout, stderr) => {
        if (error) {
          reject(new ScriptError(scriptPath, stderr.trim() || error.message, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }
}
