import { execFile } from 'node:child_process';
import { CollaboratorExecutionError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export interface CommandRequest {
  command: string;
  args: readonly string[];
  cwd?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs one external tool to completion. Implementations reject with
 * `CollaboratorExecutionError` when the tool cannot start or exits non-zero.
 */
export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

/** Quote a command line for logs and error messages. */
export function formatCommand(request: Pick<CommandRequest, 'command' | 'args'>): string {
  return [request.command, ...request.args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

const MAX_BUFFER = 256 * 1024 * 1024;

export class ExecFileRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  run(request: CommandRequest): Promise<CommandResult> {
    const line = formatCommand(request);
    this.logger.debug(`$ ${line}${request.cwd ? `  (in ${request.cwd})` : ''}`);

    return new Promise((resolve, reject) => {
      execFile(
        request.command,
        [...request.args],
        { cwd: request.cwd, maxBuffer: MAX_BUFFER, encoding: 'utf-8' },
        (err, stdout, stderr) => {
          if (err) {
            const exitCode = typeof err.code === 'number' ? err.code : null;
            const detail = stderr || (exitCode === null ? err.message : '');
            reject(new CollaboratorExecutionError(line, exitCode, detail, { cause: err }));
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  }
}
