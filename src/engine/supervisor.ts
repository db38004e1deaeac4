import { spawn, type ChildProcess } from 'node:child_process';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { Channel } from './channel.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../log/logger.js';
import type { ProcessOutput } from '../types.js';

export interface RunProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives every line as well; defaults to the supervisor logger. */
  logger?: Logger;
}

const defaultLogger = createLogger('supervisor');

/**
 * Spawns `command` and streams its output. stdout and stderr are drained by
 * independent line readers, so each stream keeps its own order while the two
 * may interleave. The stream ends with exactly one `Completed` once both
 * readers are drained and the process has closed, or with exactly one `Error`
 * (and no `Completed`) when the process could not be spawned.
 *
 * Nothing here can stop the process once it started.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {},
): AsyncIterable<ProcessOutput> {
  const output = new Channel<ProcessOutput>();
  const log = options.logger ?? defaultLogger;
  const commandLine = [command, ...args].join(' ');

  let finished = false;
  const finish = (last: ProcessOutput): void => {
    if (finished) return;
    finished = true;
    output.push(last);
    output.close();
  };

  let child: ChildProcess;
  try {
    child = spawn(command, [...args], {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    log.error(`Failed to spawn command '${commandLine}': ${errorMessage(err)}`);
    finish({ type: 'Error', message: `Failed to spawn command: '${commandLine}'\nError:\n${errorMessage(err)}` });
    return output;
  }

  const pipeLines = (stream: Readable | null, type: 'Stdout' | 'Stderr'): Promise<void> => {
    if (!stream) return Promise.resolve();
    const tag = type === 'Stdout' ? '[STDOUT]' : '[STDERR]';
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
      rl.on('line', (line) => {
        log.info(`${tag}: ${line}`);
        output.push({ type, line });
      });
      rl.once('close', () => resolve());
    });
  };

  const drained = Promise.all([pipeLines(child.stdout, 'Stdout'), pipeLines(child.stderr, 'Stderr')]);

  let spawned = false;
  child.once('spawn', () => {
    spawned = true;
    log.debug(`Spawned '${commandLine}' (pid ${child.pid ?? 'unknown'})`);
  });

  child.on('error', (err) => {
    if (!spawned) {
      log.error(`Failed to spawn command '${commandLine}': ${err.message}`);
      finish({ type: 'Error', message: `Failed to spawn command: '${commandLine}'\nError:\n${err.message}` });
    } else {
      log.warn(`Process '${commandLine}' reported an error: ${err.message}`);
    }
  });

  child.once('close', (code, signal) => {
    drained
      .then(() => {
        log.debug(`'${commandLine}' exited with ${code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`}`);
        finish({ type: 'Completed', code, signal });
      })
      .catch((err: unknown) => {
        finish({ type: 'Error', message: `Failed to read output of '${commandLine}': ${errorMessage(err)}` });
      });
  });

  return output;
}

export function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (code !== null) return String(code);
  return signal ? `signal ${signal}` : 'unknown';
}
