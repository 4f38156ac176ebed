// Command Runner - spawns the audio utility with an argument vector and a timeout
import { execFile } from 'child_process';
import { AdapterError, CommandResult, CommandRunner } from './types';

export const DEFAULT_COMMAND_TIMEOUT_MS = 3000;

const MAX_OUTPUT_BYTES = 64 * 1024;

/** The subset of an execFile failure the classifier looks at */
export interface ExecFailure {
  message: string;
  code?: unknown;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

/**
 * Translate an execFile failure into a typed adapter error
 */
export function classifyExecFailure(
  error: ExecFailure,
  command: string,
  timeoutMs: number,
  stderr: string = ''
): AdapterError {
  const trimmedStderr = stderr.trim();

  if (error.code === 'ENOENT' || error.code === 'EACCES') {
    return new AdapterError(
      `Audio control unavailable: "${command}" is not installed or not executable`,
      'CommandUnavailable',
      `Install the package providing "${command}" (pulseaudio-utils for pactl, alsa-utils for amixer) and make sure it is on the PATH of the service user.`,
      { command }
    );
  }

  if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return new AdapterError(
      `Audio command "${command}" produced too much output`,
      'CommandFailed',
      'The audio utility printed more than expected. Check that the configured sink or mixer control names a single device.',
      { command, stderr: trimmedStderr }
    );
  }

  if (error.killed === true) {
    return new AdapterError(
      `Audio command "${command}" timed out after ${timeoutMs}ms`,
      'Timeout',
      'The audio daemon did not answer in time. Check that PulseAudio/PipeWire is running for the service user, or raise COMMAND_TIMEOUT_MS.',
      { command, stderr: trimmedStderr }
    );
  }

  const exitCode = typeof error.code === 'number' ? error.code : undefined;
  return new AdapterError(
    exitCode !== undefined
      ? `Audio command "${command}" failed with exit code ${exitCode}`
      : `Audio command "${command}" failed`,
    'CommandFailed',
    'Run the command by hand as the service user to see the full error. A user service usually needs XDG_RUNTIME_DIR to reach the audio daemon.',
    { command, exitCode, stderr: trimmedStderr }
  );
}

/**
 * Command runner backed by child_process.execFile
 * Each call spawns a fresh process; nothing is pooled or reused
 */
export class ExecFileCommandRunner implements CommandRunner {
  private readonly timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  public run(command: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        {
          encoding: 'utf8',
          timeout: this.timeoutMs,
          // A daemon client stuck in a blocking call may ignore SIGTERM
          killSignal: 'SIGKILL',
          maxBuffer: MAX_OUTPUT_BYTES,
          // Keep yes/no and on/off tokens untranslated
          env: { ...process.env, LC_ALL: 'C' }
        },
        (error, stdout, stderr) => {
          if (error) {
            reject(classifyExecFailure(error, command, this.timeoutMs, stderr));
            return;
          }
          resolve({ stdout, stderr });
        }
      );
    });
  }
}
