/**
 * SSH command execution on remote nodes.
 *
 * Uses native ssh2 library for non-interactive commands.
 */

import { Client, type ConnectConfig } from 'ssh2';
import { readFileSync } from 'fs';
import type { SshConfig } from '../config.js';
import { expandHome } from '../config.js';
import { CollectionError, type CollectionErrorKind } from '../errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

export interface ExecOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type SshExecFn = (target: SshConfig, command: string, options?: ExecOptions) => Promise<ExecResult>;

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'ECONNRESET', 'ETIMEDOUT']);

/** Map an ssh2 / socket error onto a collection error kind. */
export function classifySshError(err: Error): CollectionErrorKind {
  const level = 'level' in err ? err.level : undefined;
  if (level === 'client-authentication') return 'auth';
  if (level === 'client-timeout') return 'timeout';
  if (level === 'client-socket' || level === 'client-dns') return 'unreachable';
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && UNREACHABLE_CODES.has(code)) return 'unreachable';
  return 'command';
}

/** Exit status the remote shell reports for a command it could not finish */
export const NO_EXIT_STATUS = 255;

/**
 * Result of a closed exec channel. A command killed by a signal, or one
 * whose channel closed without an exit status, counts as failed.
 */
export function channelResult(
  stdout: string,
  stderr: string,
  code: number | null | undefined,
  signal?: string,
): ExecResult {
  if (typeof code === 'number') return { stdout: stdout.trim(), stderr: stderr.trim(), code };
  const reason = signal ? `killed by signal ${signal}` : 'closed without an exit status';
  const detail = stderr.trim();
  return { stdout: stdout.trim(), stderr: detail ? `${detail}\n${reason}` : reason, code: NO_EXIT_STATUS };
}

function connectConfig(target: SshConfig): ConnectConfig {
  const config: ConnectConfig = {
    host: target.host,
    port: target.port,
    username: target.username,
    readyTimeout: target.timeoutSeconds * 1000,
  };
  if (target.keyFile) {
    config.privateKey = readFileSync(expandHome(target.keyFile));
  } else if (target.password) {
    config.password = target.password;
  } else if (process.env.SSH_AUTH_SOCK) {
    config.agent = process.env.SSH_AUTH_SOCK;
  }
  return config;
}

export async function sshExec(
  target: SshConfig,
  command: string,
  options: ExecOptions = {},
): Promise<ExecResult> {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const where = `${target.username}@${target.host}:${target.port}`;

  return new Promise((resolve, reject) => {
    const conn = new Client();
    let settled = false;

    const finish = (err: CollectionError | null, result?: ExecResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      conn.end();
      if (err) reject(err);
      else if (result) resolve(result);
    };

    const timer = setTimeout(() => {
      finish(new CollectionError('timeout', `SSH to ${where} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onAbort = () => finish(new CollectionError('cancelled', `SSH to ${where} cancelled`));
    if (options.signal?.aborted) {
      onAbort();
      return;
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    conn
      .on('ready', () => {
        conn.exec(command, (err, stream) => {
          if (err) {
            return finish(new CollectionError('command', `exec on ${where}: ${err.message}`));
          }

          let stdout = '';
          let stderr = '';

          stream.on('data', (data: Buffer) => { stdout += data.toString(); });
          stream.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

          stream.on('close', (code: number | null | undefined, signal?: string) => {
            finish(null, channelResult(stdout, stderr, code, signal));
          });
        });
      })
      .on('error', (err) => {
        finish(new CollectionError(classifySshError(err), `SSH to ${where}: ${err.message}`));
      });

    try {
      conn.connect(connectConfig(target));
    } catch (err) {
      // Bad key file or option; surfaces before any socket is opened
      finish(new CollectionError('config', `SSH to ${where}: ${err instanceof Error ? err.message : String(err)}`));
    }
  });
}

/** Quote a value for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
