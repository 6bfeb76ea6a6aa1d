/**
 * SSH session for the deploy stage: SFTP upload and remote command execution over ssh2
 */

import { Client, type ClientChannel, type SFTPWrapper } from 'ssh2';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../../domain/types';
import { ErrorCodes, errorMessage } from '../../lib/errors';

export interface SshConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKey: string;
  readyTimeoutMs: number;
}

export interface RemoteCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RemoteExecOptions {
  /** Written to the command's stdin, then stdin is closed */
  stdin?: string;
}

/**
 * An open session on the remote host
 */
export interface RemoteShell {
  upload: (localPath: string, remotePath: string) => Promise<Result<void>>;
  exec: (command: string, options?: RemoteExecOptions) => Promise<Result<RemoteCommandResult>>;
  close: () => void;
}

export type RemoteShellFactory = (options: SshConnectOptions, logger: Logger) => Promise<Result<RemoteShell>>;

function openSftp(client: Client): Promise<SFTPWrapper> {
  return new Promise((resolve, reject) => {
    client.sftp((err, sftp) => (err ? reject(err) : resolve(sftp)));
  });
}

function openExec(client: Client, command: string): Promise<ClientChannel> {
  return new Promise((resolve, reject) => {
    client.exec(command, (err, channel) => (err ? reject(err) : resolve(channel)));
  });
}

/**
 * Connect with private-key authentication
 */
export const connectSsh: RemoteShellFactory = async (options, logger) => {
  const client = new Client();

  try {
    await new Promise<void>((resolve, reject) => {
      client.once('ready', () => resolve());
      client.once('error', reject);
      client.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        privateKey: options.privateKey,
        readyTimeout: options.readyTimeoutMs,
      });
    });
  } catch (error) {
    client.end();
    return Failure(
      `SSH connection to ${options.username}@${options.host}:${options.port} failed: ${errorMessage(error)}`,
      ErrorCodes.SSH_CONNECTION_FAILED,
    );
  }

  // late socket errors are reported by the operation in flight
  client.on('error', (error) => logger.debug({ error: error.message }, 'SSH client error'));
  logger.info({ host: options.host, port: options.port, username: options.username }, 'SSH session opened');

  return Success({
    async upload(localPath: string, remotePath: string): Promise<Result<void>> {
      try {
        const sftp = await openSftp(client);
        try {
          await new Promise<void>((resolve, reject) => {
            sftp.fastPut(localPath, remotePath, (err) => (err ? reject(err) : resolve()));
          });
        } finally {
          sftp.end();
        }
        logger.info({ localPath, remotePath }, 'File uploaded');
        return Success(undefined);
      } catch (error) {
        return Failure(`Upload of ${localPath} to ${remotePath} failed: ${errorMessage(error)}`, ErrorCodes.UPLOAD_FAILED);
      }
    },

    async exec(command: string, execOptions: RemoteExecOptions = {}): Promise<Result<RemoteCommandResult>> {
      try {
        const channel = await openExec(client, command);
        let stdout = '';
        let stderr = '';
        let exitCode = -1;

        const finished = new Promise<void>((resolve) => {
          channel.on('data', (chunk: Buffer) => {
            stdout += chunk.toString();
          });
          channel.stderr.on('data', (chunk: Buffer) => {
            stderr += chunk.toString();
          });
          channel.on('exit', (code: number | null) => {
            exitCode = code ?? -1;
          });
          channel.on('close', () => resolve());
        });

        if (execOptions.stdin !== undefined) {
          channel.end(execOptions.stdin);
        } else {
          channel.end();
        }
        await finished;

        logger.debug({ command, exitCode }, 'Remote command finished');
        return Success({ exitCode, stdout: stdout.trim(), stderr: stderr.trim() });
      } catch (error) {
        return Failure(`Remote command failed to start: ${errorMessage(error)}`, ErrorCodes.REMOTE_COMMAND_FAILED);
      }
    },

    close(): void {
      client.end();
      logger.debug({ host: options.host }, 'SSH session closed');
    },
  });
};
