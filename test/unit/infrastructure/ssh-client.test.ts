import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { EventEmitter } from 'node:events';
import pino from 'pino';

type Callback<T> = (err: Error | undefined, value: T) => void;

class MockChannel extends EventEmitter {
  readonly stderr = new EventEmitter();
  readonly written: string[] = [];

  end(data?: string): void {
    if (data !== undefined) this.written.push(data);
  }
}

class MockSftp {
  readonly puts: Array<[string, string]> = [];
  failWith: Error | undefined;
  ended = false;

  fastPut(local: string, remote: string, cb: (err?: Error) => void): void {
    this.puts.push([local, remote]);
    cb(this.failWith);
  }

  end(): void {
    this.ended = true;
  }
}

const mockState: {
  connectError: Error | undefined;
  connectConfig: Record<string, unknown> | undefined;
  channel: MockChannel;
  sftp: MockSftp;
  ended: number;
  run: (channel: MockChannel) => void;
} = {
  connectError: undefined,
  connectConfig: undefined,
  channel: new MockChannel(),
  sftp: new MockSftp(),
  ended: 0,
  run: () => undefined,
};

class MockClient extends EventEmitter {
  connect(config: Record<string, unknown>): void {
    mockState.connectConfig = config;
    setImmediate(() => (mockState.connectError ? this.emit('error', mockState.connectError) : this.emit('ready')));
  }

  sftp(cb: Callback<MockSftp>): void {
    cb(undefined, mockState.sftp);
  }

  exec(_command: string, cb: Callback<MockChannel>): void {
    const channel = mockState.channel;
    cb(undefined, channel);
    setImmediate(() => mockState.run(channel));
  }

  end(): void {
    mockState.ended++;
  }
}

jest.mock('ssh2', () => ({ Client: MockClient }));

import { connectSsh, type RemoteShell } from '../../../src/infrastructure/ssh/client';
import { ErrorCodes } from '../../../src/lib/errors';

const logger = pino({ level: 'silent' });
const options = {
  host: 'deploy.example.com',
  port: 22,
  username: 'ubuntu',
  privateKey: 'test-key\n',
  readyTimeoutMs: 20000,
};

async function open(): Promise<RemoteShell> {
  const result = await connectSsh(options, logger);
  if (!result.ok) throw new Error(result.error);
  return result.value;
}

describe('SSH client', () => {
  beforeEach(() => {
    mockState.connectError = undefined;
    mockState.connectConfig = undefined;
    mockState.channel = new MockChannel();
    mockState.sftp = new MockSftp();
    mockState.ended = 0;
    mockState.run = () => undefined;
  });

  it('should connect with private-key authentication', async () => {
    await open();
    expect(mockState.connectConfig).toEqual({
      host: 'deploy.example.com',
      port: 22,
      username: 'ubuntu',
      privateKey: 'test-key\n',
      readyTimeout: 20000,
    });
  });

  it('should report connection failures', async () => {
    mockState.connectError = new Error('All configured authentication methods failed');

    const result = await connectSsh(options, logger);

    expect(result).toEqual({
      ok: false,
      error: 'SSH connection to ubuntu@deploy.example.com:22 failed: All configured authentication methods failed',
      code: ErrorCodes.SSH_CONNECTION_FAILED,
    });
    expect(mockState.ended).toBe(1);
  });

  it('should upload over SFTP and close the channel', async () => {
    const shell = await open();

    expect(await shell.upload('/work/docker-compose.yml', 'docker-compose.yml')).toEqual({ ok: true, value: undefined });
    expect(mockState.sftp.puts).toEqual([['/work/docker-compose.yml', 'docker-compose.yml']]);
    expect(mockState.sftp.ended).toBe(true);
  });

  it('should map upload errors to UPLOAD_FAILED', async () => {
    const shell = await open();
    mockState.sftp.failWith = new Error('Permission denied');

    expect(await shell.upload('/work/docker-compose.yml', '/srv/docker-compose.yml')).toEqual({
      ok: false,
      error: 'Upload of /work/docker-compose.yml to /srv/docker-compose.yml failed: Permission denied',
      code: ErrorCodes.UPLOAD_FAILED,
    });
  });

  it('should collect output and the exit code', async () => {
    mockState.run = (channel) => {
      channel.emit('data', Buffer.from('Container web Started\n'));
      channel.stderr.emit('data', Buffer.from('pulling\n'));
      channel.emit('exit', 0);
      channel.emit('close');
    };
    const shell = await open();

    expect(await shell.exec('docker compose -f docker-compose.yml up -d')).toEqual({
      ok: true,
      value: { exitCode: 0, stdout: 'Container web Started', stderr: 'pulling' },
    });
  });

  it('should write stdin when given', async () => {
    mockState.run = (channel) => {
      channel.emit('exit', 1);
      channel.emit('close');
    };
    const shell = await open();

    const result = await shell.exec('docker login --password-stdin', { stdin: 'test-secret' });

    expect(result.ok && result.value.exitCode).toBe(1);
    expect(mockState.channel.written).toEqual(['test-secret']);
  });

  it('should end the client on close', async () => {
    const shell = await open();
    shell.close();
    expect(mockState.ended).toBe(1);
  });
});
