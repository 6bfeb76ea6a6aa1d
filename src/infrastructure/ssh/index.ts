export {
  connectSsh,
  type SshConnectOptions,
  type RemoteCommandResult,
  type RemoteExecOptions,
  type RemoteShell,
  type RemoteShellFactory,
} from './client';
