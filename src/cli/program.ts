/**
 * dockship command-line program
 *
 * Kept separate from the executable entry so it can be driven in-process.
 */

import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Command, CommanderError } from 'commander';
import { loadConfig, validateConfig, getConfigurationSummary, type DockshipConfig, type LogLevel } from '../config';
import { logLevelSchema } from '../config/types';
import { SECRET_NAMES, type PipelineReport, type StageOutcome } from '../domain/types';
import { checkDescriptorMatchesImage, loadServiceDescriptor } from '../lib/compose';
import { ConfigurationError, SecretError, errorMessage, isDockshipError } from '../lib/errors';
import { formatImageReference, resolveImageReference } from '../lib/image-reference';
import { createLogger, type Logger } from '../lib/logger';
import { findMissingSecrets, loadRegistryCredentials, loadSecrets, loadSshCredentials } from '../lib/secrets';
import { eventFromEnvironment, isEventName, shouldTrigger, type TriggerEvent } from '../lib/trigger';
import { createToolContext } from '../tools/context';
import { generateFiles } from '../tools/generate';
import type { ToolContext } from '../tools/types';
import { runBuildStage, runDeployStage, runPipeline } from '../workflows/pipeline';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG = 2;

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Human-readable output, one line per call */
  print?: (line: string) => void;
  /** Where pino writes; stderr when absent */
  logDestination?: { write(msg: string): void };
  /** Replace clients, e.g. with in-process stand-ins */
  context?: Partial<Omit<ToolContext, 'logger' | 'workspace'>>;
}

type GlobalOptions = {
  config?: string;
  workspace: string;
  logLevel?: string;
};

interface Session {
  config: DockshipConfig;
  logger: Logger;
  context: ToolContext;
}

function readVersion(): string {
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
    : join(__dirname, '../../package.json'); // src/cli/ -> root
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

function describeOutcome<T>(name: string, outcome: StageOutcome<T>): string {
  switch (outcome.status) {
    case 'succeeded':
      return `✅ ${name}: succeeded in ${outcome.durationMs}ms`;
    case 'failed':
      return `❌ ${name}: ${outcome.error}${outcome.code ? ` (${outcome.code})` : ''}`;
    case 'skipped':
      return `⏭️  ${name}: skipped (${outcome.reason})`;
  }
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const print = deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  let exitCode = EXIT_OK;

  function openSession(command: Command): Session {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const loaded = loadConfig({
      workspace: globals.workspace,
      env,
      ...(globals.config ? { file: globals.config } : {}),
    });

    let level: LogLevel | undefined = loaded.config.logging.level;
    if (globals.logLevel) {
      const parsed = logLevelSchema.safeParse(globals.logLevel);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid log level: ${globals.logLevel}`);
      }
      level = parsed.data;
    }

    const logger = createLogger(
      { name: 'dockship', ...(level ? { level } : {}) },
      deps.logDestination ?? process.stderr,
    );
    for (const warning of loaded.warnings) logger.warn(warning);
    logger.debug({ source: loaded.source, config: getConfigurationSummary(loaded.config) }, 'Configuration loaded');

    const validation = validateConfig(loaded.config);
    for (const warning of validation.warnings) logger.warn(warning, 'Configuration warning');
    if (!validation.isValid) {
      const issues = validation.errors.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`, { errors: validation.errors });
    }

    return {
      config: loaded.config,
      logger,
      context: createToolContext(logger, loaded.config, globals.workspace, deps.context),
    };
  }

  async function guarded(run: () => Promise<number>): Promise<void> {
    try {
      exitCode = await run();
    } catch (error) {
      if (isDockshipError(error)) {
        print(`❌ ${error.getUserMessage()}`);
        exitCode = error instanceof ConfigurationError || error instanceof SecretError ? EXIT_CONFIG : EXIT_FAILURE;
        return;
      }
      print(`❌ Unexpected error: ${errorMessage(error)}`);
      exitCode = EXIT_FAILURE;
    }
  }

  function printReport(report: PipelineReport): void {
    print(describeOutcome('build', report.stages.build));
    print(describeOutcome('deploy', report.stages.deploy));
  }

  const program = new Command();
  program
    .name('dockship')
    .description('Build, publish and deploy a container image to a remote Docker host over SSH')
    .version(readVersion())
    .option('--config <path>', 'path to configuration file (default: dockship.yml)')
    .option('--workspace <path>', 'workspace directory path', deps.cwd ?? process.cwd())
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => print(text.trimEnd()),
      writeErr: (text) => print(text.trimEnd()),
    })
    .addHelpText(
      'after',
      `

Secrets (read from the environment):
  ${Object.values(SECRET_NAMES).join(', ')}

Examples:
  $ dockship generate                 Write Dockerfile, docker-compose.yml and the CI workflow
  $ dockship validate                 Check configuration and descriptor without side effects
  $ dockship run                      Build, push, then deploy
  $ dockship deploy --digest sha256:… Deploy an image pushed earlier`,
    );

  program
    .command('build')
    .description('build the image and push it to the registry')
    .action(async (_options: Record<string, unknown>, command: Command) =>
      guarded(async () => {
        const session = openSession(command);
        const credentials = loadRegistryCredentials(env);
        if (!credentials.ok) {
          throw new SecretError(findMissingSecrets(env, [SECRET_NAMES.registryUsername, SECRET_NAMES.registryToken]));
        }

        const outcome = await runBuildStage(session.config, credentials.value, session.context);
        print(describeOutcome('build', outcome));
        if (outcome.status !== 'succeeded') return EXIT_FAILURE;

        print(`📦 ${outcome.value.pushedTags.join(', ')}`);
        if (outcome.value.digest) print(`🔖 digest=${outcome.value.digest}`);
        return EXIT_OK;
      }),
    );

  program
    .command('deploy')
    .description('upload the service descriptor and recreate the service on the remote host')
    .option('--image <reference>', 'image the descriptor must run (default: configured image)')
    .option('--digest <digest>', 'digest the registry must serve before the service is recreated')
    .action(async (options: { image?: string; digest?: string }, command: Command) =>
      guarded(async () => {
        const session = openSession(command);
        const ssh = loadSshCredentials(env);
        if (!ssh.ok) {
          throw new SecretError(
            findMissingSecrets(env, [SECRET_NAMES.sshPrivateKey, SECRET_NAMES.remoteHost, SECRET_NAMES.remoteUsername]),
          );
        }
        const registry = loadRegistryCredentials(env);
        if (!registry.ok && session.config.deploy.registryLogin) {
          throw new SecretError(findMissingSecrets(env, [SECRET_NAMES.registryUsername, SECRET_NAMES.registryToken]));
        }

        const outcome = await runDeployStage(
          session.config,
          ssh.value,
          registry.ok ? registry.value : undefined,
          {
            ...(options.image ? { image: options.image } : {}),
            ...(options.digest ? { digest: options.digest } : {}),
          },
          session.context,
        );
        print(describeOutcome('deploy', outcome));
        if (outcome.status !== 'succeeded') return EXIT_FAILURE;

        print(`🚀 ${outcome.value.host}:${outcome.value.remotePath}`);
        return EXIT_OK;
      }),
    );

  program
    .command('run')
    .description('build and push, then deploy if the build succeeded')
    .option('--event <name>', 'triggering event: push, pull_request, workflow_dispatch')
    .option('--branch <branch>', 'branch the event applies to')
    .option('--changed <files...>', 'changed files, for the path filter')
    .option('--force', 'ignore the trigger filter')
    .action(
      async (
        options: { event?: string; branch?: string; changed?: string[]; force?: boolean },
        command: Command,
      ) =>
        guarded(async () => {
          const session = openSession(command);

          const event = triggerEvent(options, env);
          if (!options.force && event && !shouldTrigger(event, session.config.trigger)) {
            print(`⏭️  ${event.name} on ${event.branch} does not match the trigger filter; nothing to do`);
            return EXIT_OK;
          }

          const secrets = loadSecrets(env);
          if (!secrets.ok) throw new SecretError(findMissingSecrets(env));

          const report = await runPipeline(session.config, secrets.value, session.context);
          printReport(report);
          return report.status === 'succeeded' ? EXIT_OK : EXIT_FAILURE;
        }),
    );

  program
    .command('generate')
    .description('write the Dockerfile, service descriptor and CI workflow (all three by default)')
    .option('--dockerfile', 'write the Dockerfile')
    .option('--compose', 'write the service descriptor')
    .option('--workflow', 'write the CI workflow')
    .option('--cli-package <spec>', 'npm package spec the CI workflow installs dockship from')
    .option('--force', 'overwrite existing files')
    .action(
      async (
        options: {
          dockerfile?: boolean;
          compose?: boolean;
          workflow?: boolean;
          cliPackage?: string;
          force?: boolean;
        },
        command: Command,
      ) =>
        guarded(async () => {
          const session = openSession(command);
          const result = await generateFiles(
            {
              dockerfile: options.dockerfile ?? false,
              compose: options.compose ?? false,
              workflow: options.workflow ?? false,
              force: options.force ?? false,
              ...(options.cliPackage ? { cliPackage: options.cliPackage } : {}),
            },
            session.config,
            session.context,
          );
          if (!result.ok) {
            print(`❌ ${result.error}`);
            return EXIT_FAILURE;
          }
          for (const path of result.value.written) print(`📝 ${path}`);
          return EXIT_OK;
        }),
    );

  program
    .command('validate')
    .description('check configuration, descriptor and image tag consistency')
    .action(async (_options: Record<string, unknown>, command: Command) =>
      guarded(async () => {
        const session = openSession(command);
        const { config } = session;

        const ref = resolveImageReference(config.image.repository, config.image.tag, config.registry.address);
        if (!ref.ok) throw new ConfigurationError(ref.error);

        const descriptor = await loadServiceDescriptor(resolve(session.context.workspace, config.deploy.composeFile));
        if (!descriptor.ok) {
          print(`❌ ${descriptor.error}`);
          return EXIT_FAILURE;
        }
        const matches = checkDescriptorMatchesImage(descriptor.value.descriptor, ref.value, config.deploy.service);
        if (!matches.ok) {
          print(`❌ ${matches.error}`);
          return EXIT_FAILURE;
        }

        print(`✅ ${config.deploy.composeFile} runs ${formatImageReference(ref.value)}`);
        return EXIT_OK;
      }),
    );

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

/**
 * Event from options, else from CI variables; undefined for a manual run
 */
function triggerEvent(
  options: { event?: string; branch?: string; changed?: string[] },
  env: Record<string, string | undefined>,
): TriggerEvent | undefined {
  if (options.event === undefined) return eventFromEnvironment(env);

  if (!isEventName(options.event)) {
    throw new ConfigurationError(`Unknown event: ${options.event}`);
  }
  if (!options.branch) {
    throw new ConfigurationError('--branch is required with --event');
  }
  return options.changed
    ? { name: options.event, branch: options.branch, changedFiles: options.changed }
    : { name: options.event, branch: options.branch };
}

