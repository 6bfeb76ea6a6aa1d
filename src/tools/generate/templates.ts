/**
 * Renderers for the Dockerfile, service descriptor and CI workflow.
 * The descriptor and the workflow take the image from the same configuration the build uses,
 * so the pushed tag and the deployed tag agree by construction.
 */

import * as yaml from 'js-yaml';
import type { DockshipConfig } from '../../config/types';
import { SECRET_NAMES } from '../../domain/types';
import { shellQuote } from '../../lib/shell';
import type { AppOptions } from './schema';

const DUMP_OPTIONS: yaml.DumpOptions = { lineWidth: -1, noRefs: true };

export function generateDockerfile(app: AppOptions): string {
  return [
    `FROM ${app.baseImage}`,
    '',
    `WORKDIR ${app.workdir}`,
    '',
    `COPY ${app.requirementsFile} .`,
    `RUN pip install --no-cache-dir -r ${app.requirementsFile}`,
    '',
    'COPY . .',
    '',
    `EXPOSE ${app.port}`,
    '',
    `CMD ${JSON.stringify(app.command)}`,
    '',
  ].join('\n');
}

export function generateComposeDescriptor(image: string, app: AppOptions): string {
  return yaml.dump(
    {
      services: {
        [app.serviceName]: {
          image,
          ports: [`${app.port}:${app.port}`],
          restart: app.restart,
        },
      },
    },
    DUMP_OPTIONS,
  );
}

export interface WorkflowOptions {
  /** Anything `npm install --global` takes: a scoped name, a tarball URL, a git URL */
  cliPackage: string;
  nodeVersion: string;
}

function secretEnv(names: readonly string[]): Record<string, string> {
  return Object.fromEntries(names.map((name) => [name, `\${{ secrets.${name} }}`]));
}

/**
 * Two jobs; `deploy` needs `build-and-push`, so it never runs after a failed build
 */
export function generateWorkflow(config: DockshipConfig, options: WorkflowOptions): string {
  const filter: Record<string, string[]> = { branches: config.trigger.branches };
  if (config.trigger.paths.length > 0) filter.paths = config.trigger.paths;

  const on = Object.fromEntries(
    config.trigger.events.map((event) => [event, event === 'workflow_dispatch' ? {} : filter]),
  );

  const setup = [
    { uses: 'actions/checkout@v4' },
    { uses: 'actions/setup-node@v4', with: { 'node-version': options.nodeVersion } },
    { name: 'Install dockship', run: `npm install --global ${shellQuote(options.cliPackage)}` },
  ];

  const workflow = {
    name: 'Build and deploy',
    on,
    jobs: {
      'build-and-push': {
        'runs-on': 'ubuntu-latest',
        steps: [
          ...setup,
          {
            name: 'Build and push image',
            run: 'dockship build',
            env: secretEnv([SECRET_NAMES.registryUsername, SECRET_NAMES.registryToken]),
          },
        ],
      },
      deploy: {
        needs: 'build-and-push',
        'runs-on': 'ubuntu-latest',
        steps: [
          ...setup,
          {
            name: 'Deploy to remote host',
            run: 'dockship deploy',
            env: secretEnv(Object.values(SECRET_NAMES)),
          },
        ],
      },
    },
  };

  return yaml.dump(workflow, DUMP_OPTIONS);
}
