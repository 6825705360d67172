/**
 * Build command - make sure a project is installed in its environment.
 *
 * Creates the environment when it is missing. An installed project is left
 * alone unless --force (or --update) asks for a re-sync.
 */

import { resolve } from 'node:path'

import type { Command } from 'commander'

import { type InstallAction, buildProject } from '@tandem/engine'

import { type CliContext, readGlobalOptions, withEventSink } from '../helpers.js'
import { formatPath, info, success } from '../ui.js'

interface BuildOptions {
  force?: boolean | undefined
  update?: boolean | undefined
}

const ACTION_MESSAGES: Record<InstallAction, string> = {
  'create-and-install': 'Environment created and project installed',
  install: 'Project installed',
  resync: 'Project re-synced',
  skip: 'Project already installed',
}

export function registerBuildCommand(program: Command, context: CliContext = {}): void {
  program
    .command('build')
    .description('Install a project into its environment')
    .argument('<project>', 'Project directory containing pyproject.toml')
    .option('-f, --force', 'Re-sync a project that is already installed')
    .option('--update', 'Re-sync with the update capability (implies --force)')
    .action(async (project: string, options: BuildOptions, command: Command) => {
      const globals = readGlobalOptions(command)
      const projectPath = resolve(project)
      const update = options.update === true

      const action = await withEventSink(globals, context, (events) =>
        buildProject(projectPath, {
          events,
          environmentFactory: context.environmentFactory,
          force: options.force === true || update,
          strategy: update ? 'update' : 'reinstall',
        })
      )

      success(ACTION_MESSAGES[action])
      info('project', formatPath(projectPath))
    })
}
