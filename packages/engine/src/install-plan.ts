/**
 * Install decision table.
 *
 * Rows are checked in order and the first match wins, so the environment's
 * install (or update) runs at most once per `Project.install` call.
 */

/** Observed state of a project's environment */
export type EnvironmentState = 'absent' | 'not-installed' | 'installed'

/** What `Project.install` does */
export type InstallAction = 'create-and-install' | 'install' | 'resync' | 'skip'

/** Which environment capability performs a forced re-sync */
export type ResyncStrategy = 'reinstall' | 'update'

export interface InstallRule {
  state: EnvironmentState
  /** `undefined` matches either value */
  force: boolean | undefined
  action: InstallAction
}

export const INSTALL_RULES: readonly InstallRule[] = [
  { state: 'absent', force: undefined, action: 'create-and-install' },
  { state: 'not-installed', force: undefined, action: 'install' },
  { state: 'installed', force: true, action: 'resync' },
  { state: 'installed', force: false, action: 'skip' },
]

export function decideInstall(state: EnvironmentState, force: boolean): InstallAction {
  for (const rule of INSTALL_RULES) {
    if (rule.state === state && (rule.force === undefined || rule.force === force)) {
      return rule.action
    }
  }
  throw new Error(`No install rule for state '${state}' (force: ${force})`)
}
