/**
 * Temporary project trees for engine tests.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

export function projectToml(name: string, extra = ''): string {
  return `[tool.poetry]\nname = "${name}"\nversion = "0.1.0"\n${extra}`
}

export function pipelineToml(steps: string[], scripts: string[] = []): string {
  const stepList = steps.map((s) => `"${s}"`).join(', ')
  const scriptTables = scripts.map((s) => `[tool.typeo.scripts.${s}]\nverbose = true\n`).join('\n')
  return projectToml('pipeline', `\n[tool.tandem]\nsteps = [${stepList}]\n\n[tool.typeo]\n${scriptTables}`)
}

export async function writeProject(dir: string, content: string): Promise<void> {
  await mkdir(dir, { recursive: true })
  await writeFile(join(dir, 'pyproject.toml'), content)
}
