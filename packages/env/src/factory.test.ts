import { describe, expect, test } from 'vitest'

import { CondaEnvironment } from './conda.js'
import { createEnvironment, environmentFactory } from './factory.js'
import { PoetryEnvironment } from './poetry.js'

describe('createEnvironment', () => {
  test('defaults to poetry', () => {
    const env = createEnvironment({ name: 'a', path: '/p/a', settings: {} })
    expect(env).toBeInstanceOf(PoetryEnvironment)
  })

  test('selects conda from settings', () => {
    const env = createEnvironment({ name: 'a', path: '/p/a', settings: { environment: 'conda' } })
    expect(env).toBeInstanceOf(CondaEnvironment)
  })
})

describe('environmentFactory', () => {
  test('binds options for every project', () => {
    const factory = environmentFactory({ condaPath: '/opt/conda/bin/conda' })
    const env = factory({ name: 'b', path: '/p/b', settings: { environment: 'conda', conda_env: 'b-env' } })
    expect(env.name).toBe('b-env')
  })
})
