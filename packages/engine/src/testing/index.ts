/**
 * Test helpers shared with packages that drive the engine.
 */

export { FakeEnvironment, FakeEnvironmentRegistry } from './fake-environment.js'
export { pipelineToml, projectToml, writeProject } from './fixtures.js'
