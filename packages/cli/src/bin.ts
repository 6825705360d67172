/**
 * Executable entry for the tandem CLI.
 */

import { formatError, main } from './index.js'

main().catch((error: unknown) => {
  console.error(formatError(error))
  process.exit(1)
})
