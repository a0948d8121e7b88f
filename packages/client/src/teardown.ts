/**
 * Ordered release of acquired resources
 */

import { TeardownError, errorMessage, type TeardownFailure } from './errors'
import type { Logger } from './logger'

export interface TeardownStep {
  description: string
  release: () => Promise<void>
}

/**
 * Release steps in reverse order of acquisition. A failing step is logged
 * and the remaining steps still run; all failures are thrown together.
 */
export async function runTeardown(acquired: TeardownStep[], logger: Logger): Promise<void> {
  const failures: TeardownFailure[] = []

  for (const step of acquired.slice().reverse()) {
    try {
      await step.release()
      logger.success(step.description)
    } catch (error) {
      const reason = errorMessage(error)
      logger.error(`${step.description}: ${reason}`)
      failures.push({ step: step.description, reason })
    }
  }

  if (failures.length > 0) {
    throw new TeardownError(failures)
  }
}
