/**
 * Logger spies
 */

import { vi } from 'vitest'
import { noopLogger, setLogger } from '../../src/utils/logger'

/**
 * Install a logger whose methods are spies. Call `restoreLogger()` after
 * the test.
 */
export function spyLogger() {
  const spies = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
  setLogger(spies)
  return spies
}

export function restoreLogger(): void {
  setLogger(noopLogger)
}
