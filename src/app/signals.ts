import { logger } from '../utils/logger.js'

export interface Stoppable {
  stop(): void
}

/**
 * First signal asks for a graceful stop; any later one exits immediately
 * through `exit`.
 */
export function createStopSignalHandler(target: Stoppable, exit: (code: number) => void): (signal: NodeJS.Signals) => void {
  let received = false
  return (signal) => {
    if (received) {
      logger.warn('Second stop signal received; exiting immediately', { signal })
      exit(1)
      return
    }
    received = true
    logger.info('Stop signal received', { signal })
    target.stop()
  }
}
