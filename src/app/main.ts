import { App } from './App.js'
import { createStopSignalHandler } from './signals.js'
import { logger } from '../utils/logger.js'

const app = new App()
const onStopSignal = createStopSignalHandler(app, code => process.exit(code))

process.on('SIGINT', onStopSignal)
process.on('SIGTERM', onStopSignal)

app.start().catch((error) => {
  logger.error('Fatal error', { error })
  process.exitCode = 1
})
