import { configureLogger } from '../utils/logger.js'

await configureLogger({ level: 'error' })
