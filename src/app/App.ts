import { loadConfig, type AppConfig } from '../config/index.js'
import { ResourceChecker } from '../core/checker/service.js'
import { FingerprintStore } from '../core/fingerprints/store.js'
import { MonitorService } from '../core/monitor/service.js'
import { combineNotifiers } from '../core/notifications/composite.js'
import { NotificationDispatcher } from '../core/notifications/dispatcher.js'
import type { Notifier } from '../core/notifications/types.js'
import { parseHeartbeatTimes } from '../core/scheduler/heartbeat.js'
import { SchedulerService } from '../core/scheduler/service.js'
import { DiscordWebhookNotifier } from '../integrations/discord/webhook.js'
import { createDocumentFetcher } from '../integrations/pages/fetcher.js'
import { TelegramNotifier } from '../integrations/telegram/notifier.js'
import { configureLogger, logger } from '../utils/logger.js'

async function createNotifiers(config: AppConfig): Promise<Notifier[]> {
  const notifiers: Notifier[] = []

  if (config.TELEGRAM_BOT_TOKEN && config.TELEGRAM_CHAT_ID && !config.TELEGRAM_DISABLE_NOTIFICATION) {
    notifiers.push(await TelegramNotifier.create({
      botToken: config.TELEGRAM_BOT_TOKEN,
      chatId: config.TELEGRAM_CHAT_ID,
      threadId: config.TELEGRAM_THREAD_ID,
    }))
  }
  else if (config.TELEGRAM_DISABLE_NOTIFICATION) {
    logger.info('Telegram notifications disabled by configuration')
  }
  else if (config.TELEGRAM_BOT_TOKEN || config.TELEGRAM_CHAT_ID) {
    logger.warn('Telegram needs both TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID; notifications not configured')
  }

  if (config.DISCORD_WEBHOOK_URL) {
    notifiers.push(new DiscordWebhookNotifier(config.DISCORD_WEBHOOK_URL))
  }

  if (notifiers.length === 0) {
    logger.warn('No notification channel configured; notifications will only be logged')
  }
  return notifiers
}

export class App {
  private readonly env: NodeJS.ProcessEnv
  private scheduler: SchedulerService | null = null
  private stopRequested = false

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env
  }

  async start(): Promise<void> {
    const config = loadConfig(this.env)
    await configureLogger({
      level: config.LOG_LEVEL,
      filePath: config.logPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      dataPath: config.DATA_PATH,
      hashFilePath: config.hashFilePath,
      urls: config.urls,
      checkIntervalSeconds: config.CHECK_INTERVAL_SECONDS,
      recoveryDelaySeconds: config.RECOVERY_DELAY_SECONDS,
      heartbeatTimes: config.HEARTBEAT_TIMES,
      timezone: config.TZ,
      sentinelPhrase: config.SENTINEL_PHRASE,
      fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
      fetchConcurrency: config.FETCH_CONCURRENCY,
      logLevel: config.LOG_LEVEL,
      logPath: config.logPath,
    })

    if (config.urls.length === 0) {
      logger.warn('URLS_TO_MONITOR is empty; only heartbeats will be sent')
    }

    const dispatcher = new NotificationDispatcher(combineNotifiers(await createNotifiers(config)))
    const monitor = new MonitorService({
      urls: config.urls,
      sentinelPhrase: config.SENTINEL_PHRASE,
      concurrency: config.FETCH_CONCURRENCY,
      checker: new ResourceChecker({
        fetchDocument: createDocumentFetcher({
          timeoutMs: config.FETCH_TIMEOUT_MS,
          userAgent: config.FETCH_USER_AGENT,
        }),
      }),
      store: new FingerprintStore(config.hashFilePath),
      dispatcher,
    })

    if (this.stopRequested) {
      logger.info('Stop requested during startup; not starting the scheduler')
      return
    }

    this.scheduler = new SchedulerService({
      monitor,
      dispatcher,
      intervalMs: config.CHECK_INTERVAL_SECONDS * 1000,
      recoveryDelayMs: config.RECOVERY_DELAY_SECONDS * 1000,
      heartbeats: parseHeartbeatTimes(config.HEARTBEAT_TIMES),
      timezone: config.TZ,
    })

    await this.scheduler.start()
  }

  /** Ends the scheduler after the current cycle; before it exists, keeps it from starting. */
  stop(): void {
    if (this.stopRequested) return
    this.stopRequested = true
    logger.info('Stop requested; exiting after the current cycle')
    this.scheduler?.stop()
  }
}
