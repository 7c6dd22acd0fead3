import type { Notifier } from '../../core/notifications/types.js'
import { logger } from '../../utils/logger.js'

const DISCORD_MAX_CONTENT_LENGTH = 2000
const WEBHOOK_USERNAME = 'pagewatch'

function sanitizeWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url)
    const parts = parsed.pathname.split('/').filter(Boolean)
    if (parts.length >= 3 && parts[0] === 'api' && parts[1] === 'webhooks') {
      return `${parsed.origin}/api/webhooks/${parts[2]}/***`
    }
    return `${parsed.origin}${parsed.pathname}`
  }
  catch {
    return '[invalid-url]'
  }
}

function truncateContent(content: string): string {
  if (content.length <= DISCORD_MAX_CONTENT_LENGTH) return content
  return `${content.slice(0, DISCORD_MAX_CONTENT_LENGTH - 3)}...`
}

export class DiscordWebhookNotifier implements Notifier {
  readonly name = 'discord'
  private readonly webhookUrl: string
  private readonly safeUrl: string

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl
    this.safeUrl = sanitizeWebhookUrl(webhookUrl)
    logger.info('Discord webhook notifications configured', { url: this.safeUrl })
  }

  async send(message: string): Promise<void> {
    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
      },
      body: JSON.stringify({
        content: truncateContent(message),
        username: WEBHOOK_USERNAME,
        allowed_mentions: { parse: [] },
      }),
    })

    logger.debug('Discord webhook response', {
      status: response.status,
      ok: response.ok,
      url: this.safeUrl,
    })

    if (!response.ok) {
      throw new Error(`Discord webhook returned HTTP ${response.status}`)
    }
  }
}
